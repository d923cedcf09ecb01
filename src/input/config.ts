// Input configuration: defaults plus validation of host-supplied overrides.
// Concerned only with the plain-data shape; samplers are built by the manager.

import {
  createDurationMs,
  createKeyCode,
  isDurationMs,
  type DurationMs,
  type KeyCode,
} from "../types/brands";

import { DEFAULT_AXIS_TOLERANCE, type AxisTriggerMode } from "./axes";

export type AxisBindingConfig = Readonly<{
  axisName: string;
  mode: AxisTriggerMode;
  tolerance: number;
}>;

export type SamplerBindingConfig = Readonly<{
  name: string;
  keys: ReadonlyArray<KeyCode>;
  axes: ReadonlyArray<AxisBindingConfig>;
}>;

export type InputConfiguration = Readonly<{
  touchCooldownMs: DurationMs;
  bindings: ReadonlyArray<SamplerBindingConfig>;
}>;

const keys = (...codes: Array<string>): ReadonlyArray<KeyCode> =>
  codes.map(createKeyCode);

const axis = (
  axisName: string,
  mode: AxisTriggerMode = "both",
): AxisBindingConfig => ({
  axisName,
  mode,
  tolerance: DEFAULT_AXIS_TOLERANCE,
});

// KeyboardEvent.code / device axis names → named samplers
export const DEFAULT_INPUT_CONFIG: InputConfiguration = {
  bindings: [
    { axes: [], keys: keys("Enter", "NumpadEnter"), name: "Submit" },
    { axes: [], keys: keys("Escape"), name: "Cancel" },
    {
      axes: [axis("MouseScrollWheel", "negative")],
      keys: keys("Enter", "NumpadEnter"),
      name: "Continue",
    },
    { axes: [], keys: keys("ControlLeft", "ControlRight"), name: "Skip" },
    { axes: [], keys: keys("KeyA"), name: "AutoPlay" },
    { axes: [], keys: keys("Space"), name: "ToggleUI" },
    {
      axes: [axis("MouseScrollWheel", "positive")],
      keys: keys("Backspace"),
      name: "Rollback",
    },
    {
      axes: [axis("MouseX"), axis("gp:axis:0")],
      keys: [],
      name: "CameraLookX",
    },
    {
      axes: [axis("MouseY"), axis("gp:axis:1")],
      keys: [],
      name: "CameraLookY",
    },
  ],
  touchCooldownMs: createDurationMs(100),
};

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNonEmptyString(x: unknown): x is string {
  return typeof x === "string" && x.trim().length > 0;
}

function isAxisTriggerMode(x: unknown): x is AxisTriggerMode {
  return x === "positive" || x === "negative" || x === "both";
}

function fail(path: string, problem: string): never {
  throw new Error(`Invalid input configuration: ${path} ${problem}`);
}

function parseKeys(raw: unknown, path: string): ReadonlyArray<KeyCode> {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) fail(path, "must be an array of key codes");
  return raw.map((code: unknown, i) => {
    if (!isNonEmptyString(code)) {
      fail(`${path}[${String(i)}]`, "must be a non-empty string");
    }
    return createKeyCode(code);
  });
}

function parseAxis(raw: unknown, path: string): AxisBindingConfig {
  if (isNonEmptyString(raw)) return axis(raw);
  if (!isRecord(raw)) fail(path, "must be an axis name or an object");
  const axisName = raw["axisName"];
  if (!isNonEmptyString(axisName)) {
    fail(`${path}.axisName`, "must be a non-empty string");
  }
  const mode = raw["mode"] ?? "both";
  if (!isAxisTriggerMode(mode)) {
    fail(`${path}.mode`, 'must be "positive", "negative" or "both"');
  }
  const tolerance = raw["tolerance"] ?? DEFAULT_AXIS_TOLERANCE;
  if (
    typeof tolerance !== "number" ||
    !Number.isFinite(tolerance) ||
    tolerance < 0
  ) {
    fail(`${path}.tolerance`, "must be a non-negative finite number");
  }
  return { axisName, mode, tolerance };
}

function parseAxes(
  raw: unknown,
  path: string,
): ReadonlyArray<AxisBindingConfig> {
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) fail(path, "must be an array");
  return raw.map((a: unknown, i) => parseAxis(a, `${path}[${String(i)}]`));
}

function parseBinding(raw: unknown, path: string): SamplerBindingConfig {
  if (!isRecord(raw)) fail(path, "must be an object");
  const name = raw["name"];
  if (!isNonEmptyString(name)) {
    fail(`${path}.name`, "must be a non-empty string");
  }
  return {
    axes: parseAxes(raw["axes"], `${path}.axes`),
    keys: parseKeys(raw["keys"], `${path}.keys`),
    name,
  };
}

/**
 * Validate host-supplied configuration (e.g. parsed JSON).
 * Missing fields fall back to DEFAULT_INPUT_CONFIG.
 * @throws Error naming the offending path when the shape is wrong
 */
export function parseInputConfiguration(raw: unknown): InputConfiguration {
  if (raw === undefined || raw === null) return DEFAULT_INPUT_CONFIG;
  if (!isRecord(raw)) fail("<root>", "must be an object");

  let touchCooldownMs = DEFAULT_INPUT_CONFIG.touchCooldownMs;
  const cooldown = raw["touchCooldownMs"];
  if (cooldown !== undefined) {
    if (!isDurationMs(cooldown)) {
      fail("touchCooldownMs", "must be a non-negative finite number");
    }
    touchCooldownMs = cooldown;
  }

  const rawBindings = raw["bindings"];
  let bindings = DEFAULT_INPUT_CONFIG.bindings;
  if (rawBindings !== undefined) {
    if (!Array.isArray(rawBindings)) fail("bindings", "must be an array");
    bindings = rawBindings.map((b: unknown, i) =>
      parseBinding(b, `bindings[${String(i)}]`),
    );
  }

  const seen = new Set<string>();
  for (const binding of bindings) {
    if (seen.has(binding.name)) {
      fail("bindings", `declares "${binding.name}" more than once`);
    }
    seen.add(binding.name);
  }

  return { bindings, touchCooldownMs };
}
