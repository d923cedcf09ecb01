import { debugLog } from "../utils/debug";

import { createDeviceAxis } from "./axes";
import { createInputBinding } from "./binding";
import { InputSampler, type InputSamplerDeps } from "./sampler";

import type { InputConfiguration } from "./config";

/**
 * Registry of named samplers, sampled together once per tick.
 * Consumers receive the manager explicitly and look samplers up by name.
 */
export class InputManager<TTarget = unknown> {
  private readonly samplers = new Map<string, InputSampler<TTarget>>();
  private processing = true;

  /** When false, sampleAll() leaves every sampler untouched. */
  get processInput(): boolean {
    return this.processing;
  }

  set processInput(enabled: boolean) {
    if (enabled === this.processing) return;
    this.processing = enabled;
    debugLog("manager", `input processing ${enabled ? "enabled" : "disabled"}`);
  }

  /** Registration order, which is also sampling order. */
  get samplerNames(): ReadonlyArray<string> {
    return [...this.samplers.keys()];
  }

  /** @throws Error when the name is already taken */
  addSampler(name: string, sampler: InputSampler<TTarget>): void {
    if (this.samplers.has(name)) {
      throw new Error(`Input sampler "${name}" is already registered`);
    }
    this.samplers.set(name, sampler);
  }

  getSampler(name: string): InputSampler<TTarget> | undefined {
    const sampler = this.samplers.get(name);
    if (sampler === undefined) {
      debugLog("manager", `no sampler named "${name}"`);
    }
    return sampler;
  }

  /** Unregister and dispose; pending waiters of the sampler are abandoned. */
  removeSampler(name: string): boolean {
    const sampler = this.samplers.get(name);
    if (sampler === undefined) return false;
    this.samplers.delete(name);
    sampler.dispose();
    return true;
  }

  /**
   * Sample every registered sampler, even when an earlier one throws, so all
   * of them see this tick's edges.
   * @throws The error of the only failing sampler, or an AggregateError when
   *   several fail
   */
  sampleAll(): void {
    if (!this.processing) return;
    const failures: Array<unknown> = [];
    for (const [name, sampler] of [...this.samplers]) {
      try {
        sampler.sample();
      } catch (error) {
        debugLog("manager", `sampler "${name}" threw while sampling`, error);
        failures.push(error);
      }
    }
    if (failures.length === 1) throw failures[0];
    if (failures.length > 1) {
      throw new AggregateError(
        failures,
        `${String(failures.length)} input samplers threw while sampling`,
      );
    }
  }
}

/** Build a manager with one sampler per configured binding. */
export function createInputManager<TTarget = unknown>(
  config: InputConfiguration,
  deps: InputSamplerDeps<TTarget>,
): InputManager<TTarget> {
  const manager = new InputManager<TTarget>();
  for (const entry of config.bindings) {
    const binding = createInputBinding({
      axes: entry.axes.map((a) =>
        createDeviceAxis(deps.device, a.axisName, {
          mode: a.mode,
          tolerance: a.tolerance,
        }),
      ),
      keys: entry.keys,
    });
    manager.addSampler(
      entry.name,
      new InputSampler<TTarget>(binding, deps, {
        name: entry.name,
        touchCooldownMs: config.touchCooldownMs,
      }),
    );
  }
  debugLog("manager", "samplers created", manager.samplerNames);
  return manager;
}
