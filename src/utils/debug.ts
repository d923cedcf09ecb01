// Lightweight, opt-in debug logging utilities for Node hosts, browsers and tests

// Topics can be enabled via:
// - env var INPUT_SAMPLER_DEBUG with values: "true", "1", "on", or a comma list of topics
//   e.g. INPUT_SAMPLER_DEBUG=sampler,manager
// - globalThis.__INPUT_SAMPLER_DEBUG__ = { on: true } or { sampler: true, device: true }

type DebugConfig = { on?: boolean } & Record<string, boolean | undefined>;

export const DEBUG_TOPICS = ["sampler", "manager", "device"] as const;
export type DebugTopic = (typeof DEBUG_TOPICS)[number];

function isObject(u: unknown): u is Record<string, unknown> {
  return typeof u === "object" && u !== null;
}

function readGlobalDebug(): DebugConfig | null {
  const g = globalThis as { __INPUT_SAMPLER_DEBUG__?: unknown };
  const raw = g.__INPUT_SAMPLER_DEBUG__;
  if (!isObject(raw)) return null;
  const cfg: DebugConfig = { on: raw["on"] === true };
  for (const k of DEBUG_TOPICS) {
    cfg[k] = raw[k] === true;
  }
  return cfg;
}

function readEnvTopics(): ReadonlyArray<string> {
  if (typeof process === "undefined") return [];
  const raw = process.env["INPUT_SAMPLER_DEBUG"];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  const globalCfg = readGlobalDebug();
  if (globalCfg !== null && globalCfg.on === true) return true;
  if (topic !== undefined && globalCfg !== null && globalCfg[topic] === true) {
    return true;
  }
  const topics = readEnvTopics();
  if (topics.length === 0) return false;
  if (topics.includes("*")) return true;
  if (topic !== undefined) return topics.includes(topic);
  return true;
}

export function debugLog(
  topic: DebugTopic,
  message: string,
  data?: unknown,
): void {
  if (!isDebugEnabled(topic)) return;
  if (data !== undefined) {
    console.warn(`[DBG:${topic}] ${message}`, data);
  } else {
    console.warn(`[DBG:${topic}] ${message}`);
  }
}
