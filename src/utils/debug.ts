// Lightweight, opt-in debug logging for the engine, the host and tests

// Topics can be enabled via:
// - the BRICKFALL_DEBUG environment variable: "true", "1", "on", or a comma list
//   of topics, e.g. BRICKFALL_DEBUG=lock,timers
// - configureDebug({ on: true }) or configureDebug({ lock: true }) at runtime

export const DEBUG_ENV_KEY = "BRICKFALL_DEBUG" as const;

export type DebugTopic = "engine" | "lock" | "timers" | "settings";

type DebugConfig = { on?: boolean } & Partial<Record<DebugTopic, boolean>>;

let runtimeConfig: DebugConfig | null = null;

/** Override the environment; pass null to fall back to it again. */
export function configureDebug(cfg: DebugConfig | null): void {
  runtimeConfig = cfg;
}

function readEnvTopics(): ReadonlyArray<string> {
  const raw = process.env[DEBUG_ENV_KEY];
  if (raw === undefined) return [];
  const v = raw.trim().toLowerCase();
  if (v === "1" || v === "true" || v === "on") return ["*"];
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function isDebugEnabled(topic?: DebugTopic): boolean {
  if (runtimeConfig !== null) {
    if (runtimeConfig.on === true) return true;
    if (topic !== undefined && runtimeConfig[topic] === true) return true;
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
