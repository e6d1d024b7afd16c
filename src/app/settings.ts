// Settings file: JSON on disk mapped to engine config overrides and host
// preferences. Bad or missing entries fall back to defaults.

import { readFileSync } from "node:fs";

import { createEngineConfig } from "../engine/init";
import { createDurationMs, createSeed } from "../types/brands";
import { debugLog } from "../utils/debug";

import type { EngineConfig } from "../engine/types";

export type Settings = Partial<{
  cellSize: number;
  lockDelayMs: number;
  gravityIntervalsMs: ReadonlyArray<number>;
  linesPerLevel: number;
  seed: string;
  ghostPieceEnabled: boolean;
}>;

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function isNumber(x: unknown): x is number {
  return typeof x === "number" && Number.isFinite(x);
}

function isPositiveInteger(x: unknown): x is number {
  return isNumber(x) && Number.isInteger(x) && x > 0;
}

function isBoolean(x: unknown): x is boolean {
  return typeof x === "boolean";
}

function isIntervalTable(x: unknown): x is ReadonlyArray<number> {
  return (
    Array.isArray(x) &&
    x.length > 0 &&
    x.every((v: unknown) => isNumber(v) && v > 0)
  );
}

function rejected(key: string, value: unknown): void {
  debugLog("settings", `ignoring invalid ${key}`, value);
}

function extractTiming(t: Record<string, unknown>, out: Settings): void {
  const lock = t["lockDelayMs"];
  if (isNumber(lock) && lock >= 0) out.lockDelayMs = lock;
  else if (lock !== undefined) rejected("lockDelayMs", lock);

  const intervals = t["gravityIntervalsMs"];
  if (isIntervalTable(intervals)) out.gravityIntervalsMs = [...intervals];
  else if (intervals !== undefined) rejected("gravityIntervalsMs", intervals);
}

function extractGameplay(g: Record<string, unknown>, out: Settings): void {
  for (const k of ["cellSize", "linesPerLevel"] as const) {
    const v = g[k];
    if (isPositiveInteger(v)) out[k] = v;
    else if (v !== undefined) rejected(k, v);
  }

  const seed = g["seed"];
  if (typeof seed === "string" && seed.length > 0) out.seed = seed;
  else if (seed !== undefined) rejected("seed", seed);

  const ghost = g["ghostPieceEnabled"];
  if (isBoolean(ghost)) out.ghostPieceEnabled = ghost;
  else if (ghost !== undefined) rejected("ghostPieceEnabled", ghost);
}

/**
 * Read settings from an already-parsed JSON value. Accepts the nested shape
 * `{ timing: {...}, gameplay: {...} }` and, when neither section is present,
 * the same keys flat at the top level.
 */
export function parseSettings(raw: unknown): Settings {
  if (!isRecord(raw)) {
    rejected("settings root", raw);
    return {};
  }
  const out: Settings = {};
  const timing = raw["timing"];
  const gameplay = raw["gameplay"];
  if (isRecord(timing) || isRecord(gameplay)) {
    extractTiming(isRecord(timing) ? timing : {}, out);
    extractGameplay(isRecord(gameplay) ? gameplay : {}, out);
    return out;
  }
  extractTiming(raw, out);
  extractGameplay(raw, out);
  return out;
}

export function loadSettings(path: string): Settings {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    debugLog("settings", `cannot read ${path}, using defaults`, err);
    return {};
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parseSettings(parsed);
  } catch (err) {
    debugLog("settings", `malformed JSON in ${path}, using defaults`, err);
    return {};
  }
}

export function toEngineConfig(settings: Settings): EngineConfig {
  const overrides: Partial<{ -readonly [K in keyof EngineConfig]: EngineConfig[K] }> =
    {};
  if (settings.cellSize !== undefined) overrides.cellSize = settings.cellSize;
  if (settings.linesPerLevel !== undefined) {
    overrides.linesPerLevel = settings.linesPerLevel;
  }
  if (settings.lockDelayMs !== undefined) {
    overrides.lockDelayMs = createDurationMs(settings.lockDelayMs);
  }
  if (settings.gravityIntervalsMs !== undefined) {
    overrides.gravityIntervalsMs = settings.gravityIntervalsMs.map((ms) =>
      createDurationMs(ms),
    );
  }
  if (settings.seed !== undefined) overrides.seed = createSeed(settings.seed);
  return createEngineConfig(overrides);
}

export function ghostPreference(settings: Settings): boolean {
  return settings.ghostPieceEnabled ?? false;
}
