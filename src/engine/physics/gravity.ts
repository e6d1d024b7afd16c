import { createDurationMs, type DurationMs } from "../../types/brands";

// Milliseconds between gravity steps, indexed by level (0 = slowest)
export const GRAVITY_INTERVALS_MS: ReadonlyArray<DurationMs> = [
  800, 700, 600, 500, 400, 350, 300, 200, 150, 100, 75, 65, 50, 30, 15,
].map(createDurationMs);

export function maxLevelFor(intervals: ReadonlyArray<DurationMs>): number {
  return Math.max(0, intervals.length - 1);
}

/**
 * Gravity interval for a level, clamped to the last table entry.
 */
export function gravityIntervalMs(
  intervals: ReadonlyArray<DurationMs>,
  level: number,
): DurationMs {
  const clamped = Math.min(Math.max(0, level), maxLevelFor(intervals));
  const interval = intervals[clamped];
  if (interval === undefined) {
    throw new Error("Unexpected: empty gravity interval table");
  }
  return interval;
}
