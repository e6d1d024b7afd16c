// Tests for @/engine/physics/gravity.ts - level-indexed gravity table
import {
  GRAVITY_INTERVALS_MS,
  gravityIntervalMs,
  maxLevelFor,
} from "@/engine/physics/gravity";
import { createDurationMs } from "@/types/brands";

describe("@/engine/physics/gravity - interval table", () => {
  test("fifteen levels from 800ms down to 15ms", () => {
    expect(GRAVITY_INTERVALS_MS).toEqual([
      800, 700, 600, 500, 400, 350, 300, 200, 150, 100, 75, 65, 50, 30, 15,
    ]);
    expect(maxLevelFor(GRAVITY_INTERVALS_MS)).toBe(14);
  });

  test("looks up by level", () => {
    expect(gravityIntervalMs(GRAVITY_INTERVALS_MS, 0)).toBe(800);
    expect(gravityIntervalMs(GRAVITY_INTERVALS_MS, 7)).toBe(200);
    expect(gravityIntervalMs(GRAVITY_INTERVALS_MS, 14)).toBe(15);
  });

  test("clamps out-of-range levels to the table ends", () => {
    expect(gravityIntervalMs(GRAVITY_INTERVALS_MS, 20)).toBe(15);
    expect(gravityIntervalMs(GRAVITY_INTERVALS_MS, -1)).toBe(800);
  });

  test("works with a custom table", () => {
    const table = [createDurationMs(500), createDurationMs(250)];

    expect(maxLevelFor(table)).toBe(1);
    expect(gravityIntervalMs(table, 3)).toBe(250);
  });
});
