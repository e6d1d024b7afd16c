import { createPlayfield, DEFAULT_CELL_SIZE } from "./core/types";
import { createUniformRng } from "./core/rng/seeded";
import { spawnRandomPiece } from "./core/spawning";
import { GRAVITY_INTERVALS_MS } from "./physics/gravity";
import { DEFAULT_LINES_PER_LEVEL } from "./scoring/level";
import {
  createDurationMs,
  createSeed,
  seedAsString,
} from "../types/brands";

import type { EngineConfig, GameState, PieceRandomGenerator } from "./types";

export const defaultEngineConfig: EngineConfig = {
  cellSize: DEFAULT_CELL_SIZE,
  gravityIntervalsMs: GRAVITY_INTERVALS_MS,
  linesPerLevel: DEFAULT_LINES_PER_LEVEL,
  lockDelayMs: createDurationMs(500),
  seed: createSeed("default"),
};

export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const cfg = { ...defaultEngineConfig, ...overrides };
  if (cfg.gravityIntervalsMs.length === 0) {
    throw new Error("gravityIntervalsMs must hold at least one interval");
  }
  if (cfg.gravityIntervalsMs.some((ms) => ms <= 0)) {
    throw new Error("gravityIntervalsMs entries must be positive");
  }
  if (!Number.isInteger(cfg.linesPerLevel) || cfg.linesPerLevel <= 0) {
    throw new Error("linesPerLevel must be a positive integer");
  }
  return cfg;
}

/**
 * Fresh session: empty board with one spawned piece, counters at zero.
 * The generator defaults to a uniform one seeded from the config.
 */
export function createInitialState(
  cfg: EngineConfig = defaultEngineConfig,
  rng: PieceRandomGenerator = createUniformRng(seedAsString(cfg.seed)),
): GameState {
  const playfield = createPlayfield(cfg.cellSize);
  const spawned = spawnRandomPiece(rng, playfield.cellSize);
  return {
    cfg,
    debugOverlay: false,
    ghostEnabled: false,
    level: 0,
    linesTowardLevel: 0,
    paused: false,
    phase: "falling",
    pieces: [spawned.piece],
    playfield,
    rng: spawned.rng,
    score: 0,
    totalLines: 0,
  };
}
