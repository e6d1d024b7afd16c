export * from "./engine";
export type { Command, CommandKind } from "./engine/commands";
export type { EngineEvent, TimerKind } from "./engine/events";
export {
  createEngineConfig,
  createInitialState,
  defaultEngineConfig,
} from "./engine/init";
export * from "./engine/selectors";
export * from "./engine/ops";
export * from "./engine/types";
export { PIECES } from "./engine/core/pieces";
export {
  createPiece,
  movePiece,
  rotatePieceCCW,
  rotatePieceCW,
} from "./engine/core/piece";
export {
  clearLines,
  collides,
  dropDistance,
  dropToBottom,
  findFilledLines,
} from "./engine/core/board";
export { spawnRandomPiece } from "./engine/core/spawning";
export { createUniformRng } from "./engine/core/rng/seeded";
export { SequenceRng } from "./engine/core/rng/sequence";
export { OnePieceRng } from "./engine/core/rng/one-piece";
export { scoreForLines } from "./engine/scoring/score";
export { advanceLevel } from "./engine/scoring/level";
export { GRAVITY_INTERVALS_MS, gravityIntervalMs } from "./engine/physics/gravity";
export { GameHost } from "./runtime/host";
export type { GameHostOptions, GameOverSummary, HostListeners } from "./runtime/host";
export { ghostPreference, loadSettings, parseSettings, toEngineConfig } from "./app/settings";
export type { Settings } from "./app/settings";
export { configureDebug, debugLog } from "./utils/debug";
export * from "./types/brands";
