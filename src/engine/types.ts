import { type PieceRandomGenerator } from "./core/rng/interface";
import { type Piece, type Playfield } from "./core/types";
import { type DurationMs, type Seed } from "../types/brands";

export * from "./core/types";
export { type PieceRandomGenerator } from "./core/rng/interface";

export type EngineConfig = Readonly<{
  cellSize: number;
  lockDelayMs: DurationMs;
  gravityIntervalsMs: ReadonlyArray<DurationMs>;
  linesPerLevel: number;
  seed: Seed;
}>;

// Paused is a flag over falling/lockPending so resume returns to the prior phase
export type Phase = "falling" | "lockPending" | "gameOver";

export type GameState = Readonly<{
  cfg: EngineConfig;
  playfield: Playfield;
  // Last element is the active piece; everything before it is locked
  pieces: ReadonlyArray<Piece>;
  phase: Phase;
  paused: boolean;
  ghostEnabled: boolean;
  debugOverlay: boolean;
  level: number;
  linesTowardLevel: number;
  totalLines: number;
  score: number;
  rng: PieceRandomGenerator;
}>;

export type StepResult<E> = { state: GameState; events: ReadonlyArray<E> };

export function isGameOver(state: GameState): boolean {
  return state.phase === "gameOver";
}

export function isLockPending(state: GameState): boolean {
  return state.phase === "lockPending";
}

/**
 * The active piece. An empty set outside of construction is a defect.
 */
export function activePiece(state: GameState): Piece {
  const piece = state.pieces[state.pieces.length - 1];
  if (piece === undefined) {
    throw new Error("Invariant violated: no active piece in the piece set");
  }
  return piece;
}

export function replaceActive(state: GameState, piece: Piece): GameState {
  if (state.pieces.length === 0) {
    throw new Error("Invariant violated: no active piece to replace");
  }
  return { ...state, pieces: [...state.pieces.slice(0, -1), piece] };
}

// Utility function for exhaustiveness checking
export function assertNever(x: never): never {
  throw new Error(`Unexpected value: ${String(x)}`);
}
