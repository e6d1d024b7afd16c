import { createPiece } from "./core/piece";
import { replaceActive } from "./types";

import type {
  GameState,
  Piece,
  PieceId,
  PieceRandomGenerator,
} from "./types";

/**
 * Pure helpers that set up GameState for scenarios and tests.
 * These DO NOT represent normal gameplay and never emit events.
 */

export type EngineOp = (s: GameState) => GameState;

/** Replace the whole piece set; the last element becomes the active piece. */
export function withPieces(pieces: ReadonlyArray<Piece>): EngineOp {
  return (s) => {
    if (pieces.length === 0) {
      throw new Error("withPieces needs at least the active piece");
    }
    return { ...s, pieces: [...pieces] };
  };
}

/** Swap the active piece for a fresh one of the given kind in its start pose. */
export function forceActive(id: PieceId): EngineOp {
  return (s) => replaceActive(s, createPiece(id, s.playfield.cellSize));
}

export function withRng(rng: PieceRandomGenerator): EngineOp {
  return (s) => ({ ...s, rng });
}

export function applyOps(s: GameState, ops: ReadonlyArray<EngineOp>): GameState {
  return ops.reduce((acc, op) => op(acc), s);
}
