import { collides } from "./board";
import { createPiece, piecesIntersect } from "./piece";

import type { PieceRandomGenerator } from "./rng/interface";
import type { Piece, Playfield } from "./types";

/**
 * Draw the next piece from the generator in its start pose.
 */
export function spawnRandomPiece(
  rng: PieceRandomGenerator,
  cellSize: number,
): { piece: Piece; rng: PieceRandomGenerator } {
  const { newRng, piece: id } = rng.getNextPiece();
  return { piece: createPiece(id, cellSize), rng: newRng };
}

/**
 * A spawn is blocked when the new piece overlaps the piece that just locked
 * (still last in the set) or collides with the rest of the board.
 */
export function isSpawnBlocked(
  playfield: Playfield,
  pieces: ReadonlyArray<Piece>,
  spawned: Piece,
): boolean {
  const last = pieces[pieces.length - 1];
  if (last !== undefined && piecesIntersect(spawned, last)) return true;
  return collides(playfield, pieces, spawned);
}
