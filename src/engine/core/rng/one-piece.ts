import { type PieceRandomGenerator } from "./interface";
import { type PieceId } from "../types";

/**
 * RNG that always returns the same piece.
 * Useful for tests and deterministic scenarios.
 */
export class OnePieceRng implements PieceRandomGenerator {
  constructor(private readonly piece: PieceId) {}

  getNextPiece(): { piece: PieceId; newRng: PieceRandomGenerator } {
    return { newRng: this, piece: this.piece };
  }
}
