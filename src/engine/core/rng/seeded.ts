import { type PieceRandomGenerator } from "./interface";
import { PIECE_IDS, type PieceId } from "../types";

// Simple seedable RNG state
export type UniformRng = {
  seed: string;
  internalSeed: number;
};

// Create initial RNG state
export function createRng(seed = "default"): UniformRng {
  return {
    internalSeed: hashString(seed),
    seed,
  };
}

// Simple string hash (FNV-1a, 32-bit) for stable seeds
function hashString(str: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < str.length; i++) {
    h ^= str.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0; // unsigned 32-bit
}

// Simple PRNG (Linear Congruential Generator)
function nextRandom(seed: number): number {
  return (seed * 1664525 + 1013904223) % 2 ** 32;
}

// Draw one of the seven pieces with equal probability
export function getNextPiece(rng: UniformRng): {
  piece: PieceId;
  newRng: UniformRng;
} {
  const internalSeed = nextRandom(rng.internalSeed);
  // Use high bits mapped to [0, 7) to reduce modulo bias
  const index = Math.floor((internalSeed / 4294967296) * PIECE_IDS.length);
  const piece = PIECE_IDS[index];
  if (piece === undefined) {
    throw new Error(`Unexpected: piece index ${String(index)} out of range`);
  }
  return { newRng: { ...rng, internalSeed }, piece };
}

/**
 * Wrapper class that implements PieceRandomGenerator interface for UniformRng
 */
export class UniformRngImpl implements PieceRandomGenerator {
  constructor(private readonly state: UniformRng) {}

  getNextPiece(): {
    piece: PieceId;
    newRng: PieceRandomGenerator;
  } {
    const result = getNextPiece(this.state);
    return {
      newRng: new UniformRngImpl(result.newRng),
      piece: result.piece,
    };
  }
}

/**
 * Create a new uniform generator with the interface
 */
export function createUniformRng(seed = "default"): PieceRandomGenerator {
  return new UniformRngImpl(createRng(seed));
}
