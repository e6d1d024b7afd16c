import { PIECES } from "./pieces";
import { rectBottom, rectRight, rectsIntersect, translateRect } from "./rect";

import type {
  Piece,
  PieceId,
  Rect,
  RotationArm,
  RotationTransform,
} from "./types";

/**
 * Create a piece in its canonical start pose, scaled to pixels.
 */
export function createPiece(id: PieceId, cellSize: number): Piece {
  const shape = PIECES[id];
  if (shape.arms.length > shape.spawnRects.length) {
    throw new Error(`Invariant violated: piece ${id} has more arms than rects`);
  }
  return {
    arms: shape.arms.map((transforms) => ({ index: 0, transforms })),
    color: shape.color,
    id,
    rects: shape.spawnRects.map(([x, y, width, height]) => ({
      height: height * cellSize,
      width: width * cellSize,
      x: x * cellSize,
      y: y * cellSize,
    })),
  };
}

export function movePiece(piece: Piece, dx: number, dy: number): Piece {
  return { ...piece, rects: piece.rects.map((r) => translateRect(r, dx, dy)) };
}

function transformAt(arm: RotationArm, index: number): RotationTransform {
  const tr = arm.transforms[index];
  if (tr === undefined) {
    throw new Error(`Unexpected: rotation index ${String(index)} out of range`);
  }
  return tr;
}

function applyArms(
  piece: Piece,
  step: (arm: RotationArm, rect: Rect, cellSize: number) => [RotationArm, Rect],
  cellSize: number,
): Piece {
  if (piece.arms.length === 0) return piece;
  const rects = [...piece.rects];
  const arms = piece.arms.map((arm, i) => {
    const rect = rects[i];
    if (rect === undefined) {
      throw new Error(`Invariant violated: arm ${String(i)} has no rectangle`);
    }
    const [nextArm, nextRect] = step(arm, rect, cellSize);
    rects[i] = nextRect;
    return nextArm;
  });
  return { ...piece, arms, rects };
}

/**
 * Clockwise: advance every arm and apply the new entry's translation and size.
 */
export function rotatePieceCW(piece: Piece, cellSize: number): Piece {
  return applyArms(
    piece,
    (arm, rect, cell) => {
      const index = (arm.index + 1) % arm.transforms.length;
      const tr = transformAt(arm, index);
      return [
        { ...arm, index },
        {
          height: tr.height * cell,
          width: tr.width * cell,
          x: rect.x + tr.dx * cell,
          y: rect.y + tr.dy * cell,
        },
      ];
    },
    cellSize,
  );
}

/**
 * Counter-clockwise: undo the current entry's translation, step back, and take
 * the size from the previous entry. Translation and size live on different
 * entries of the cycle, so this pairing is what makes CW then CCW an identity.
 */
export function rotatePieceCCW(piece: Piece, cellSize: number): Piece {
  return applyArms(
    piece,
    (arm, rect, cell) => {
      const current = transformAt(arm, arm.index);
      const len = arm.transforms.length;
      const index = (arm.index - 1 + len) % len;
      const previous = transformAt(arm, index);
      return [
        { ...arm, index },
        {
          height: previous.height * cell,
          width: previous.width * cell,
          x: rect.x - current.dx * cell,
          y: rect.y - current.dy * cell,
        },
      ];
    },
    cellSize,
  );
}

// Bounding edges across all rectangles of a piece
export function pieceBounds(piece: Piece): {
  left: number;
  top: number;
  right: number;
  bottom: number;
} {
  let left = Number.POSITIVE_INFINITY;
  let top = Number.POSITIVE_INFINITY;
  let right = Number.NEGATIVE_INFINITY;
  let bottom = Number.NEGATIVE_INFINITY;
  for (const r of piece.rects) {
    left = Math.min(left, r.x);
    top = Math.min(top, r.y);
    right = Math.max(right, rectRight(r));
    bottom = Math.max(bottom, rectBottom(r));
  }
  return { bottom, left, right, top };
}

export function piecesIntersect(a: Piece, b: Piece): boolean {
  return a.rects.some((ra) => b.rects.some((rb) => rectsIntersect(ra, rb)));
}
