import { movePiece, pieceBounds, piecesIntersect } from "./piece";
import { intersectRects, rectsIntersect, translateRect } from "./rect";

import type { Line, Piece, Playfield, Rect } from "./types";

/**
 * Locked pieces of an ordered set: everything but the last (active) element.
 */
export function lockedPieces(pieces: ReadonlyArray<Piece>): ReadonlyArray<Piece> {
  return pieces.slice(0, -1);
}

/**
 * True when the candidate leaves the playfield through the bottom or the sides,
 * or overlaps a locked piece. The top edge is open so pieces can rotate while
 * still partly above row 0.
 */
export function collides(
  playfield: Playfield,
  pieces: ReadonlyArray<Piece>,
  candidate: Piece,
): boolean {
  const b = pieceBounds(candidate);
  if (b.bottom > playfield.height || b.left < 0 || b.right > playfield.width) {
    return true;
  }
  return lockedPieces(pieces).some((p) => piecesIntersect(p, candidate));
}

// Move the piece down until the next step would collide
export function dropToBottom(
  playfield: Playfield,
  pieces: ReadonlyArray<Piece>,
  piece: Piece,
): Piece {
  let current = piece;
  for (;;) {
    const next = movePiece(current, 0, playfield.cellSize);
    if (collides(playfield, pieces, next)) return current;
    current = next;
  }
}

export function dropDistance(
  playfield: Playfield,
  pieces: ReadonlyArray<Piece>,
  piece: Piece,
): number {
  const dropped = dropToBottom(playfield, pieces, piece);
  return (pieceBounds(dropped).top - pieceBounds(piece).top) / playfield.cellSize;
}

function lineStrip(playfield: Playfield, line: Line): Rect {
  return { height: playfield.cellSize, width: playfield.width, x: 0, y: line.y };
}

function filledWidth(
  playfield: Playfield,
  pieces: ReadonlyArray<Piece>,
  line: Line,
): number {
  const strip = lineStrip(playfield, line);
  let width = 0;
  for (const piece of pieces) {
    for (const rect of piece.rects) {
      width += intersectRects(strip, rect)?.width ?? 0;
    }
  }
  return width;
}

/**
 * Full rows, bottom row first. Every row inside the board is scanned; above
 * the board the scan goes on only while rows still hold something.
 */
export function findFilledLines(
  playfield: Playfield,
  pieces: ReadonlyArray<Piece>,
): Array<Line> {
  const filled: Array<Line> = [];
  for (let y = playfield.height - playfield.cellSize; ; y -= playfield.cellSize) {
    const width = filledWidth(playfield, pieces, { y });
    if (width === playfield.width) filled.push({ y });
    if (width === 0 && y <= 0) break;
  }
  return filled;
}

/**
 * Remove the given lines from every piece, drop emptied rectangles and pieces,
 * then shift down each rectangle once per cleared line at or below its top.
 * Lines are taken at their pre-clear positions.
 */
export function clearLines(
  playfield: Playfield,
  lines: ReadonlyArray<Line>,
  pieces: ReadonlyArray<Piece>,
): Array<Piece> {
  if (lines.length === 0) return [...pieces];
  const cell = playfield.cellSize;

  let shrunk: Array<Piece> = [...pieces];
  for (const line of lines) {
    const strip = lineStrip(playfield, line);
    shrunk = shrunk.map((piece) => ({
      ...piece,
      rects: piece.rects
        .map((r) => (rectsIntersect(strip, r) ? { ...r, height: r.height - cell } : r))
        .filter((r) => r.height > 0),
    }));
  }

  return shrunk
    .filter((piece) => piece.rects.length > 0)
    .map((piece) => ({
      ...piece,
      rects: piece.rects.map((r) => {
        const below = lines.filter((line) => r.y <= line.y).length;
        return below > 0 ? translateRect(r, 0, below * cell) : r;
      }),
    }));
}
