import type { Rect } from "./types";

export const rectRight = (r: Rect): number => r.x + r.width;
export const rectBottom = (r: Rect): number => r.y + r.height;

export function isEmptyRect(r: Rect): boolean {
  return r.width <= 0 || r.height <= 0;
}

// Exact overlap; touching edges do not intersect
export function rectsIntersect(a: Rect, b: Rect): boolean {
  if (isEmptyRect(a) || isEmptyRect(b)) return false;
  return (
    a.x < rectRight(b) &&
    b.x < rectRight(a) &&
    a.y < rectBottom(b) &&
    b.y < rectBottom(a)
  );
}

/**
 * Overlapping region of two rectangles, or null when they do not intersect.
 */
export function intersectRects(a: Rect, b: Rect): Rect | null {
  if (!rectsIntersect(a, b)) return null;
  const x = Math.max(a.x, b.x);
  const y = Math.max(a.y, b.y);
  return {
    height: Math.min(rectBottom(a), rectBottom(b)) - y,
    width: Math.min(rectRight(a), rectRight(b)) - x,
    x,
    y,
  };
}

export function translateRect(r: Rect, dx: number, dy: number): Rect {
  return { ...r, x: r.x + dx, y: r.y + dy };
}
