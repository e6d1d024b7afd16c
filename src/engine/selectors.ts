import { dropToBottom } from "./core/board";
import { activePiece, isGameOver } from "./types";

import type { GameState, Phase, PieceColor, Rect } from "./types";

export type RenderRect = Readonly<{ rect: Rect; color: PieceColor }>;

export type Hud = Readonly<{ level: number; score: number; lines: number }>;

export type Snapshot = Readonly<{
  rects: ReadonlyArray<RenderRect>;
  ghost: ReadonlyArray<Rect>;
  hud: Hud;
  phase: Phase;
  paused: boolean;
  debugOverlay: boolean;
  gameOver: boolean;
}>;

// Every rectangle of every piece, locked ones first, active last
export const selectRenderRects = (s: GameState): ReadonlyArray<RenderRect> =>
  s.pieces.flatMap((piece) =>
    piece.rects.map((rect) => ({ color: piece.color, rect })),
  );

/**
 * Active piece projected to where a hard drop would leave it.
 */
export function selectGhostRects(s: GameState): ReadonlyArray<Rect> {
  if (!s.ghostEnabled || isGameOver(s)) return [];
  return dropToBottom(s.playfield, s.pieces, activePiece(s)).rects;
}

export const selectHud = (s: GameState): Hud => ({
  level: s.level,
  lines: s.totalLines,
  score: s.score,
});

export const selectSnapshot = (s: GameState): Snapshot => ({
  debugOverlay: s.debugOverlay,
  gameOver: isGameOver(s),
  ghost: selectGhostRects(s),
  hud: selectHud(s),
  paused: s.paused,
  phase: s.phase,
  rects: selectRenderRects(s),
});
