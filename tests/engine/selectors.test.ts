// Tests for @/engine/selectors.ts - render snapshot and ghost projection
import {
  selectGhostRects,
  selectHud,
  selectRenderRects,
  selectSnapshot,
} from "@/engine/selectors";
import { setGhostEnabled } from "@/engine";

import {
  blockPiece,
  cells,
  createTestGameState,
  pieceAt,
} from "../test-helpers";

describe("@/engine/selectors", () => {
  const floor = blockPiece([cells(0, 18, 10, 2)], "L");
  const state = createTestGameState([floor, pieceAt("I", 0, 0)]);

  test("render rects list every rectangle with its piece color, active last", () => {
    expect(selectRenderRects(state)).toEqual([
      { color: "#0000FF", rect: { height: 60, width: 300, x: 0, y: 540 } },
      { color: "#FF0000", rect: { height: 30, width: 120, x: 90, y: 0 } },
    ]);
  });

  test("ghost is empty while disabled", () => {
    expect(selectGhostRects(state)).toEqual([]);
  });

  test("ghost projects the active piece onto the stack", () => {
    const ghosted = setGhostEnabled(state, true).state;

    expect(selectGhostRects(ghosted)).toEqual([
      { height: 30, width: 120, x: 90, y: 510 },
    ]);
  });

  test("ghost is empty after game over", () => {
    const over = { ...setGhostEnabled(state, true).state, phase: "gameOver" as const };

    expect(selectGhostRects(over)).toEqual([]);
  });

  test("hud reports level, score and total lines", () => {
    expect(selectHud({ ...state, level: 2, score: 450, totalLines: 31 })).toEqual({
      level: 2,
      lines: 31,
      score: 450,
    });
  });

  test("snapshot bundles everything the host draws", () => {
    const snap = selectSnapshot({ ...state, debugOverlay: true, paused: true });

    expect(snap).toEqual({
      debugOverlay: true,
      gameOver: false,
      ghost: [],
      hud: { level: 0, lines: 0, score: 0 },
      paused: true,
      phase: "falling",
      rects: selectRenderRects(state),
    });
  });
});
