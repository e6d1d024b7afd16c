import type {
  PieceDescriptor,
  PieceId,
  RotationTransform,
} from "./types";

const t = (
  dx: number,
  dy: number,
  width: number,
  height: number,
): RotationTransform => ({ dx, dy, height, width });

// Vertical/horizontal flip shared by the three-wide bar of T, J and L
const BAR3_ARM = [t(-1, 1, 3, 1), t(1, -1, 1, 3)] as const;

/**
 * Piece catalog. Spawn rectangles are in cells relative to the playfield's
 * top-left corner; transform index 0 describes the spawn pose.
 */
export const PIECES: Readonly<Record<PieceId, PieceDescriptor>> = {
  I: {
    arms: [[t(-3, 2, 4, 1), t(3, -2, 1, 4)]],
    color: "#FF0000",
    id: "I",
    spawnRects: [[3, 0, 4, 1]],
  },
  J: {
    arms: [
      [t(0, -2, 1, 1), t(2, 0, 1, 1), t(0, 2, 1, 1), t(-2, 0, 1, 1)],
      BAR3_ARM,
    ],
    color: "#FF00FF",
    id: "J",
    spawnRects: [
      [3, 0, 1, 1],
      [3, 1, 3, 1],
    ],
  },
  L: {
    arms: [
      [t(2, 0, 1, 1), t(0, 2, 1, 1), t(-2, 0, 1, 1), t(0, -2, 1, 1)],
      BAR3_ARM,
    ],
    color: "#0000FF",
    id: "L",
    spawnRects: [
      [5, 0, 1, 1],
      [3, 1, 3, 1],
    ],
  },
  O: {
    arms: [],
    color: "#00FFFF",
    id: "O",
    spawnRects: [[4, 0, 2, 2]],
  },
  S: {
    arms: [
      [t(0, 1, 2, 1), t(0, -1, 1, 2)],
      [t(-2, 1, 2, 1), t(2, -1, 1, 2)],
    ],
    color: "#FFFF00",
    id: "S",
    spawnRects: [
      [4, 0, 2, 1],
      [3, 1, 2, 1],
    ],
  },
  T: {
    arms: [
      [t(1, -1, 1, 1), t(1, 1, 1, 1), t(-1, 1, 1, 1), t(-1, -1, 1, 1)],
      BAR3_ARM,
    ],
    color: "#00FF00",
    id: "T",
    spawnRects: [
      [4, 0, 1, 1],
      [3, 1, 3, 1],
    ],
  },
  Z: {
    arms: [
      [t(-2, 1, 2, 1), t(2, -1, 1, 2)],
      [t(0, 1, 2, 1), t(0, -1, 1, 2)],
    ],
    color: "#FFA500",
    id: "Z",
    spawnRects: [
      [3, 0, 2, 1],
      [4, 1, 2, 1],
    ],
  },
};
