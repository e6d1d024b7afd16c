// Board dimensions in cells; pixel sizes derive from the configured cell side
export const BOARD_WIDTH = 10 as const;
export const BOARD_HEIGHT = 20 as const;
export const DEFAULT_CELL_SIZE = 30 as const;

// Axis-aligned rectangle in pixels. Edges are exclusive: right = x + width.
export type Rect = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type Playfield = Readonly<{
  width: number; // BOARD_WIDTH * cellSize
  height: number; // BOARD_HEIGHT * cellSize
  cellSize: number;
}>;

export function createPlayfield(cellSize: number = DEFAULT_CELL_SIZE): Playfield {
  if (!Number.isInteger(cellSize) || cellSize <= 0) {
    throw new Error("cellSize must be a positive integer");
  }
  return {
    cellSize,
    height: BOARD_HEIGHT * cellSize,
    width: BOARD_WIDTH * cellSize,
  };
}

// Pieces and rotation
export type PieceId = "Z" | "I" | "O" | "S" | "T" | "J" | "L";

export const PIECE_IDS: ReadonlyArray<PieceId> = [
  "Z",
  "I",
  "S",
  "O",
  "T",
  "J",
  "L",
];

// Hex color tag, one per piece type
export type PieceColor =
  | "#FFA500"
  | "#FF0000"
  | "#00FFFF"
  | "#FFFF00"
  | "#00FF00"
  | "#FF00FF"
  | "#0000FF";

// One rotation step for a single rectangle, in cells: translation + new size
export type RotationTransform = Readonly<{
  dx: number;
  dy: number;
  width: number;
  height: number;
}>;

// Circular transform sequence with an explicit bounded index
export type RotationArm = Readonly<{
  transforms: ReadonlyArray<RotationTransform>;
  index: number;
}>;

// Start-pose rectangle in cells: [x, y, width, height]
export type CellRect = readonly [number, number, number, number];

export type PieceDescriptor = Readonly<{
  id: PieceId;
  color: PieceColor;
  spawnRects: ReadonlyArray<CellRect>;
  // arms[i] drives spawnRects[i]; an empty list means the shape never rotates
  arms: ReadonlyArray<ReadonlyArray<RotationTransform>>;
}>;

export type Piece = Readonly<{
  id: PieceId;
  color: PieceColor;
  rects: ReadonlyArray<Rect>;
  arms: ReadonlyArray<RotationArm>;
}>;

// Full-width, one-cell-tall strip identified by its top edge
export type Line = Readonly<{ y: number }>;
