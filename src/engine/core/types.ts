// Board dimensions
export const BOARD_WIDTH = 10 as const;
export const BOARD_HEIGHT = 20 as const;
export const BOARD_CELLS = 200 as const; // BOARD_WIDTH * BOARD_HEIGHT

// Shape ids in catalog order: I, O, T, S, Z, J, L
export type ShapeId = 0 | 1 | 2 | 3 | 4 | 5 | 6;
export type ShapeName = "I" | "O" | "T" | "S" | "Z" | "J" | "L";
export const SHAPE_NAMES: ReadonlyArray<ShapeName> = [
  "I",
  "O",
  "T",
  "S",
  "Z",
  "J",
  "L",
] as const;
export const SHAPE_COUNT = 7 as const;

export type Rotation = 0 | 1 | 2 | 3;
export type BlockIndex = 0 | 1 | 2 | 3;

// Cell values - 0=empty, 1-7=locked shape id + 1 (also the color index)
declare const CellValueBrand: unique symbol;
export type CellValue = (0 | 1 | 2 | 3 | 4 | 5 | 6 | 7) & {
  readonly [CellValueBrand]: true;
};

export function isShapeId(n: unknown): n is ShapeId {
  return typeof n === "number" && Number.isInteger(n) && n >= 0 && n < 7;
}

export function assertShapeId(n: unknown): asserts n is ShapeId {
  if (!isShapeId(n)) throw new Error(`Not a valid ShapeId: ${String(n)}`);
}

export function isRotation(n: unknown): n is Rotation {
  return typeof n === "number" && Number.isInteger(n) && n >= 0 && n < 4;
}

export function assertRotation(n: unknown): asserts n is Rotation {
  if (!isRotation(n)) throw new Error(`Not a valid Rotation: ${String(n)}`);
}

export function isBlockIndex(n: unknown): n is BlockIndex {
  return typeof n === "number" && Number.isInteger(n) && n >= 0 && n < 4;
}

export function assertBlockIndex(n: unknown): asserts n is BlockIndex {
  if (!isBlockIndex(n)) throw new Error(`Not a valid BlockIndex: ${String(n)}`);
}

// CellValue constructor
export function createCellValue(value: number): CellValue {
  if (!Number.isInteger(value) || value < 0 || value > 7) {
    throw new Error("CellValue must be an integer from 0 to 7");
  }
  return value as CellValue;
}

export const EMPTY_CELL = createCellValue(0);
// Sentinel reported for coordinates outside the grid
export const OCCUPIED_SENTINEL = createCellValue(1);

export function cellValueForShape(shape: ShapeId): CellValue {
  return createCellValue(shape + 1);
}

export function nextRotation(rotation: Rotation): Rotation {
  const next = (rotation + 1) % 4;
  assertRotation(next);
  return next;
}

// Board storage with enforced dimensions
declare const BoardCellsBrand: unique symbol;
export type BoardCells = Uint8Array & { readonly length: 200 } & {
  readonly [BoardCellsBrand]: true;
};

export function createBoardCells(): BoardCells {
  return new Uint8Array(BOARD_CELLS) as BoardCells;
}

export function copyBoardCells(cells: BoardCells): BoardCells {
  return Uint8Array.from(cells) as BoardCells;
}

export type Board = Readonly<{
  width: 10;
  height: 20;
  cells: BoardCells; // exactly 200 cells (20×10), row 0 at the top
}>;

export function isInBounds(x: number, y: number): boolean {
  return x >= 0 && x < BOARD_WIDTH && y >= 0 && y < BOARD_HEIGHT;
}

// Row-major storage index; callers check bounds first
export function idx(x: number, y: number): number {
  return y * BOARD_WIDTH + x;
}

export type BlockOffset = readonly [dx: number, dy: number];

export type ActivePiece = Readonly<{
  shape: ShapeId;
  x: number;
  y: number; // may be negative while partially above the board
  rotation: Rotation;
}>;
