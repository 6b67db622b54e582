import { pieceCells } from "./pieces";
import {
  type ActivePiece,
  type Board,
  type CellValue,
  type Rotation,
  type ShapeId,
  BOARD_HEIGHT,
  BOARD_WIDTH,
  EMPTY_CELL,
  OCCUPIED_SENTINEL,
  cellValueForShape,
  copyBoardCells,
  createBoardCells,
  createCellValue,
  idx,
  isInBounds,
} from "./types";

export function createEmptyBoard(): Board {
  return {
    cells: createBoardCells(),
    height: BOARD_HEIGHT,
    width: BOARD_WIDTH,
  };
}

// Out-of-bounds reads report occupied so walls and floor collide like cells
export function getCell(board: Board, x: number, y: number): CellValue {
  if (!isInBounds(x, y)) return OCCUPIED_SENTINEL;
  return createCellValue(board.cells[idx(x, y)] ?? 0);
}

// Returns the same board when (x, y) is outside the grid
export function setCell(
  board: Board,
  x: number,
  y: number,
  value: CellValue,
): Board {
  if (!isInBounds(x, y)) return board;
  const cells = copyBoardCells(board.cells);
  cells[idx(x, y)] = value;
  return { ...board, cells };
}

export function isOccupied(board: Board, x: number, y: number): boolean {
  return getCell(board, x, y) !== EMPTY_CELL;
}

/**
 * True when any block of the shape at (x, y, rotation) leaves the side walls,
 * passes the floor, or overlaps a locked cell. Blocks above the board (y < 0)
 * only check the side walls, so pieces can spawn and rotate partly off the top.
 */
export function checkCollision(
  board: Board,
  shape: ShapeId,
  x: number,
  y: number,
  rotation: Rotation,
): boolean {
  for (const [dx, dy] of pieceCells(shape, rotation)) {
    const bx = x + dx;
    const by = y + dy;

    if (bx < 0 || bx >= board.width) return true;
    if (by >= board.height) return true;
    if (by >= 0 && isOccupied(board, bx, by)) return true;
  }
  return false;
}

export function pieceCollides(board: Board, piece: ActivePiece): boolean {
  return checkCollision(board, piece.shape, piece.x, piece.y, piece.rotation);
}

// Lowest row the piece can occupy by falling straight down from its origin
export function restingRow(board: Board, piece: ActivePiece): number {
  let y = piece.y;
  while (!checkCollision(board, piece.shape, piece.x, y + 1, piece.rotation)) {
    y++;
  }
  return y;
}

// Write shape id + 1 into each block's cell; blocks above the board are skipped
export function lockPiece(board: Board, piece: ActivePiece): Board {
  const cells = copyBoardCells(board.cells);
  const value = cellValueForShape(piece.shape);

  for (const [dx, dy] of pieceCells(piece.shape, piece.rotation)) {
    const x = piece.x + dx;
    const y = piece.y + dy;
    if (!isInBounds(x, y)) continue;
    cells[idx(x, y)] = value;
  }

  return { ...board, cells };
}

export function isRowComplete(board: Board, row: number): boolean {
  if (row < 0 || row >= board.height) return false;
  for (let x = 0; x < board.width; x++) {
    if (board.cells[idx(x, row)] === 0) return false;
  }
  return true;
}

/**
 * Remove every complete row, shifting the rows above it down by one and
 * emptying the top row. Scans bottom to top and re-examines a row index after
 * clearing it, since the row above has just moved into it.
 */
export function clearLines(board: Board): { board: Board; cleared: number } {
  const cells = copyBoardCells(board.cells);
  const scratch: Board = { ...board, cells };
  let cleared = 0;
  let row = board.height - 1;

  while (row >= 0) {
    if (!isRowComplete(scratch, row)) {
      row--;
      continue;
    }

    // Shift rows [0, row) down by one
    cells.copyWithin(idx(0, 1), idx(0, 0), idx(0, row));
    cells.fill(0, idx(0, 0), idx(0, 1));
    cleared++;
  }

  if (cleared === 0) return { board, cleared };
  return { board: scratch, cleared };
}

// Rows and columns of non-empty cells, top row first
export function occupiedCells(
  board: Board,
): ReadonlyArray<{ x: number; y: number; value: CellValue }> {
  const out: Array<{ x: number; y: number; value: CellValue }> = [];
  for (let y = 0; y < board.height; y++) {
    for (let x = 0; x < board.width; x++) {
      const value = board.cells[idx(x, y)] ?? 0;
      if (value !== 0) out.push({ value: createCellValue(value), x, y });
    }
  }
  return out;
}
