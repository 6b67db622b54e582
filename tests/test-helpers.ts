/**
 * Shared builders for engine tests.
 */

import { createEngineConfig, type EngineConfig } from "@/engine/config";
import { createEmptyBoard } from "@/engine/core/board";
import {
  type ActivePiece,
  type Board,
  type Rotation,
  type ShapeId,
  createBoardCells,
  idx,
} from "@/engine/core/types";
import { type GameState, mkInitialState } from "@/engine/types";

export function createTestConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  return createEngineConfig(overrides);
}

/**
 * Board from a picture, bottom rows last. Each string is one row of ten
 * characters: "." is empty, a digit 1-7 is that cell value, "#" is 1.
 * Rows not given are empty at the top.
 */
export function boardFromRows(rows: ReadonlyArray<string>): Board {
  const board = createEmptyBoard();
  const cells = createBoardCells();
  const top = board.height - rows.length;
  rows.forEach((row, i) => {
    if (row.length !== board.width) {
      throw new Error(`row ${String(i)} must be ${String(board.width)} wide`);
    }
    for (let x = 0; x < board.width; x++) {
      const ch = row.charAt(x);
      if (ch === ".") continue;
      cells[idx(x, top + i)] = ch === "#" ? 1 : parseInt(ch, 10);
    }
  });
  return { ...board, cells };
}

export function createTestPiece(
  shape: ShapeId = 2,
  x = 3,
  y = 0,
  rotation: Rotation = 0,
): ActivePiece {
  return { rotation, shape, x, y };
}

export function createTestState(overrides: Partial<GameState> = {}): GameState {
  const base = mkInitialState(createTestConfig(), 0);
  return {
    ...base,
    piece: createTestPiece(),
    ...overrides,
  };
}

// Flatten a row of the board to a string like boardFromRows takes
export function rowString(board: Board, y: number): string {
  let out = "";
  for (let x = 0; x < board.width; x++) {
    const v = board.cells[idx(x, y)] ?? 0;
    out += v === 0 ? "." : String(v);
  }
  return out;
}

export const FULL_ROW = "##########";
export const EMPTY_ROW = "..........";
