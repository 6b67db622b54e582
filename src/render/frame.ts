import { occupiedCells, restingRow } from "../engine/core/board";
import { pieceCells } from "../engine/core/pieces";
import { cellValueForShape } from "../engine/core/types";
import { debugLog } from "../utils/debug";

import { drawCell } from "./cells";
import {
  BACKGROUND_COLOR,
  GRID_LINE_COLOR,
  PANEL_BORDER_COLOR,
  PANEL_COLOR,
} from "./colors";

import type { ActivePiece, Board } from "../engine/core/types";
import type { GameState } from "../engine/types";
import type { Framebuffer } from "./framebuffer";
import type { RenderLayout } from "./layout";

// Everything a frame depends on
export type FrameView = Readonly<{
  board: Board;
  piece: ActivePiece;
  ghostRow: number;
}>;

export function frameViewOf(state: GameState): FrameView {
  return {
    board: state.board,
    ghostRow: restingRow(state.board, state.piece),
    piece: state.piece,
  };
}

function drawBoardPanel(fb: Framebuffer, layout: RenderLayout): void {
  const { boardX, boardY, boardWidth, boardHeight, cellSize } = layout;

  // One-pixel border around the inset panel
  fb.fillRect(boardX - 1, boardY - 1, boardWidth + 2, boardHeight + 2, PANEL_BORDER_COLOR);
  fb.fillRect(boardX, boardY, boardWidth, boardHeight, PANEL_COLOR);

  for (let col = 1; col < boardWidth / cellSize; col++) {
    fb.drawVLine(boardX + col * cellSize, boardY, boardHeight, GRID_LINE_COLOR);
  }
  for (let row = 1; row < boardHeight / cellSize; row++) {
    fb.drawHLine(boardX, boardY + row * cellSize, boardWidth, GRID_LINE_COLOR);
  }
}

function drawPiece(
  fb: Framebuffer,
  layout: RenderLayout,
  piece: ActivePiece,
  y: number,
  isGhost: boolean,
): void {
  const value = cellValueForShape(piece.shape);
  for (const [dx, dy] of pieceCells(piece.shape, piece.rotation)) {
    const gridY = y + dy;
    if (gridY < 0) continue; // above the board
    drawCell(fb, layout, piece.x + dx, gridY, value, isGhost);
  }
}

/**
 * Draw a complete frame: background, board panel and grid, locked cells,
 * the ghost piece, then the active piece on top. Pure function of the view.
 */
export function renderFrame(
  fb: Framebuffer,
  layout: RenderLayout,
  view: FrameView,
): void {
  fb.clear(BACKGROUND_COLOR);
  drawBoardPanel(fb, layout);

  for (const { x, y, value } of occupiedCells(view.board)) {
    drawCell(fb, layout, x, y, value);
  }

  if (view.ghostRow > view.piece.y) {
    drawPiece(fb, layout, view.piece, view.ghostRow, true);
  }
  drawPiece(fb, layout, view.piece, view.piece.y, false);

  debugLog("render", "frame", { ghostRow: view.ghostRow, piece: view.piece });
}
