import { BOARD_HEIGHT, BOARD_WIDTH } from "../engine/core/types";

/**
 * Pixel geometry of the board frame: an inset board panel surrounded by a
 * margin of background.
 */
export type RenderLayout = Readonly<{
  cellSize: number; // pixels per grid cell
  margin: number; // background around the board panel
  boardX: number; // left edge of grid column 0
  boardY: number; // top edge of grid row 0
  boardWidth: number;
  boardHeight: number;
  width: number; // whole frame
  height: number;
}>;

// Cell body is inset by this padding on every side
export const CELL_PADDING = 1;
// Highlight and shadow strip thickness
export const BEVEL_SIZE = 3;
// Ghost outline inset from the padded cell body, and its stroke width
export const GHOST_INSET = 2;
export const GHOST_STROKE = 2;

export const DEFAULT_CELL_SIZE = 30;
export const DEFAULT_MARGIN = 10;

export function createRenderLayout(
  opts: Partial<{ cellSize: number; margin: number }> = {},
): RenderLayout {
  const cellSize = opts.cellSize ?? DEFAULT_CELL_SIZE;
  const margin = opts.margin ?? DEFAULT_MARGIN;

  // Body, bevels and ghost outline must all fit inside one cell
  const minCell = 2 * (CELL_PADDING + BEVEL_SIZE) + 1;
  if (!Number.isInteger(cellSize) || cellSize < minCell) {
    throw new Error(`cellSize must be an integer >= ${String(minCell)}`);
  }
  if (!Number.isInteger(margin) || margin < 1) {
    throw new Error("margin must be a positive integer");
  }

  const boardWidth = BOARD_WIDTH * cellSize;
  const boardHeight = BOARD_HEIGHT * cellSize;
  return {
    boardHeight,
    boardWidth,
    boardX: margin,
    boardY: margin,
    cellSize,
    height: boardHeight + 2 * margin,
    margin,
    width: boardWidth + 2 * margin,
  };
}

export const DEFAULT_LAYOUT = createRenderLayout();

// Top-left pixel of a grid cell
export function cellOrigin(
  layout: RenderLayout,
  gridX: number,
  gridY: number,
): { px: number; py: number } {
  return {
    px: layout.boardX + gridX * layout.cellSize,
    py: layout.boardY + gridY * layout.cellSize,
  };
}
