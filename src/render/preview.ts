import { pieceCells } from "../engine/core/pieces";
import { cellValueForShape } from "../engine/core/types";

import { drawBevelBlock } from "./cells";
import { PANEL_COLOR, colorForCell } from "./colors";
import { Framebuffer } from "./framebuffer";

import type { ShapeId } from "../engine/core/types";

export const PREVIEW_CELL_SIZE = 20;
export const PREVIEW_BEVEL_SIZE = 2;
export const PREVIEW_WIDTH = 100;
export const PREVIEW_HEIGHT = 60;

export function createPreviewBuffer(): Framebuffer {
  return new Framebuffer(PREVIEW_WIDTH, PREVIEW_HEIGHT);
}

/**
 * Next-piece preview: the shape in its spawn rotation, centred on a 4×2 cell
 * area of the buffer.
 */
export function renderPreview(fb: Framebuffer, shape: ShapeId): void {
  fb.clear(PANEL_COLOR);

  const color = colorForCell(cellValueForShape(shape));
  if (color === null) return;

  const offsetX = Math.floor((fb.width - PREVIEW_CELL_SIZE * 4) / 2);
  const offsetY = Math.floor((fb.height - PREVIEW_CELL_SIZE * 2) / 2);

  for (const [dx, dy] of pieceCells(shape, 0)) {
    drawBevelBlock(
      fb,
      offsetX + dx * PREVIEW_CELL_SIZE,
      offsetY + dy * PREVIEW_CELL_SIZE,
      PREVIEW_CELL_SIZE,
      color,
      PREVIEW_BEVEL_SIZE,
    );
  }
}
