/**
 * Cell-level drawing: bevel-shaded blocks and ghost outlines.
 */

import {
  type Rgba,
  PANEL_COLOR,
  GHOST_OPACITY,
  blendOver,
  colorForCell,
  darken,
  lighten,
} from "./colors";
import {
  type RenderLayout,
  BEVEL_SIZE,
  CELL_PADDING,
  GHOST_INSET,
  GHOST_STROKE,
  cellOrigin,
} from "./layout";

import type { Framebuffer } from "./framebuffer";

/**
 * Filled block with a highlight along the top and left edges and a shadow
 * along the bottom and right, all inside a one-pixel padding. Shadows are
 * drawn last, so they own the top-right and bottom-left corners.
 */
export function drawBevelBlock(
  fb: Framebuffer,
  px: number,
  py: number,
  size: number,
  color: Rgba,
  bevel: number = BEVEL_SIZE,
): void {
  const inner = size - CELL_PADDING * 2;
  const x = px + CELL_PADDING;
  const y = py + CELL_PADDING;
  const light = lighten(color);
  const dark = darken(color);

  fb.fillRect(x, y, inner, inner, color);

  fb.fillRect(x, y, inner, bevel, light); // top
  fb.fillRect(x, y, bevel, inner, light); // left

  fb.fillRect(x, py + size - CELL_PADDING - bevel, inner, bevel, dark); // bottom
  fb.fillRect(px + size - CELL_PADDING - bevel, y, bevel, inner, dark); // right
}

export function ghostColor(color: Rgba): Rgba {
  return blendOver(color, PANEL_COLOR, GHOST_OPACITY);
}

// Outline only, no fill
export function drawGhostOutline(
  fb: Framebuffer,
  px: number,
  py: number,
  size: number,
  color: Rgba,
): void {
  const inset = CELL_PADDING + GHOST_INSET;
  fb.strokeRect(
    px + inset,
    py + inset,
    size - inset * 2,
    size - inset * 2,
    ghostColor(color),
    GHOST_STROKE,
  );
}

/**
 * Draw one grid cell. `colorIndex` is a cell value (shape id + 1); zero and
 * unknown indices draw nothing.
 */
export function drawCell(
  fb: Framebuffer,
  layout: RenderLayout,
  gridX: number,
  gridY: number,
  colorIndex: number,
  isGhost = false,
): void {
  const color = colorForCell(colorIndex);
  if (color === null) return;

  const { px, py } = cellOrigin(layout, gridX, gridY);
  if (isGhost) {
    drawGhostOutline(fb, px, py, layout.cellSize, color);
    return;
  }
  drawBevelBlock(fb, px, py, layout.cellSize, color);
}
