import { createEmptyBoard, setCell } from "@/engine/core/board";
import { createCellValue } from "@/engine/core/types";
import { ghostColor } from "@/render/cells";
import {
  BACKGROUND_COLOR,
  GRID_LINE_COLOR,
  PANEL_BORDER_COLOR,
  PANEL_COLOR,
  lighten,
  parseHexColor,
} from "@/render/colors";
import { type FrameView, frameViewOf, renderFrame } from "@/render/frame";
import { Framebuffer } from "@/render/framebuffer";
import { DEFAULT_LAYOUT } from "@/render/layout";

import { createTestPiece, createTestState } from "../test-helpers";

const T_PURPLE = parseHexColor("#d000ff");
const J_BLUE = parseHexColor("#3366ff");

function render(view: FrameView): Framebuffer {
  const fb = new Framebuffer(DEFAULT_LAYOUT.width, DEFAULT_LAYOUT.height);
  renderFrame(fb, DEFAULT_LAYOUT, view);
  return fb;
}

// Centre pixel of a grid cell under the default layout
function centre(gridX: number, gridY: number): [number, number] {
  return [10 + gridX * 30 + 15, 10 + gridY * 30 + 15];
}

describe("@/render/frame — full frame", () => {
  test("frameViewOf computes the ghost row from state", () => {
    const view = frameViewOf(createTestState());
    expect(view.ghostRow).toBe(18);
    expect(view.piece).toEqual(createTestPiece());
  });

  describe("empty board with a T at spawn", () => {
    const fb = render(frameViewOf(createTestState()));

    test("margin is background, border surrounds the panel", () => {
      expect(fb.getPixel(0, 0)).toEqual(BACKGROUND_COLOR);
      expect(fb.getPixel(319, 619)).toEqual(BACKGROUND_COLOR);
      expect(fb.getPixel(9, 9)).toEqual(PANEL_BORDER_COLOR);
      expect(fb.getPixel(310, 300)).toEqual(PANEL_BORDER_COLOR);
      expect(fb.getPixel(150, 610)).toEqual(PANEL_BORDER_COLOR);
    });

    test("empty cells show the panel, grid lines separate them", () => {
      expect(fb.getPixel(...centre(0, 5))).toEqual(PANEL_COLOR);
      expect(fb.getPixel(40, 200)).toEqual(GRID_LINE_COLOR);
      expect(fb.getPixel(200, 40)).toEqual(GRID_LINE_COLOR);
      // No line on the panel's outer edge
      expect(fb.getPixel(10, 200)).toEqual(PANEL_COLOR);
    });

    test("the active piece is drawn bevelled at its cells", () => {
      // T rotation 0 at (3,0): (4,0) (3,1) (4,1) (5,1)
      expect(fb.getPixel(...centre(4, 0))).toEqual(T_PURPLE);
      expect(fb.getPixel(...centre(3, 1))).toEqual(T_PURPLE);
      expect(fb.getPixel(...centre(5, 1))).toEqual(T_PURPLE);
      expect(fb.getPixel(...centre(3, 0))).toEqual(PANEL_COLOR);
      expect(fb.getPixel(131, 11)).toEqual(lighten(T_PURPLE));
    });

    test("the ghost outlines the resting cells without filling them", () => {
      // Ghost at row 18: (4,18) (3,19) (4,19) (5,19)
      const g = ghostColor(T_PURPLE);
      expect(fb.getPixel(10 + 4 * 30 + 3, 10 + 18 * 30 + 3)).toEqual(g);
      expect(fb.getPixel(10 + 3 * 30 + 3, 10 + 19 * 30 + 15)).toEqual(g);
      expect(fb.getPixel(...centre(4, 18))).toEqual(PANEL_COLOR);
      expect(fb.getPixel(10 + 3 * 30 + 3, 10 + 18 * 30 + 3)).toEqual(PANEL_COLOR);
    });
  });

  test("locked cells draw in their shape color", () => {
    const board = setCell(createEmptyBoard(), 0, 19, createCellValue(6));
    const fb = render({ board, ghostRow: 0, piece: createTestPiece() });
    expect(fb.getPixel(...centre(0, 19))).toEqual(J_BLUE);
  });

  test("no ghost when the piece is already resting", () => {
    const piece = createTestPiece(2, 3, 18, 0);
    const fb = render({ board: createEmptyBoard(), ghostRow: 18, piece });
    // Cell (3,18) is empty in T rotation 0; a ghost would have outlined it otherwise
    expect(fb.getPixel(10 + 3 * 30 + 3, 10 + 18 * 30 + 3)).toEqual(PANEL_COLOR);
    expect(fb.getPixel(...centre(4, 18))).toEqual(T_PURPLE);
  });

  test("blocks above the board are skipped", () => {
    // I rotation 1 at y=-2 has blocks in rows -2..1 of column 5
    const piece = createTestPiece(0, 3, -2, 1);
    const fb = render({ board: createEmptyBoard(), ghostRow: -2, piece });
    const cyan = parseHexColor("#00f5ff");
    expect(fb.getPixel(...centre(5, 0))).toEqual(cyan);
    expect(fb.getPixel(...centre(5, 1))).toEqual(cyan);
    expect(fb.getPixel(...centre(5, 2))).toEqual(PANEL_COLOR);
    // The border row above the board is untouched
    expect(fb.getPixel(175, 9)).toEqual(PANEL_BORDER_COLOR);
  });

  test("rendering is a pure function of the view", () => {
    const view = frameViewOf(createTestState());
    const a = render(view);
    const b = render(view);
    expect(Array.from(a.pixels)).toEqual(Array.from(b.pixels));
  });
});
