/**
 * RGBA colors and the bevel shading helpers.
 */

export type Rgba = Readonly<{ r: number; g: number; b: number; a: number }>;

const clampChannel = (v: number): number =>
  Math.max(0, Math.min(255, Math.round(v)));

export function rgba(r: number, g: number, b: number, a = 255): Rgba {
  return { a: clampChannel(a), b: clampChannel(b), g: clampChannel(g), r: clampChannel(r) };
}

/**
 * Parses "#rrggbb" or "#rrggbbaa".
 * @throws Error for anything else
 */
export function parseHexColor(color: string): Rgba {
  const hex = color.replace("#", "");
  if (!/^[0-9a-fA-F]{6}([0-9a-fA-F]{2})?$/.test(hex)) {
    throw new Error(`Invalid hex color: ${color}`);
  }
  const a = hex.length === 8 ? parseInt(hex.substring(6, 8), 16) : 255;
  return rgba(
    parseInt(hex.substring(0, 2), 16),
    parseInt(hex.substring(2, 4), 16),
    parseInt(hex.substring(4, 6), 16),
    a,
  );
}

export function toHexColor(c: Rgba): string {
  const h = (v: number): string => v.toString(16).padStart(2, "0");
  return `#${h(c.r)}${h(c.g)}${h(c.b)}`;
}

export const HIGHLIGHT_OFFSET = 80;

/** Bevel highlight: +80 per channel, capped at 255. Alpha unchanged. */
export function lighten(c: Rgba): Rgba {
  return {
    a: c.a,
    b: Math.min(255, c.b + HIGHLIGHT_OFFSET),
    g: Math.min(255, c.g + HIGHLIGHT_OFFSET),
    r: Math.min(255, c.r + HIGHLIGHT_OFFSET),
  };
}

/** Bevel shadow: each channel halved. Alpha unchanged. */
export function darken(c: Rgba): Rgba {
  return {
    a: c.a,
    b: Math.floor(c.b / 2),
    g: Math.floor(c.g / 2),
    r: Math.floor(c.r / 2),
  };
}

// Piece colors by cell value (shape id + 1); index 0 is the empty cell
export const PIECE_COLORS: ReadonlyArray<Rgba> = [
  "#000000", // 0: empty (never drawn)
  "#00f5ff", // 1: I - cyan
  "#ffea00", // 2: O - yellow
  "#d000ff", // 3: T - purple
  "#00ff6a", // 4: S - green
  "#ff3366", // 5: Z - red
  "#3366ff", // 6: J - blue
  "#ff9500", // 7: L - orange
].map(parseHexColor);

export const BACKGROUND_COLOR = parseHexColor("#0a0a0f");
export const PANEL_COLOR = parseHexColor("#050508");
export const PANEL_BORDER_COLOR = parseHexColor("#333333");
// 5% white over the background, pre-mixed since writes never blend
export const GRID_LINE_COLOR = parseHexColor("#16161b");

export function colorForCell(value: number): Rgba | null {
  if (value <= 0) return null;
  return PIECE_COLORS[value] ?? null;
}

/**
 * Pre-mix `fg` at `alpha` over an opaque `bg`. Used where a translucent look
 * is wanted, since the framebuffer itself never blends.
 */
export function blendOver(fg: Rgba, bg: Rgba, alpha: number): Rgba {
  const t = Math.max(0, Math.min(1, alpha));
  return rgba(
    fg.r * t + bg.r * (1 - t),
    fg.g * t + bg.g * (1 - t),
    fg.b * t + bg.b * (1 - t),
    255,
  );
}

export const GHOST_OPACITY = 0.25;
