import { type Rgba, rgba } from "./colors";

export const BYTES_PER_PIXEL = 4;

/**
 * Linear RGBA pixel buffer, row-major with the origin at the top left.
 * Pixel (col, row) lives at byte offset (row * width + col) * 4. Writes that
 * fall outside the buffer are dropped; nothing blends, every write overwrites.
 */
export class Framebuffer {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8ClampedArray;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new Error("Framebuffer width must be a positive integer");
    }
    if (!Number.isInteger(height) || height <= 0) {
      throw new Error("Framebuffer height must be a positive integer");
    }
    this.width = width;
    this.height = height;
    this.data = new Uint8ClampedArray(width * height * BYTES_PER_PIXEL);
  }

  /** Read-only view for copying to a display surface. */
  get pixels(): Readonly<Uint8ClampedArray> {
    return this.data;
  }

  get byteLength(): number {
    return this.data.length;
  }

  offset(col: number, row: number): number {
    return (row * this.width + col) * BYTES_PER_PIXEL;
  }

  contains(col: number, row: number): boolean {
    return (
      Number.isInteger(col) &&
      Number.isInteger(row) &&
      col >= 0 &&
      col < this.width &&
      row >= 0 &&
      row < this.height
    );
  }

  setPixel(col: number, row: number, color: Rgba): void {
    if (!this.contains(col, row)) return;
    const o = this.offset(col, row);
    this.data[o] = color.r;
    this.data[o + 1] = color.g;
    this.data[o + 2] = color.b;
    this.data[o + 3] = color.a;
  }

  getPixel(col: number, row: number): Rgba | null {
    if (!this.contains(col, row)) return null;
    const o = this.offset(col, row);
    return rgba(
      this.data[o] ?? 0,
      this.data[o + 1] ?? 0,
      this.data[o + 2] ?? 0,
      this.data[o + 3] ?? 0,
    );
  }

  fillRect(x: number, y: number, w: number, h: number, color: Rgba): void {
    // Clip to the buffer once, then scan-fill
    const x0 = Math.max(0, Math.floor(x));
    const y0 = Math.max(0, Math.floor(y));
    const x1 = Math.min(this.width, Math.floor(x + w));
    const y1 = Math.min(this.height, Math.floor(y + h));
    if (x0 >= x1 || y0 >= y1) return;

    for (let row = y0; row < y1; row++) {
      let o = this.offset(x0, row);
      for (let col = x0; col < x1; col++) {
        this.data[o] = color.r;
        this.data[o + 1] = color.g;
        this.data[o + 2] = color.b;
        this.data[o + 3] = color.a;
        o += BYTES_PER_PIXEL;
      }
    }
  }

  drawHLine(x: number, y: number, length: number, color: Rgba): void {
    this.fillRect(x, y, length, 1, color);
  }

  drawVLine(x: number, y: number, length: number, color: Rgba): void {
    this.fillRect(x, y, 1, length, color);
  }

  /** Rectangle outline `thickness` pixels wide, drawn inside the bounds. */
  strokeRect(
    x: number,
    y: number,
    w: number,
    h: number,
    color: Rgba,
    thickness = 1,
  ): void {
    if (w <= 0 || h <= 0) return;
    const t = Math.max(1, Math.min(thickness, Math.floor(w / 2), Math.floor(h / 2)));
    this.fillRect(x, y, w, t, color); // top
    this.fillRect(x, y + h - t, w, t, color); // bottom
    this.fillRect(x, y + t, t, h - 2 * t, color); // left
    this.fillRect(x + w - t, y + t, t, h - 2 * t, color); // right
  }

  clear(color: Rgba): void {
    this.fillRect(0, 0, this.width, this.height, color);
  }
}
