import { type EngineConfig, DEFAULT_ENGINE_CONFIG } from "./engine/config";
import { GameSession } from "./engine/session";
import { renderFrame, frameViewOf } from "./render/frame";
import { Framebuffer } from "./render/framebuffer";
import { type RenderLayout, DEFAULT_LAYOUT } from "./render/layout";
import { createPreviewBuffer, renderPreview } from "./render/preview";

/**
 * A session that also owns its pixel buffers. The host calls `render()` once
 * per displayed frame and copies `pixels()` to its surface.
 */
export class RenderedGame extends GameSession {
  private readonly frame: Framebuffer;
  private readonly preview: Framebuffer;

  constructor(
    seed = 0,
    cfg: EngineConfig = DEFAULT_ENGINE_CONFIG,
    private readonly layout: RenderLayout = DEFAULT_LAYOUT,
  ) {
    super(seed, cfg);
    this.frame = new Framebuffer(layout.width, layout.height);
    this.preview = createPreviewBuffer();
  }

  render(): void {
    renderFrame(this.frame, this.layout, frameViewOf(this.snapshot()));
  }

  renderPreview(): void {
    renderPreview(this.preview, this.nextPieceShape());
  }

  pixels(): Readonly<Uint8ClampedArray> {
    return this.frame.pixels;
  }

  previewPixels(): Readonly<Uint8ClampedArray> {
    return this.preview.pixels;
  }

  frameWidth(): number {
    return this.frame.width;
  }

  frameHeight(): number {
    return this.frame.height;
  }

  framebuffer(): Framebuffer {
    return this.frame;
  }

  previewBuffer(): Framebuffer {
    return this.preview;
  }
}

/** Start a rendered game; the seed defaults to the wall clock. */
export function createGame(
  seed: number = Date.now() % 0x7fffffff,
  cfg: EngineConfig = DEFAULT_ENGINE_CONFIG,
  layout: RenderLayout = DEFAULT_LAYOUT,
): RenderedGame {
  return new RenderedGame(seed, cfg, layout);
}
