export { init, step, stepN } from "./engine";
export {
  type EngineConfig,
  DEFAULT_ENGINE_CONFIG,
  createEngineConfig,
  engineConfigFromEnv,
  dropInterval,
} from "./engine/config";
export {
  checkCollision,
  clearLines,
  createEmptyBoard,
  getCell,
  isRowComplete,
  lockPiece,
  setCell,
} from "./engine/core/board";
export { PIECES, blockOffset, pieceCells } from "./engine/core/pieces";
export { advanceSeed, createRng, nextShape } from "./engine/core/rng/lcg";
export type { Command, CommandKind } from "./engine/commands";
export type { DomainEvent, DomainEventKind } from "./engine/events";
export type { LifecyclePhase } from "./engine/machines/lifecycle";
export { GameSession } from "./engine/session";
export * from "./engine/types";
export { createGame, RenderedGame } from "./game";
export { KeyInputHandler } from "./input/handler";
export { DEFAULT_KEYMAP, commandForKey, isRepeatable } from "./input/keymap";
export {
  type RepeatConfig,
  DEFAULT_REPEAT_CONFIG,
} from "./input/machines/repeat";
export { drawCell, drawBevelBlock } from "./render/cells";
export { type Rgba, darken, lighten, parseHexColor } from "./render/colors";
export { renderFrame, frameViewOf, type FrameView } from "./render/frame";
export { Framebuffer } from "./render/framebuffer";
export { type RenderLayout, createRenderLayout } from "./render/layout";
export { renderPreview } from "./render/preview";
export { FixedStepClock, runDueTicks } from "./runtime/clock";
export { debugLog, isDebugEnabled, setDebugTopics } from "./utils/debug";
