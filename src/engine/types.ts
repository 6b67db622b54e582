import { type EngineConfig } from "./config";
import { createEmptyBoard } from "./core/board";
import { type LcgRng, createRng, nextShape } from "./core/rng/lcg";
import { type ActivePiece, type Board, type ShapeId } from "./core/types";

export * from "./core/types";
export { type EngineConfig } from "./config";
export { type LcgRng } from "./core/rng/lcg";

// Fixed spawn origin
export const SPAWN_X = 3 as const;
export const SPAWN_Y = 0 as const;

export type Stats = Readonly<{
  piecesPlaced: number;
  singles: number;
  doubles: number;
  triples: number;
  tetrises: number;
  hardDropRows: number;
}>;

export const EMPTY_STATS: Stats = {
  doubles: 0,
  hardDropRows: 0,
  piecesPlaced: 0,
  singles: 0,
  tetrises: 0,
  triples: 0,
};

export type GameState = Readonly<{
  cfg: EngineConfig;
  board: Board;
  piece: ActivePiece;
  next: ShapeId;
  rng: LcgRng;
  score: number;
  level: number;
  lines: number;
  dropTimer: number; // ticks since the last forced descent
  gameOver: boolean; // sticky until a new session
  stats: Stats;
}>;

/**
 * Fresh state with an empty board and the first next piece drawn. The active
 * piece is a placeholder at the spawn origin until the first spawn promotes
 * the next piece.
 */
export function mkInitialState(cfg: EngineConfig, seed: number): GameState {
  const first = nextShape(createRng(seed));

  return {
    board: createEmptyBoard(),
    cfg,
    dropTimer: 0,
    gameOver: false,
    level: 0,
    lines: 0,
    next: first.shape,
    piece: { rotation: 0, shape: first.shape, x: SPAWN_X, y: SPAWN_Y },
    rng: first.rng,
    score: 0,
    stats: EMPTY_STATS,
  };
}
