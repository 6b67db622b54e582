import { lockPiece, pieceCollides } from "../core/board";
import { nextShape } from "../core/rng/lcg";
import { applyLineClear } from "../scoring/line-clear";
import { type GameState, SPAWN_X, SPAWN_Y } from "../types";
import { debugLog } from "../../utils/debug";

import type { DomainEvent } from "../events";

/**
 * Promote the next piece to the spawn origin and draw a new next piece.
 * A collision at the spawn position ends the game; the colliding piece is
 * left as the active piece but never locked.
 */
export function spawn(state: GameState): {
  state: GameState;
  spawned: boolean;
  events: ReadonlyArray<DomainEvent>;
} {
  const draw = nextShape(state.rng);
  const piece = {
    rotation: 0,
    shape: state.next,
    x: SPAWN_X,
    y: SPAWN_Y,
  } as const;

  const promoted: GameState = {
    ...state,
    next: draw.shape,
    piece,
    rng: draw.rng,
  };

  if (pieceCollides(promoted.board, piece)) {
    debugLog("spawn", "spawn blocked, game over", { score: state.score });
    return {
      events: [{ kind: "TopOut", score: state.score }],
      spawned: false,
      state: { ...promoted, gameOver: true },
    };
  }

  debugLog("spawn", "spawned", { next: draw.shape, shape: piece.shape });
  return {
    events: [{ kind: "PieceSpawned", next: draw.shape, shape: piece.shape }],
    spawned: true,
    state: promoted,
  };
}

/**
 * Landing sequence shared by soft drop, hard drop and gravity:
 * lock the active piece, clear lines, spawn the next piece.
 */
export function lockAndSpawn(state: GameState): {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
} {
  const { piece } = state;
  const locked: GameState = {
    ...state,
    board: lockPiece(state.board, piece),
    stats: { ...state.stats, piecesPlaced: state.stats.piecesPlaced + 1 },
  };
  debugLog("lock", "locked", piece);

  const cleared = applyLineClear(locked);
  const spawned = spawn(cleared.state);

  return {
    events: [
      {
        kind: "Locked",
        rotation: piece.rotation,
        shape: piece.shape,
        x: piece.x,
        y: piece.y,
      },
      ...cleared.events,
      ...spawned.events,
    ],
    state: spawned.state,
  };
}
