import { checkCollision, restingRow } from "../core/board";
import { nextRotation } from "../core/types";

import { lockAndSpawn } from "./spawn";

import type { DomainEvent, KickDirection } from "../events";
import type { GameState } from "../types";

type MoveResult = {
  state: GameState;
  moved: boolean;
  events: ReadonlyArray<DomainEvent>;
};

type RotateResult = {
  state: GameState;
  rotated: boolean;
  kick: KickDirection;
  events: ReadonlyArray<DomainEvent>;
};

type DropResult = {
  state: GameState;
  // true while still falling; false when the piece landed this call
  falling: boolean;
  events: ReadonlyArray<DomainEvent>;
};

type HardDropResult = {
  state: GameState;
  rows: number;
  events: ReadonlyArray<DomainEvent>;
};

const unchanged = (state: GameState): MoveResult => ({
  events: [],
  moved: false,
  state,
});

function tryShift(state: GameState, dx: -1 | 1): MoveResult {
  if (state.gameOver) return unchanged(state);
  const p = state.piece;
  const toX = p.x + dx;

  if (checkCollision(state.board, p.shape, toX, p.y, p.rotation)) {
    return unchanged(state);
  }

  return {
    events: [{ fromX: p.x, kind: "Moved", toX }],
    moved: true,
    state: { ...state, piece: { ...p, x: toX } },
  };
}

export function tryMoveLeft(state: GameState): MoveResult {
  return tryShift(state, -1);
}

export function tryMoveRight(state: GameState): MoveResult {
  return tryShift(state, 1);
}

// Horizontal positions tried after a naive rotation collides, in order
const KICKS: ReadonlyArray<readonly [dx: number, kick: KickDirection]> = [
  [0, "none"],
  [-1, "left"],
  [1, "right"],
];

/**
 * Rotate one step clockwise, trying the current column, then one to the
 * left, then one to the right. No vertical kicks.
 */
export function tryRotate(state: GameState): RotateResult {
  if (state.gameOver) {
    return { events: [], kick: "none", rotated: false, state };
  }
  const p = state.piece;
  const rotation = nextRotation(p.rotation);

  for (const [dx, kick] of KICKS) {
    const x = p.x + dx;
    if (!checkCollision(state.board, p.shape, x, p.y, rotation)) {
      return {
        events: [{ kick, kind: "Rotated", rotation }],
        kick,
        rotated: true,
        state: { ...state, piece: { ...p, rotation, x } },
      };
    }
  }

  return { events: [], kick: "none", rotated: false, state };
}

/**
 * Move down one row. When blocked, the piece locks, lines clear and the next
 * piece spawns; `falling` is false in that case.
 */
export function trySoftDrop(state: GameState): DropResult {
  if (state.gameOver) return { events: [], falling: false, state };
  const p = state.piece;
  const y = p.y + 1;

  if (!checkCollision(state.board, p.shape, p.x, y, p.rotation)) {
    return {
      events: [{ kind: "SoftDropped", y }],
      falling: true,
      state: { ...state, piece: { ...p, y } },
    };
  }

  const landed = lockAndSpawn(state);
  return { events: landed.events, falling: false, state: landed.state };
}

// Drop to the resting row, award points per row, then run the landing sequence
export function tryHardDrop(state: GameState): HardDropResult {
  if (state.gameOver) return { events: [], rows: 0, state };
  const p = state.piece;
  const y = restingRow(state.board, p);
  const rows = y - p.y;
  const points = rows * state.cfg.hardDropPointsPerRow;

  const dropped: GameState = {
    ...state,
    piece: { ...p, y },
    score: state.score + points,
    stats: { ...state.stats, hardDropRows: state.stats.hardDropRows + rows },
  };
  const landed = lockAndSpawn(dropped);

  return {
    events: [{ kind: "HardDropped", points, rows }, ...landed.events],
    rows,
    state: landed.state,
  };
}

// Row the active piece would come to rest on; never mutates state
export function ghostRow(state: GameState): number {
  return restingRow(state.board, state.piece);
}
