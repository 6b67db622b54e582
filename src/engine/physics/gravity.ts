import { dropInterval } from "../config";
import { trySoftDrop } from "../gameplay/movement";
import { debugLog } from "../../utils/debug";

import type { DomainEvent } from "../events";
import type { GameState } from "../types";

/**
 * Advance the drop timer by one tick. When it reaches the level's interval it
 * resets and the piece takes a soft drop step (landing if blocked).
 * Returns dropped=true only on the tick that forced a descent.
 */
export function gravityStep(state: GameState): {
  state: GameState;
  dropped: boolean;
  events: ReadonlyArray<DomainEvent>;
} {
  if (state.gameOver) return { dropped: false, events: [], state };

  const interval = dropInterval(state.cfg, state.level);
  const timer = state.dropTimer + 1;

  if (timer < interval) {
    return { dropped: false, events: [], state: { ...state, dropTimer: timer } };
  }

  debugLog("gravity", "forced descent", { interval, level: state.level });
  const r = trySoftDrop({ ...state, dropTimer: 0 });
  return { dropped: true, events: r.events, state: r.state };
}
