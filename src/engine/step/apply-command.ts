import {
  tryHardDrop,
  tryMoveLeft,
  tryMoveRight,
  tryRotate,
  trySoftDrop,
} from "../gameplay/movement";

import type { Command } from "../commands";
import type { DomainEvent } from "../events";
import type { GameState } from "../types";

export type CommandResult = {
  state: GameState;
  events: ReadonlyArray<DomainEvent>;
  // false when the command was blocked or ignored
  applied: boolean;
};

/**
 * Route one gameplay command to its handler. Restart is not a state
 * transition of the current session, so it is reported as not applied here
 * and handled by the session owner.
 */
export function applyCommand(state: GameState, cmd: Command): CommandResult {
  if (state.gameOver) return { applied: false, events: [], state };

  switch (cmd.kind) {
    case "MoveLeft": {
      const r = tryMoveLeft(state);
      return { applied: r.moved, events: r.events, state: r.state };
    }
    case "MoveRight": {
      const r = tryMoveRight(state);
      return { applied: r.moved, events: r.events, state: r.state };
    }
    case "Rotate": {
      const r = tryRotate(state);
      return { applied: r.rotated, events: r.events, state: r.state };
    }
    case "SoftDrop": {
      const r = trySoftDrop(state);
      return { applied: true, events: r.events, state: r.state };
    }
    case "HardDrop": {
      const r = tryHardDrop(state);
      return { applied: true, events: r.events, state: r.state };
    }
    case "Restart":
      return { applied: false, events: [], state };
  }
}

export function applyCommands(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const events: Array<DomainEvent> = [];
  for (const cmd of cmds) {
    const r = applyCommand(s, cmd);
    s = r.state;
    events.push(...r.events);
  }
  return { events, state: s };
}
