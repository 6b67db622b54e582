import { spawn } from "./gameplay/spawn";
import { gravityStep } from "./physics/gravity";
import { applyCommands } from "./step/apply-command";
import { mkInitialState } from "./types";

import type { Command } from "./commands";
import type { EngineConfig } from "./config";
import type { DomainEvent } from "./events";
import type { GameState } from "./types";

/**
 * Build a seeded session state with its first piece spawned.
 */
export function init(
  cfg: EngineConfig,
  seed: number,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  return spawn(mkInitialState(cfg, seed));
}

/**
 * One deterministic tick: apply this tick's commands, then advance gravity.
 */
export function step(
  state: GameState,
  cmds: ReadonlyArray<Command>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  const a = applyCommands(state, cmds);
  const g = gravityStep(a.state);
  return { events: [...a.events, ...g.events], state: g.state };
}

/**
 * Advance multiple ticks with per-tick command buckets.
 */
export function stepN(
  state: GameState,
  byTick: ReadonlyArray<ReadonlyArray<Command>>,
): { state: GameState; events: ReadonlyArray<DomainEvent> } {
  let s = state;
  const all: Array<DomainEvent> = [];
  for (const cmds of byTick) {
    const r = step(s, cmds);
    s = r.state;
    all.push(...r.events);
  }
  return { events: all, state: s };
}
