import type { GameSession } from "../engine/session";

export const TICKS_PER_SECOND = 60;
export const TICK_MS = 1000 / TICKS_PER_SECOND;

/**
 * Fixed-timestep accumulator. The host feeds it elapsed wall time and gets
 * back how many whole engine ticks are due; the remainder carries over.
 */
export class FixedStepClock {
  private accumulator = 0;

  constructor(readonly stepMs: number = TICK_MS) {
    if (!Number.isFinite(stepMs) || stepMs <= 0) {
      throw new Error("stepMs must be a positive finite number");
    }
  }

  advance(elapsedMs: number): number {
    if (!Number.isFinite(elapsedMs) || elapsedMs <= 0) return 0;
    this.accumulator += elapsedMs;
    let steps = 0;
    while (this.accumulator >= this.stepMs) {
      this.accumulator -= this.stepMs;
      steps++;
    }
    return steps;
  }

  pendingMs(): number {
    return this.accumulator;
  }

  reset(): void {
    this.accumulator = 0;
  }
}

/**
 * Run every tick the clock says is due. Stops early once the game is over.
 * Returns the number of ticks that forced a descent.
 */
export function runDueTicks(
  session: GameSession,
  clock: FixedStepClock,
  elapsedMs: number,
): number {
  const steps = clock.advance(elapsedMs);
  let drops = 0;
  for (let i = 0; i < steps && !session.isGameOver(); i++) {
    if (session.update()) drops++;
  }
  return drops;
}
