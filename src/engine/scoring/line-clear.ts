import { clearLines } from "../core/board";
import { debugLog } from "../../utils/debug";

import type { DomainEvent } from "../events";
import type { GameState, Stats } from "../types";

// Base points per clear size; four or more lines score as four
const LINE_POINTS = [0, 100, 300, 500, 800] as const;

export function scoreForLines(count: number, level: number): number {
  if (count <= 0) return 0;
  const base = LINE_POINTS[Math.min(count, 4)] ?? 0;
  return base * (level + 1);
}

export function levelForLines(lines: number): number {
  return Math.floor(lines / 10);
}

function tallyClear(stats: Stats, count: number): Stats {
  switch (count) {
    case 0:
      return stats;
    case 1:
      return { ...stats, singles: stats.singles + 1 };
    case 2:
      return { ...stats, doubles: stats.doubles + 1 };
    case 3:
      return { ...stats, triples: stats.triples + 1 };
    default:
      return { ...stats, tetrises: stats.tetrises + 1 };
  }
}

/**
 * Clear complete rows and credit them. Points use the level as it stood
 * before this clear; the level is then recomputed from the running total.
 */
export function applyLineClear(state: GameState): {
  state: GameState;
  cleared: number;
  events: ReadonlyArray<DomainEvent>;
} {
  const result = clearLines(state.board);
  if (result.cleared === 0) {
    return { cleared: 0, events: [], state };
  }

  const points = scoreForLines(result.cleared, state.level);
  const lines = state.lines + result.cleared;
  const level = levelForLines(lines);

  const events: Array<DomainEvent> = [
    { count: result.cleared, kind: "LinesCleared", level: state.level, points },
  ];
  if (level !== state.level) {
    events.push({ from: state.level, kind: "LevelUp", to: level });
  }

  debugLog("lines", `cleared ${String(result.cleared)}`, { level, lines, points });

  return {
    cleared: result.cleared,
    events,
    state: {
      ...state,
      board: result.board,
      level,
      lines,
      score: state.score + points,
      stats: tallyClear(state.stats, result.cleared),
    },
  };
}
