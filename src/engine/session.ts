import { type EngineConfig, DEFAULT_ENGINE_CONFIG } from "./config";
import { getCell } from "./core/board";
import { blockOffset } from "./core/pieces";
import {
  type CellValue,
  type BlockOffset,
  type ShapeId,
  type Rotation,
  copyBoardCells,
} from "./core/types";
import { spawn } from "./gameplay/spawn";
import {
  ghostRow,
  tryHardDrop,
  tryMoveLeft,
  tryMoveRight,
  tryRotate,
  trySoftDrop,
} from "./gameplay/movement";
import {
  type LifecycleContext,
  type LifecyclePhase,
  LifecycleService,
} from "./machines/lifecycle";
import { gravityStep } from "./physics/gravity";
import { applyCommand } from "./step/apply-command";
import { type GameState, type Stats, mkInitialState } from "./types";

import type { Command } from "./commands";
import type { DomainEvent } from "./events";

/**
 * One game session. Owns its state outright, so any number of sessions can
 * run side by side. All calls are synchronous; blocked actions and any action
 * after game over return false (or 0) and leave state untouched.
 */
export class GameSession {
  // Assigned by initSession, which the constructor always runs
  private state!: GameState;
  private lifecycle!: LifecycleService;
  private pending: Array<DomainEvent> = [];

  constructor(
    seed = 0,
    private readonly cfg: EngineConfig = DEFAULT_ENGINE_CONFIG,
  ) {
    this.initSession(seed);
  }

  /** Reset every piece of state, reseed the generator and spawn the first piece. */
  initSession(seed: number): void {
    this.lifecycle = new LifecycleService();
    this.pending = [];
    const r = spawn(mkInitialState(this.cfg, seed));
    this.commit(r.state, r.events);
  }

  /**
   * Continue from a state produced elsewhere, e.g. a prepared puzzle board.
   * The board is copied so the caller keeps no handle on it. The lifecycle
   * restarts in the phase the state implies and pending events are dropped.
   */
  restore(state: GameState): void {
    this.lifecycle = new LifecycleService();
    this.lifecycle.send(state.gameOver ? { type: "TOPPED_OUT" } : { type: "SPAWNED" });
    this.pending = [];
    this.state = {
      ...state,
      board: { ...state.board, cells: copyBoardCells(state.board.cells) },
    };
  }

  update(): boolean {
    const r = gravityStep(this.state);
    this.commit(r.state, r.events);
    return r.dropped;
  }

  moveLeft(): boolean {
    const r = tryMoveLeft(this.state);
    this.commit(r.state, r.events);
    return r.moved;
  }

  moveRight(): boolean {
    const r = tryMoveRight(this.state);
    this.commit(r.state, r.events);
    return r.moved;
  }

  rotate(): boolean {
    const r = tryRotate(this.state);
    this.commit(r.state, r.events);
    return r.rotated;
  }

  /** False means the piece landed (or the game is over), not that the call failed. */
  softDrop(): boolean {
    const r = trySoftDrop(this.state);
    this.commit(r.state, r.events);
    return r.falling;
  }

  hardDrop(): number {
    const r = tryHardDrop(this.state);
    this.commit(r.state, r.events);
    return r.rows;
  }

  /**
   * Apply a command the way a host's input layer would. Restart is honoured
   * at any time; everything else is ignored once the game is over.
   */
  dispatch(cmd: Command): boolean {
    if (cmd.kind === "Restart") {
      this.initSession(cmd.seed ?? this.state.rng.seed);
      return true;
    }
    const r = applyCommand(this.state, cmd);
    this.commit(r.state, r.events);
    return r.applied;
  }

  isGameOver(): boolean {
    return this.state.gameOver;
  }

  score(): number {
    return this.state.score;
  }

  level(): number {
    return this.state.level;
  }

  linesCleared(): number {
    return this.state.lines;
  }

  activePieceShape(): ShapeId {
    return this.state.piece.shape;
  }

  activePieceX(): number {
    return this.state.piece.x;
  }

  activePieceY(): number {
    return this.state.piece.y;
  }

  activePieceRotation(): Rotation {
    return this.state.piece.rotation;
  }

  nextPieceShape(): ShapeId {
    return this.state.next;
  }

  blockOffset(shape: number, rotation: number, block: number): BlockOffset {
    return blockOffset(shape, rotation, block);
  }

  ghostRow(): number {
    return ghostRow(this.state);
  }

  cellAt(x: number, y: number): CellValue {
    return getCell(this.state.board, x, y);
  }

  phase(): LifecyclePhase {
    return this.lifecycle.phase();
  }

  piecesPlaced(): number {
    return this.state.stats.piecesPlaced;
  }

  stats(): Stats {
    return this.state.stats;
  }

  lifecycleCounts(): LifecycleContext {
    return this.lifecycle.context();
  }

  /**
   * The whole state, for renderers and tests. The board is a copy, so writes
   * to it never reach the session.
   */
  snapshot(): GameState {
    return {
      ...this.state,
      board: { ...this.state.board, cells: copyBoardCells(this.state.board.cells) },
    };
  }

  /** Events produced since the last drain, oldest first. */
  drainEvents(): ReadonlyArray<DomainEvent> {
    const out = this.pending;
    this.pending = [];
    return out;
  }

  private commit(next: GameState, events: ReadonlyArray<DomainEvent>): void {
    this.state = next;
    if (events.length === 0) return;
    this.pending.push(...events);
    this.lifecycle.observe(events);
  }
}
