/*
 * Key auto-repeat state machine (robot3), one instance per held key.
 *
 * idle → delaying (PRESS: command fires once)
 * delaying → repeating (TICK once delayMs has passed since the press)
 * repeating → repeating (TICK: fires once per elapsed rateMs, with catch-up)
 * delaying | repeating → idle (RELEASE)
 *
 * A PRESS while the key is already held is ignored, matching hosts that
 * suppress the operating system's own key repeat.
 */

import {
  createMachine,
  state,
  transition,
  guard,
  reduce,
  action,
  interpret,
} from "robot3";

import type { Command } from "../../engine/commands";
import type {
  MachineState,
  MachineStates,
  Machine,
  Service,
  Transition,
} from "robot3";

export type RepeatState = "idle" | "delaying" | "repeating";

export type RepeatConfig = Readonly<{
  delayMs: number; // hold time before repeating starts
  rateMs: number; // interval between repeats
}>;

export const DEFAULT_REPEAT_CONFIG: RepeatConfig = {
  delayMs: 170,
  rateMs: 50,
};

export type RepeatContext = {
  command: Command;
  delayMs: number;
  rateMs: number;
  pressedAt: number | undefined;
  lastRepeatAt: number | undefined;
  repeats: number; // repeats due from the latest TICK
};

export type RepeatEvent =
  | { type: "PRESS"; timestamp: number }
  | { type: "RELEASE"; timestamp: number }
  | { type: "TICK"; timestamp: number };

type RepeatEventType = RepeatEvent["type"];

// Guards

const isDelayExpired = (ctx: RepeatContext, event: RepeatEvent): boolean => {
  if (event.type !== "TICK" || ctx.pressedAt === undefined) return false;
  return event.timestamp - ctx.pressedAt >= ctx.delayMs;
};

const isRepeatDue = (ctx: RepeatContext, event: RepeatEvent): boolean => {
  if (event.type !== "TICK" || ctx.lastRepeatAt === undefined) return false;
  return event.timestamp - ctx.lastRepeatAt >= ctx.rateMs;
};

// Reducers return new context objects

export const reducePress = (
  ctx: RepeatContext,
  event: RepeatEvent,
): RepeatContext => ({
  ...ctx,
  lastRepeatAt: undefined,
  pressedAt: event.timestamp,
  repeats: 0,
});

export const reduceRelease = (ctx: RepeatContext): RepeatContext => ({
  ...ctx,
  lastRepeatAt: undefined,
  pressedAt: undefined,
  repeats: 0,
});

/**
 * Count the repeats due by this TICK. The first repeat is due one rateMs
 * after the delay expires; late ticks catch up on every missed repeat.
 */
export const reduceCatchUp = (
  ctx: RepeatContext,
  event: RepeatEvent,
): RepeatContext => {
  if (ctx.pressedAt === undefined) return ctx;
  const base = ctx.lastRepeatAt ?? ctx.pressedAt + ctx.delayMs;
  const repeats = Math.max(0, Math.floor((event.timestamp - base) / ctx.rateMs));
  return {
    ...ctx,
    lastRepeatAt: base + repeats * ctx.rateMs,
    repeats,
  };
};

// Actions emit commands through the callback

const createEmitPress =
  (onCommand: (cmd: Command) => void) =>
  (ctx: RepeatContext): void => {
    onCommand(ctx.command);
  };

const createEmitRepeats =
  (onCommand: (cmd: Command) => void) =>
  (ctx: RepeatContext): void => {
    for (let i = 0; i < ctx.repeats; i++) onCommand(ctx.command);
  };

type RepeatStatesObject = Record<RepeatState, MachineState<RepeatEventType>>;
export type RepeatMachine = Machine<
  RepeatStatesObject,
  RepeatContext,
  RepeatState,
  RepeatEventType
>;

export const createRepeatMachine = (
  initialContext: RepeatContext,
  onCommand: (cmd: Command) => void,
): RepeatMachine => {
  const emitPress = createEmitPress(onCommand);
  const emitRepeats = createEmitRepeats(onCommand);

  const states = {
    delaying: state<Transition<RepeatEventType>>(
      transition("RELEASE", "idle", reduce(reduceRelease)),
      transition(
        "TICK",
        "repeating",
        guard(isDelayExpired),
        reduce(reduceCatchUp),
        action(emitRepeats),
      ),
    ),
    idle: state(
      transition("PRESS", "delaying", reduce(reducePress), action(emitPress)),
    ),
    repeating: state<Transition<RepeatEventType>>(
      transition("RELEASE", "idle", reduce(reduceRelease)),
      transition(
        "TICK",
        "repeating",
        guard(isRepeatDue),
        reduce(reduceCatchUp),
        action(emitRepeats),
      ),
    ),
  } as const;

  // robot3's return type widens the event type to `string`; cast back to the
  // precise machine type at this boundary.
  return createMachine(
    "idle" as const,
    states as unknown as MachineStates<RepeatStatesObject, RepeatEventType>,
    (): RepeatContext => initialContext,
  ) as unknown as RepeatMachine;
};

export const createRepeatContext = (
  command: Command,
  config: RepeatConfig = DEFAULT_REPEAT_CONFIG,
): RepeatContext => ({
  command,
  delayMs: Math.max(0, config.delayMs),
  lastRepeatAt: undefined,
  pressedAt: undefined,
  rateMs: Math.max(1, config.rateMs), // at least 1ms between repeats
  repeats: 0,
});

/**
 * Thin wrapper around the robot3 service: sends events and hands back the
 * commands each one produced.
 */
export class RepeatMachineService {
  private service: Service<RepeatMachine>;
  private queue: Array<Command> = [];
  private currentState: RepeatState = "idle";

  constructor(command: Command, config: RepeatConfig = DEFAULT_REPEAT_CONFIG) {
    const machine = createRepeatMachine(
      createRepeatContext(command, config),
      (cmd) => {
        this.queue.push(cmd);
      },
    );
    this.service = interpret(machine, (service) => {
      this.currentState = service.machine.state.name;
    });
  }

  send(event: RepeatEvent): Array<Command> {
    this.service.send(event);
    const out = this.queue;
    this.queue = [];
    return out;
  }

  getState(): { state: RepeatState; context: RepeatContext } {
    return { context: { ...this.service.context }, state: this.currentState };
  }
}
