/*
 * Piece lifecycle state machine (robot3)
 *
 * spawning → falling → locking → lineClearing → spawning
 *     └──────────────────────────────────────────→ gameOver
 *
 * The gameplay functions do the work; this machine mirrors their domain
 * events so the session can report which phase it is in and reject
 * out-of-order transitions. Every public session call starts and ends in
 * `falling` or `gameOver`.
 */

import {
  createMachine,
  state,
  transition,
  reduce,
  action,
  interpret,
} from "robot3";

import { debugLog } from "../../utils/debug";

import type { DomainEvent } from "../events";
import type {
  MachineState,
  MachineStates,
  Machine,
  Service,
  Transition,
} from "robot3";

export type LifecyclePhase =
  | "spawning"
  | "falling"
  | "locking"
  | "lineClearing"
  | "gameOver";

export type LifecycleContext = {
  spawns: number; // successful spawns this session
  locks: number; // pieces locked this session
};

export type LifecycleEvent =
  | { type: "SPAWNED" }
  | { type: "TOPPED_OUT" }
  | { type: "LANDED" }
  | { type: "LOCKED" }
  | { type: "CLEARED" };

type LifecycleEventType = LifecycleEvent["type"];

const countSpawn = (ctx: LifecycleContext): LifecycleContext => ({
  ...ctx,
  spawns: ctx.spawns + 1,
});

const countLock = (ctx: LifecycleContext): LifecycleContext => ({
  ...ctx,
  locks: ctx.locks + 1,
});

const logTransition =
  (to: LifecyclePhase) =>
  (ctx: LifecycleContext): void => {
    debugLog("lifecycle", `→ ${to}`, ctx);
  };

const spawningState = (): MachineState<LifecycleEventType> =>
  state<Transition<LifecycleEventType>>(
    transition(
      "SPAWNED",
      "falling",
      reduce(countSpawn),
      action(logTransition("falling")),
    ),
    transition("TOPPED_OUT", "gameOver", action(logTransition("gameOver"))),
  );

const fallingState = (): MachineState<LifecycleEventType> =>
  state(transition("LANDED", "locking", action(logTransition("locking"))));

const lockingState = (): MachineState<LifecycleEventType> =>
  state(
    transition(
      "LOCKED",
      "lineClearing",
      reduce(countLock),
      action(logTransition("lineClearing")),
    ),
  );

const lineClearingState = (): MachineState<LifecycleEventType> =>
  state(transition("CLEARED", "spawning", action(logTransition("spawning"))));

// Terminal until the session is rebuilt
const gameOverState = (): MachineState<LifecycleEventType> => state();

type LifecycleStatesObject = Record<
  LifecyclePhase,
  MachineState<LifecycleEventType>
>;
export type LifecycleMachine = Machine<
  LifecycleStatesObject,
  LifecycleContext,
  LifecyclePhase,
  LifecycleEventType
>;

export const createLifecycleMachine = (): LifecycleMachine => {
  const states = {
    falling: fallingState(),
    gameOver: gameOverState(),
    lineClearing: lineClearingState(),
    locking: lockingState(),
    spawning: spawningState(),
  } as const;

  // robot3's return type widens the event type to `string`; cast back to the
  // precise machine type at this boundary.
  return createMachine(
    "spawning" as const,
    states as unknown as MachineStates<LifecycleStatesObject, LifecycleEventType>,
    (): LifecycleContext => ({ locks: 0, spawns: 0 }),
  ) as unknown as LifecycleMachine;
};

// Machine events implied by a batch of engine domain events, in order
export function lifecycleEventsFor(
  events: ReadonlyArray<DomainEvent>,
): ReadonlyArray<LifecycleEvent> {
  const out: Array<LifecycleEvent> = [];
  for (const e of events) {
    switch (e.kind) {
      case "Locked":
        out.push({ type: "LANDED" }, { type: "LOCKED" });
        break;
      case "PieceSpawned":
        out.push({ type: "CLEARED" }, { type: "SPAWNED" });
        break;
      case "TopOut":
        out.push({ type: "CLEARED" }, { type: "TOPPED_OUT" });
        break;
      default:
        break;
    }
  }
  return out;
}

type LifecycleServiceHandle = Service<LifecycleMachine>;

/**
 * Thin wrapper around the robot3 service. Transitions that have no edge from
 * the current phase (e.g. CLEARED while still spawning) are ignored by robot3.
 */
export class LifecycleService {
  private service: LifecycleServiceHandle;
  private currentPhase: LifecyclePhase = "spawning";

  constructor() {
    this.service = interpret(createLifecycleMachine(), (service) => {
      this.currentPhase = service.machine.state.name;
    });
  }

  send(event: LifecycleEvent): LifecyclePhase {
    this.service.send(event);
    return this.currentPhase;
  }

  observe(events: ReadonlyArray<DomainEvent>): LifecyclePhase {
    for (const e of lifecycleEventsFor(events)) this.send(e);
    return this.currentPhase;
  }

  phase(): LifecyclePhase {
    return this.currentPhase;
  }

  context(): LifecycleContext {
    return { ...this.service.context };
  }
}
