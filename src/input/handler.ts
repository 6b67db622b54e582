import { debugLog } from "../utils/debug";

import { type Keymap, DEFAULT_KEYMAP, isRepeatable } from "./keymap";
import {
  type RepeatConfig,
  DEFAULT_REPEAT_CONFIG,
  RepeatMachineService,
} from "./machines/repeat";

import type { Command } from "../engine/commands";

/**
 * Turns timestamped key edges into engine commands. Each repeatable key gets
 * its own auto-repeat machine; other keys fire once per press.
 */
export class KeyInputHandler {
  private readonly held = new Map<string, RepeatMachineService>();
  private readonly pressed = new Set<string>();

  constructor(
    private readonly keymap: Keymap = DEFAULT_KEYMAP,
    private readonly config: RepeatConfig = DEFAULT_REPEAT_CONFIG,
  ) {}

  keyDown(key: string, timestamp: number): Array<Command> {
    const cmd = this.keymap.get(key);
    if (cmd === undefined) return [];
    // Already down: the host's own key repeat is ignored
    if (this.pressed.has(key)) return [];
    this.pressed.add(key);

    if (!isRepeatable(cmd)) {
      debugLog("input", "press", { key });
      return [cmd];
    }

    const machine = new RepeatMachineService(cmd, this.config);
    this.held.set(key, machine);
    return machine.send({ timestamp, type: "PRESS" });
  }

  keyUp(key: string, timestamp: number): Array<Command> {
    this.pressed.delete(key);
    const machine = this.held.get(key);
    if (machine === undefined) return [];
    this.held.delete(key);
    return machine.send({ timestamp, type: "RELEASE" });
  }

  /** Repeats due at `timestamp` across every held key. */
  tick(timestamp: number): Array<Command> {
    const out: Array<Command> = [];
    for (const machine of this.held.values()) {
      out.push(...machine.send({ timestamp, type: "TICK" }));
    }
    return out;
  }

  releaseAll(): void {
    this.held.clear();
    this.pressed.clear();
  }
}
