import type { Command, CommandKind } from "../engine/commands";

// KeyboardEvent.key values → engine command
export type Keymap = ReadonlyMap<string, Command>;

export const DEFAULT_KEYMAP: Keymap = new Map<string, Command>([
  ["ArrowLeft", { kind: "MoveLeft" }],
  ["a", { kind: "MoveLeft" }],
  ["A", { kind: "MoveLeft" }],

  ["ArrowRight", { kind: "MoveRight" }],
  ["d", { kind: "MoveRight" }],
  ["D", { kind: "MoveRight" }],

  ["ArrowUp", { kind: "Rotate" }],
  ["w", { kind: "Rotate" }],
  ["W", { kind: "Rotate" }],

  ["ArrowDown", { kind: "SoftDrop" }],
  ["s", { kind: "SoftDrop" }],
  ["S", { kind: "SoftDrop" }],

  [" ", { kind: "HardDrop" }],

  ["Enter", { kind: "Restart" }],
  ["r", { kind: "Restart" }],
  ["R", { kind: "Restart" }],
]);

// Only movement and soft drop auto-repeat while held
const REPEATABLE: ReadonlySet<CommandKind> = new Set<CommandKind>([
  "MoveLeft",
  "MoveRight",
  "SoftDrop",
]);

export function isRepeatable(cmd: Command): boolean {
  return REPEATABLE.has(cmd.kind);
}

export function commandForKey(
  key: string,
  keymap: Keymap = DEFAULT_KEYMAP,
): Command | undefined {
  return keymap.get(key);
}
