export type Command =
  | { kind: "MoveLeft" }
  | { kind: "MoveRight" }
  | { kind: "Rotate" }
  | { kind: "SoftDrop" }
  | { kind: "HardDrop" }
  | { kind: "Restart"; seed?: number };

export type CommandKind = Command["kind"];
