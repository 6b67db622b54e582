import type { ShapeId } from "./types";

export type KickDirection = "none" | "left" | "right";

export type DomainEvent =
  | { kind: "PieceSpawned"; shape: ShapeId; next: ShapeId }
  | { kind: "Moved"; fromX: number; toX: number }
  | { kind: "Rotated"; rotation: number; kick: KickDirection }
  | { kind: "SoftDropped"; y: number }
  | { kind: "HardDropped"; rows: number; points: number }
  | { kind: "Locked"; shape: ShapeId; x: number; y: number; rotation: number }
  | { kind: "LinesCleared"; count: number; points: number; level: number }
  | { kind: "LevelUp"; from: number; to: number }
  | { kind: "TopOut"; score: number };

export type DomainEventKind = DomainEvent["kind"];
