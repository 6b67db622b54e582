import {
  type BlockOffset,
  type Rotation,
  type ShapeId,
  type ShapeName,
  assertBlockIndex,
  assertRotation,
  assertShapeId,
} from "./types";

export type TetrominoShape = Readonly<{
  id: ShapeId;
  name: ShapeName;
  // Indexed by rotation; each entry holds exactly four block offsets
  rotations: readonly [
    ReadonlyArray<BlockOffset>,
    ReadonlyArray<BlockOffset>,
    ReadonlyArray<BlockOffset>,
    ReadonlyArray<BlockOffset>,
  ];
}>;

// Offsets are (dx, dy) inside a 4×4 box with y growing downward.
// Rotation 0 always sits in rows 0..1 so the preview fits a 4×2 area.
export const PIECES: ReadonlyArray<TetrominoShape> = [
  {
    id: 0,
    name: "I",
    rotations: [
      [
        [0, 1],
        [1, 1],
        [2, 1],
        [3, 1],
      ],
      [
        [2, 0],
        [2, 1],
        [2, 2],
        [2, 3],
      ],
      [
        [0, 2],
        [1, 2],
        [2, 2],
        [3, 2],
      ],
      [
        [1, 0],
        [1, 1],
        [1, 2],
        [1, 3],
      ],
    ],
  },
  {
    id: 1,
    name: "O",
    rotations: [
      [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
      [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
      [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
      [
        [1, 0],
        [2, 0],
        [1, 1],
        [2, 1],
      ],
    ],
  },
  {
    id: 2,
    name: "T",
    rotations: [
      [
        [1, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      [
        [1, 0],
        [1, 1],
        [2, 1],
        [1, 2],
      ],
      [
        [0, 1],
        [1, 1],
        [2, 1],
        [1, 2],
      ],
      [
        [1, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
    ],
  },
  {
    id: 3,
    name: "S",
    rotations: [
      [
        [1, 0],
        [2, 0],
        [0, 1],
        [1, 1],
      ],
      [
        [1, 0],
        [1, 1],
        [2, 1],
        [2, 2],
      ],
      [
        [1, 1],
        [2, 1],
        [0, 2],
        [1, 2],
      ],
      [
        [0, 0],
        [0, 1],
        [1, 1],
        [1, 2],
      ],
    ],
  },
  {
    id: 4,
    name: "Z",
    rotations: [
      [
        [0, 0],
        [1, 0],
        [1, 1],
        [2, 1],
      ],
      [
        [2, 0],
        [1, 1],
        [2, 1],
        [1, 2],
      ],
      [
        [0, 1],
        [1, 1],
        [1, 2],
        [2, 2],
      ],
      [
        [1, 0],
        [0, 1],
        [1, 1],
        [0, 2],
      ],
    ],
  },
  {
    id: 5,
    name: "J",
    rotations: [
      [
        [0, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      [
        [1, 0],
        [2, 0],
        [1, 1],
        [1, 2],
      ],
      [
        [0, 1],
        [1, 1],
        [2, 1],
        [2, 2],
      ],
      [
        [1, 0],
        [1, 1],
        [0, 2],
        [1, 2],
      ],
    ],
  },
  {
    id: 6,
    name: "L",
    rotations: [
      [
        [2, 0],
        [0, 1],
        [1, 1],
        [2, 1],
      ],
      [
        [1, 0],
        [1, 1],
        [1, 2],
        [2, 2],
      ],
      [
        [0, 1],
        [1, 1],
        [2, 1],
        [0, 2],
      ],
      [
        [0, 0],
        [1, 0],
        [1, 1],
        [1, 2],
      ],
    ],
  },
];

export function getShape(shape: ShapeId): TetrominoShape {
  const entry = PIECES[shape];
  if (entry === undefined) {
    throw new Error(`Piece catalog has no entry for shape ${String(shape)}`);
  }
  return entry;
}

// All four offsets of a shape in a given rotation
export function pieceCells(
  shape: ShapeId,
  rotation: Rotation,
): ReadonlyArray<BlockOffset> {
  return getShape(shape).rotations[rotation];
}

export function blockOffset(
  shape: number,
  rotation: number,
  block: number,
): BlockOffset {
  assertShapeId(shape);
  assertRotation(rotation);
  assertBlockIndex(block);
  const offset = pieceCells(shape, rotation)[block];
  if (offset === undefined) {
    throw new Error("Piece catalog entry is missing a block offset");
  }
  return offset;
}
