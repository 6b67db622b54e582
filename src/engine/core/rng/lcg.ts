import { type ShapeId, SHAPE_COUNT, assertShapeId } from "../types";

// Linear congruential generator state (31-bit)
export type LcgRng = Readonly<{ seed: number }>;

const MULTIPLIER = 1103515245;
const INCREMENT = 12345;
const MODULUS_MASK = 0x7fffffff; // mod 2^31

export function createRng(seed: number): LcgRng {
  if (!Number.isSafeInteger(seed)) {
    throw new Error("RNG seed must be a safe integer");
  }
  // Bits above 31 never reach the output, so drop them up front
  return { seed: Number(BigInt.asUintN(31, BigInt(seed))) };
}

/**
 * seed' = (seed * 1103515245 + 12345) mod 2^31.
 * Math.imul keeps the low 32 bits exact, which is all the modulus needs.
 */
export function advanceSeed(seed: number): number {
  return (Math.imul(seed, MULTIPLIER) + INCREMENT) & MODULUS_MASK;
}

// Draw the next shape id. Plain modulo, bias included.
export function nextShape(rng: LcgRng): { shape: ShapeId; rng: LcgRng } {
  const seed = advanceSeed(rng.seed);
  const shape = seed % SHAPE_COUNT;
  assertShapeId(shape);
  return { rng: { seed }, shape };
}

// Several draws at once, mostly for tests and previews
export function nextShapes(
  rng: LcgRng,
  count: number,
): { shapes: Array<ShapeId>; rng: LcgRng } {
  const shapes: Array<ShapeId> = [];
  let current = rng;
  for (let i = 0; i < count; i++) {
    const r = nextShape(current);
    shapes.push(r.shape);
    current = r.rng;
  }
  return { rng: current, shapes };
}
