import { gravityStep } from "@/engine/physics/gravity";

import { createTestPiece, createTestState } from "../../test-helpers";

describe("@/engine/physics/gravity — drop timer", () => {
  test("counts ticks without moving the piece before the interval", () => {
    const r = gravityStep(createTestState());
    expect(r.dropped).toBe(false);
    expect(r.state.dropTimer).toBe(1);
    expect(r.state.piece.y).toBe(0);
    expect(r.events).toEqual([]);
  });

  test("the 60th tick at level 0 forces a descent and resets the timer", () => {
    const r = gravityStep(createTestState({ dropTimer: 59 }));
    expect(r.dropped).toBe(true);
    expect(r.state.dropTimer).toBe(0);
    expect(r.state.piece.y).toBe(1);
    expect(r.events).toEqual([{ kind: "SoftDropped", y: 1 }]);
  });

  test("sixty ticks from zero produce exactly one descent", () => {
    let state = createTestState();
    let drops = 0;
    for (let i = 0; i < 60; i++) {
      const r = gravityStep(state);
      if (r.dropped) drops++;
      state = r.state;
    }
    expect(drops).toBe(1);
    expect(state.piece.y).toBe(1);
  });

  test.each([
    [1, 54],
    [5, 30],
    [9, 6],
    [15, 6],
  ])("level %i drops every %i ticks", (level, interval) => {
    const before = gravityStep(createTestState({ dropTimer: interval - 2, level }));
    expect(before.dropped).toBe(false);
    const at = gravityStep(createTestState({ dropTimer: interval - 1, level }));
    expect(at.dropped).toBe(true);
  });

  test("a forced descent onto the floor lands the piece", () => {
    const r = gravityStep(
      createTestState({ dropTimer: 59, piece: createTestPiece(2, 3, 18, 0) }),
    );
    expect(r.dropped).toBe(true);
    expect(r.state.stats.piecesPlaced).toBe(1);
    expect(r.state.piece.shape).toBe(4);
    expect(r.events.map((e) => e.kind)).toEqual(["Locked", "PieceSpawned"]);
  });

  test("does nothing once the game is over", () => {
    const state = createTestState({ dropTimer: 59, gameOver: true });
    const r = gravityStep(state);
    expect(r.dropped).toBe(false);
    expect(r.state).toBe(state);
  });
});
