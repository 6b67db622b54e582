import { applyCommand, applyCommands } from "@/engine/step/apply-command";

import { createTestPiece, createTestState } from "../../test-helpers";

describe("@/engine/step/apply-command — command routing", () => {
  test("MoveLeft and MoveRight shift the piece", () => {
    const l = applyCommand(createTestState(), { kind: "MoveLeft" });
    expect(l.applied).toBe(true);
    expect(l.state.piece.x).toBe(2);

    const r = applyCommand(createTestState(), { kind: "MoveRight" });
    expect(r.applied).toBe(true);
    expect(r.state.piece.x).toBe(4);
  });

  test("a blocked move is reported as not applied", () => {
    const state = createTestState({ piece: createTestPiece(2, 0, 5, 0) });
    const r = applyCommand(state, { kind: "MoveLeft" });
    expect(r.applied).toBe(false);
    expect(r.state).toBe(state);
  });

  test("Rotate turns the piece clockwise", () => {
    const r = applyCommand(createTestState({ piece: createTestPiece(2, 3, 5, 0) }), {
      kind: "Rotate",
    });
    expect(r.applied).toBe(true);
    expect(r.state.piece.rotation).toBe(1);
  });

  test("SoftDrop and HardDrop always apply", () => {
    const soft = applyCommand(createTestState(), { kind: "SoftDrop" });
    expect(soft.applied).toBe(true);
    expect(soft.state.piece.y).toBe(1);

    const hard = applyCommand(createTestState(), { kind: "HardDrop" });
    expect(hard.applied).toBe(true);
    expect(hard.state.score).toBe(36);
    expect(hard.state.stats.piecesPlaced).toBe(1);
  });

  test("Restart is left to the session owner", () => {
    const state = createTestState();
    const r = applyCommand(state, { kind: "Restart", seed: 9 });
    expect(r.applied).toBe(false);
    expect(r.state).toBe(state);
  });

  test("everything is ignored after game over", () => {
    const state = createTestState({ gameOver: true });
    for (const kind of ["MoveLeft", "MoveRight", "Rotate", "SoftDrop", "HardDrop"] as const) {
      const r = applyCommand(state, { kind });
      expect(r.applied).toBe(false);
      expect(r.state).toBe(state);
      expect(r.events).toEqual([]);
    }
  });

  test("applyCommands runs a batch in order and concatenates events", () => {
    const r = applyCommands(createTestState(), [
      { kind: "MoveLeft" },
      { kind: "MoveLeft" },
      { kind: "SoftDrop" },
    ]);
    expect(r.state.piece).toEqual({ rotation: 0, shape: 2, x: 1, y: 1 });
    expect(r.events).toEqual([
      { fromX: 3, kind: "Moved", toX: 2 },
      { fromX: 2, kind: "Moved", toX: 1 },
      { kind: "SoftDropped", y: 1 },
    ]);
  });
});
