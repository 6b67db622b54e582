import { KeyInputHandler } from "@/input/handler";
import { DEFAULT_KEYMAP } from "@/input/keymap";

describe("@/input/handler — KeyInputHandler", () => {
  test("unmapped keys produce nothing", () => {
    const h = new KeyInputHandler();
    expect(h.keyDown("Escape", 0)).toEqual([]);
    expect(h.keyUp("Escape", 10)).toEqual([]);
  });

  test("non-repeating keys fire once per press", () => {
    const h = new KeyInputHandler();
    expect(h.keyDown(" ", 0)).toEqual([{ kind: "HardDrop" }]);
    expect(h.keyDown(" ", 30)).toEqual([]);
    expect(h.tick(1000)).toEqual([]);
    expect(h.keyUp(" ", 1000)).toEqual([]);
    expect(h.keyDown(" ", 1010)).toEqual([{ kind: "HardDrop" }]);
  });

  test("held movement keys auto-repeat", () => {
    const h = new KeyInputHandler();
    expect(h.keyDown("ArrowLeft", 0)).toEqual([{ kind: "MoveLeft" }]);
    expect(h.keyDown("ArrowLeft", 40)).toEqual([]);
    expect(h.tick(100)).toEqual([]);
    expect(h.tick(220)).toEqual([{ kind: "MoveLeft" }]);
    expect(h.keyUp("ArrowLeft", 230)).toEqual([]);
    expect(h.tick(500)).toEqual([]);
  });

  test("each held key repeats on its own schedule", () => {
    const h = new KeyInputHandler();
    h.keyDown("ArrowLeft", 0);
    h.keyDown("ArrowDown", 100);

    expect(h.tick(270)).toEqual([{ kind: "MoveLeft" }, { kind: "MoveLeft" }]);
    expect(h.tick(320)).toEqual([{ kind: "MoveLeft" }, { kind: "SoftDrop" }]);
  });

  test("releaseAll drops every held key", () => {
    const h = new KeyInputHandler();
    h.keyDown("d", 0);
    h.releaseAll();
    expect(h.tick(1000)).toEqual([]);
    expect(h.keyDown("d", 1000)).toEqual([{ kind: "MoveRight" }]);
  });

  test("custom timings", () => {
    const h = new KeyInputHandler(DEFAULT_KEYMAP, { delayMs: 0, rateMs: 10 });
    h.keyDown("s", 0);
    expect(h.tick(0)).toEqual([]);
    expect(h.tick(25)).toEqual([{ kind: "SoftDrop" }, { kind: "SoftDrop" }]);
  });

  test("custom keymaps replace the defaults", () => {
    const h = new KeyInputHandler(new Map([["j", { kind: "Rotate" } as const]]));
    expect(h.keyDown("ArrowUp", 0)).toEqual([]);
    expect(h.keyDown("j", 0)).toEqual([{ kind: "Rotate" }]);
  });
});
