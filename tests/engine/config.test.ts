import {
  DEFAULT_ENGINE_CONFIG,
  type EngineConfig,
  createEngineConfig,
  dropInterval,
  engineConfigFromEnv,
} from "@/engine/config";

describe("@/engine/config — defaults, validation & env overrides", () => {
  test("defaults", () => {
    expect(DEFAULT_ENGINE_CONFIG).toEqual({
      gravityBaseTicks: 60,
      gravityMinTicks: 6,
      gravityStepTicks: 6,
      hardDropPointsPerRow: 2,
    });
    expect(createEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
  });

  test("overrides merge over the defaults", () => {
    expect(createEngineConfig({ gravityBaseTicks: 30 })).toEqual({
      ...DEFAULT_ENGINE_CONFIG,
      gravityBaseTicks: 30,
    });
  });

  const invalid: ReadonlyArray<[Partial<EngineConfig>, string]> = [
    [{ gravityBaseTicks: 0 }, "gravityBaseTicks must be a positive integer"],
    [{ gravityMinTicks: 1.5 }, "gravityMinTicks must be a positive integer"],
    [{ gravityStepTicks: -1 }, "gravityStepTicks must be a non-negative integer"],
    [
      { hardDropPointsPerRow: Number.NaN },
      "hardDropPointsPerRow must be a non-negative integer",
    ],
    [
      { gravityBaseTicks: 5, gravityMinTicks: 6 },
      "gravityMinTicks cannot exceed gravityBaseTicks",
    ],
  ];

  test.each(invalid)("rejects %p", (overrides, message) => {
    expect(() => createEngineConfig(overrides)).toThrow(message);
  });

  describe("dropInterval()", () => {
    test.each([
      [0, 60],
      [1, 54],
      [8, 12],
      [9, 6],
      [10, 6],
      [29, 6],
    ])("level %i → %i ticks", (level, ticks) => {
      expect(dropInterval(DEFAULT_ENGINE_CONFIG, level)).toBe(ticks);
    });
  });

  describe("engineConfigFromEnv()", () => {
    let warnSpy: jest.SpyInstance;

    beforeEach(() => {
      warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
      warnSpy.mockRestore();
    });

    test("an empty environment yields the defaults", () => {
      expect(engineConfigFromEnv({})).toEqual(DEFAULT_ENGINE_CONFIG);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    test("reads the gravity variables", () => {
      const cfg = engineConfigFromEnv({
        BLOCKFALL_GRAVITY_BASE: "40",
        BLOCKFALL_GRAVITY_MIN: " 4 ",
        BLOCKFALL_GRAVITY_STEP: "3",
      });
      expect(cfg).toEqual({
        gravityBaseTicks: 40,
        gravityMinTicks: 4,
        gravityStepTicks: 3,
        hardDropPointsPerRow: 2,
      });
    });

    test("ignores values that are not plain integers", () => {
      const cfg = engineConfigFromEnv({
        BLOCKFALL_GRAVITY_BASE: "fast",
        BLOCKFALL_GRAVITY_STEP: "-2",
      });
      expect(cfg).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    test("falls back to the defaults and warns when validation fails", () => {
      const cfg = engineConfigFromEnv({ BLOCKFALL_GRAVITY_BASE: "0" });
      expect(cfg).toBe(DEFAULT_ENGINE_CONFIG);
      expect(warnSpy).toHaveBeenCalledWith(
        "Ignoring engine config from environment: gravityBaseTicks must be a positive integer",
      );
    });
  });
});
