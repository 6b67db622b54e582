// Engine configuration: defaults, validation, and environment overrides.
// Defaults reproduce the classic timing: 60 ticks per row at level 0,
// six ticks faster per level, never faster than six ticks per row.

export type EngineConfig = Readonly<{
  gravityBaseTicks: number;
  gravityStepTicks: number;
  gravityMinTicks: number;
  hardDropPointsPerRow: number;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  gravityBaseTicks: 60,
  gravityMinTicks: 6,
  gravityStepTicks: 6,
  hardDropPointsPerRow: 2,
};

function isNonNegativeInteger(x: unknown): x is number {
  return typeof x === "number" && Number.isInteger(x) && x >= 0;
}

function isPositiveInteger(x: unknown): x is number {
  return isNonNegativeInteger(x) && x > 0;
}

export function createEngineConfig(
  overrides: Partial<EngineConfig> = {},
): EngineConfig {
  const cfg: EngineConfig = { ...DEFAULT_ENGINE_CONFIG, ...overrides };

  for (const k of ["gravityBaseTicks", "gravityMinTicks"] as const) {
    if (!isPositiveInteger(cfg[k])) {
      throw new Error(`${k} must be a positive integer`);
    }
  }
  for (const k of ["gravityStepTicks", "hardDropPointsPerRow"] as const) {
    if (!isNonNegativeInteger(cfg[k])) {
      throw new Error(`${k} must be a non-negative integer`);
    }
  }
  if (cfg.gravityMinTicks > cfg.gravityBaseTicks) {
    throw new Error("gravityMinTicks cannot exceed gravityBaseTicks");
  }

  return cfg;
}

const ENV_KEYS = {
  gravityBaseTicks: "BLOCKFALL_GRAVITY_BASE",
  gravityMinTicks: "BLOCKFALL_GRAVITY_MIN",
  gravityStepTicks: "BLOCKFALL_GRAVITY_STEP",
} as const;

function parseIntegerOrUndefined(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return parseInt(trimmed, 10);
}

/**
 * Read gravity overrides from environment variables. Unparseable values and
 * combinations that fail validation fall back to the defaults.
 */
export function engineConfigFromEnv(
  env: Readonly<Record<string, string | undefined>>,
): EngineConfig {
  const overrides: { -readonly [K in keyof EngineConfig]?: number } = {};
  for (const k of [
    "gravityBaseTicks",
    "gravityMinTicks",
    "gravityStepTicks",
  ] as const) {
    const v = parseIntegerOrUndefined(env[ENV_KEYS[k]]);
    if (v !== undefined) overrides[k] = v;
  }

  try {
    return createEngineConfig(overrides);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`Ignoring engine config from environment: ${reason}`);
    return DEFAULT_ENGINE_CONFIG;
  }
}

// Ticks between forced descents at a given level
export function dropInterval(cfg: EngineConfig, level: number): number {
  return Math.max(
    cfg.gravityMinTicks,
    cfg.gravityBaseTicks - level * cfg.gravityStepTicks,
  );
}
