import type { EngineConfig, EntryPolicy, RegimeFilterStage, RoiStep, RunMode } from "./types.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  atrRiskFactor: 1.4,
  mfiLowerThreshold: 40,
  mfiHigherThreshold: 60,
  hardStopFraction: 0.1,
  regimeFilterStage: "setup",
  regimeMinConfidence: 0,
  exclusiveSides: false,
  consumeOnTrigger: false,
  regimeExit: false,
  roiTable: [],
  trailingOffset: 0,
  trailingDistance: 0,
};

export type PipelineConfig = {
  timeframeMinutes: number;
  emaLength: number;
  bbLength: number;
  bbStdDev: number;
  mfiLength: number;
  atrLength: number;
};

export type RuntimeConfig = {
  instanceId: string;
  symbols: string[];
  mode: RunMode;
  pipeline: PipelineConfig;
  barFeedUrl?: string;
  regimeMaxAgeMs: number;
  stateFile?: string;
  persistIntervalMs: number;
};

function raw(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function readNumber(env: Env, name: string, fallback: number, range: { min?: number; max?: number } = {}): number {
  const v = raw(env, name);
  if (v === undefined) return fallback;
  const parsed = Number(v);
  if (!Number.isFinite(parsed)) throw new ConfigError(`${name} must be a number, got "${v}"`);
  if (range.min !== undefined && parsed < range.min) throw new ConfigError(`${name} must be >= ${range.min}, got ${parsed}`);
  if (range.max !== undefined && parsed > range.max) throw new ConfigError(`${name} must be <= ${range.max}, got ${parsed}`);
  return parsed;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const value = readNumber(env, name, fallback, { min });
  if (!Number.isInteger(value)) throw new ConfigError(`${name} must be an integer, got ${value}`);
  return value;
}

function readBool(env: Env, name: string, fallback: boolean): boolean {
  const v = raw(env, name)?.toLowerCase();
  if (v === undefined) return fallback;
  if (v === "1" || v === "true" || v === "yes") return true;
  if (v === "0" || v === "false" || v === "no") return false;
  throw new ConfigError(`${name} must be a boolean (1/0/true/false), got "${v}"`);
}

function readStage(env: Env): RegimeFilterStage {
  const v = raw(env, "REGIME_FILTER_STAGE")?.toLowerCase();
  if (v === undefined) return DEFAULT_ENGINE_CONFIG.regimeFilterStage;
  if (v === "setup" || v === "trigger" || v === "none") return v;
  throw new ConfigError(`REGIME_FILTER_STAGE must be setup|trigger|none, got "${v}"`);
}

/**
 * Parse "minutes:fraction" pairs, e.g. "0:0.10,60:0.05,120:0.03".
 */
export function parseRoiTable(table: string | undefined): RoiStep[] {
  if (!table || !table.trim()) return [];
  const steps: RoiStep[] = [];
  for (const part of table.split(",")) {
    const [minutesRaw, fractionRaw] = part.split(":").map((p) => p.trim());
    const afterMinutes = Number(minutesRaw);
    const profitFraction = Number(fractionRaw);
    if (!minutesRaw || !fractionRaw || !Number.isFinite(afterMinutes) || !Number.isFinite(profitFraction)) {
      throw new ConfigError(`ROI_TABLE entry "${part.trim()}" must look like minutes:fraction`);
    }
    if (afterMinutes < 0) throw new ConfigError(`ROI_TABLE minutes must be >= 0, got ${afterMinutes}`);
    steps.push({ afterMinutes, profitFraction });
  }
  return steps.sort((a, b) => a.afterMinutes - b.afterMinutes);
}

/**
 * Check a fully-populated config. Throws ConfigError on the first bad field.
 */
export function validateEngineConfig(config: EngineConfig): EngineConfig {
  if (!(config.atrRiskFactor > 0)) throw new ConfigError(`atrRiskFactor must be > 0, got ${config.atrRiskFactor}`);
  for (const key of ["mfiLowerThreshold", "mfiHigherThreshold"] as const) {
    const v = config[key];
    if (!Number.isFinite(v) || v < 0 || v > 100) throw new ConfigError(`${key} must be within [0, 100], got ${v}`);
  }
  if (!(config.hardStopFraction > 0 && config.hardStopFraction < 1)) {
    throw new ConfigError(`hardStopFraction must be within (0, 1), got ${config.hardStopFraction}`);
  }
  if (!(config.regimeMinConfidence >= 0 && config.regimeMinConfidence <= 1)) {
    throw new ConfigError(`regimeMinConfidence must be within [0, 1], got ${config.regimeMinConfidence}`);
  }
  if (!(config.trailingOffset >= 0)) throw new ConfigError(`trailingOffset must be >= 0, got ${config.trailingOffset}`);
  if (!(config.trailingDistance >= 0 && config.trailingDistance < 1)) {
    throw new ConfigError(`trailingDistance must be within [0, 1), got ${config.trailingDistance}`);
  }
  return config;
}

export function resolveEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return validateEngineConfig({ ...DEFAULT_ENGINE_CONFIG, ...overrides });
}

export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return validateEngineConfig({
    atrRiskFactor: readNumber(env, "ATR_RISK_FACTOR", d.atrRiskFactor),
    mfiLowerThreshold: readNumber(env, "MFI_LOWER_THRESHOLD", d.mfiLowerThreshold),
    mfiHigherThreshold: readNumber(env, "MFI_HIGHER_THRESHOLD", d.mfiHigherThreshold),
    hardStopFraction: readNumber(env, "HARD_STOP_FRACTION", d.hardStopFraction),
    regimeFilterStage: readStage(env),
    regimeMinConfidence: readNumber(env, "REGIME_MIN_CONFIDENCE", d.regimeMinConfidence),
    exclusiveSides: readBool(env, "EXCLUSIVE_SIDES", d.exclusiveSides),
    consumeOnTrigger: readBool(env, "CONSUME_ON_TRIGGER", d.consumeOnTrigger),
    regimeExit: readBool(env, "REGIME_EXIT", d.regimeExit),
    roiTable: parseRoiTable(raw(env, "ROI_TABLE")),
    trailingOffset: readNumber(env, "TRAILING_OFFSET", d.trailingOffset),
    trailingDistance: readNumber(env, "TRAILING_DISTANCE", d.trailingDistance),
  });
}

export function loadEntryPolicy(env: Env = process.env): EntryPolicy {
  return {
    sidesEnabled: {
      LONG: readBool(env, "ENABLE_LONG", true),
      SHORT: readBool(env, "ENABLE_SHORT", true),
    },
    allowEntryOnExitStep: readBool(env, "ALLOW_ENTRY_ON_EXIT_STEP", false),
  };
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const symbols = (raw(env, "SYMBOLS") ?? "BTC/USDT")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
  if (symbols.length === 0) throw new ConfigError("SYMBOLS must name at least one instrument");

  const mode = raw(env, "RUN_MODE")?.toLowerCase() ?? "live";
  if (mode !== "live" && mode !== "replay") throw new ConfigError(`RUN_MODE must be live|replay, got "${mode}"`);

  return {
    instanceId: raw(env, "INSTANCE_ID") ?? "ratchet-bot-001",
    symbols,
    mode,
    pipeline: {
      timeframeMinutes: readInt(env, "TIMEFRAME_MINUTES", 15, 1),
      emaLength: readInt(env, "EMA_LENGTH", 500, 1),
      bbLength: readInt(env, "BB_LENGTH", 50, 2),
      bbStdDev: readNumber(env, "BB_STD_DEV", 2.0, { min: 0 }),
      mfiLength: readInt(env, "MFI_LENGTH", 14, 1),
      atrLength: readInt(env, "ATR_LENGTH", 14, 1),
    },
    barFeedUrl: raw(env, "BAR_FEED_URL"),
    regimeMaxAgeMs: readInt(env, "REGIME_MAX_AGE_MS", 4 * 60 * 60 * 1000, 0),
    stateFile: raw(env, "STATE_FILE"),
    persistIntervalMs: readInt(env, "PERSIST_INTERVAL_MS", 15_000, 1000),
  };
}
