import assert from "node:assert/strict";
import { test } from "node:test";
import {
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  loadEngineConfig,
  loadEntryPolicy,
  loadRuntimeConfig,
  parseRoiTable,
  resolveEngineConfig,
} from "../src/config.js";

test("an empty environment gives the defaults", () => {
  assert.deepEqual(loadEngineConfig({}), DEFAULT_ENGINE_CONFIG);
  assert.deepEqual(loadEntryPolicy({}), { sidesEnabled: { LONG: true, SHORT: true }, allowEntryOnExitStep: false });

  const runtime = loadRuntimeConfig({});
  assert.equal(runtime.instanceId, "ratchet-bot-001");
  assert.deepEqual(runtime.symbols, ["BTC/USDT"]);
  assert.equal(runtime.mode, "live");
  assert.deepEqual(runtime.pipeline, {
    timeframeMinutes: 15,
    emaLength: 500,
    bbLength: 50,
    bbStdDev: 2,
    mfiLength: 14,
    atrLength: 14,
  });
  assert.equal(runtime.regimeMaxAgeMs, 4 * 60 * 60 * 1000);
  assert.equal(runtime.persistIntervalMs, 15_000);
  assert.equal(runtime.barFeedUrl, undefined);
});

test("engine settings are read from the environment", () => {
  const config = loadEngineConfig({
    ATR_RISK_FACTOR: "2",
    REGIME_FILTER_STAGE: "Trigger",
    EXCLUSIVE_SIDES: "yes",
    CONSUME_ON_TRIGGER: "1",
    REGIME_EXIT: "false",
    ROI_TABLE: "60:0.05, 0:0.1",
    TRAILING_OFFSET: "0.05",
    TRAILING_DISTANCE: "0.02",
  });
  assert.equal(config.atrRiskFactor, 2);
  assert.equal(config.regimeFilterStage, "trigger");
  assert.equal(config.exclusiveSides, true);
  assert.equal(config.consumeOnTrigger, true);
  assert.equal(config.regimeExit, false);
  assert.equal(config.trailingOffset, 0.05);
  assert.equal(config.trailingDistance, 0.02);
  assert.deepEqual(config.roiTable, [
    { afterMinutes: 0, profitFraction: 0.1 },
    { afterMinutes: 60, profitFraction: 0.05 },
  ]);
});

test("symbols are split and trimmed", () => {
  const runtime = loadRuntimeConfig({ SYMBOLS: " BTC/USDT, ETH/USDT ,", RUN_MODE: "REPLAY" });
  assert.deepEqual(runtime.symbols, ["BTC/USDT", "ETH/USDT"]);
  assert.equal(runtime.mode, "replay");
});

test("bad values raise ConfigError with the variable name", () => {
  const cases: Array<[Record<string, string>, string]> = [
    [{ ATR_RISK_FACTOR: "abc" }, 'ATR_RISK_FACTOR must be a number, got "abc"'],
    [{ ATR_RISK_FACTOR: "0" }, "atrRiskFactor must be > 0, got 0"],
    [{ MFI_LOWER_THRESHOLD: "120" }, "mfiLowerThreshold must be within [0, 100], got 120"],
    [{ HARD_STOP_FRACTION: "1" }, "hardStopFraction must be within (0, 1), got 1"],
    [{ EXCLUSIVE_SIDES: "maybe" }, 'EXCLUSIVE_SIDES must be a boolean (1/0/true/false), got "maybe"'],
    [{ REGIME_FILTER_STAGE: "entry" }, 'REGIME_FILTER_STAGE must be setup|trigger|none, got "entry"'],
    [{ ROI_TABLE: "10" }, 'ROI_TABLE entry "10" must look like minutes:fraction'],
    [{ TRAILING_OFFSET: "-0.1" }, "trailingOffset must be >= 0, got -0.1"],
    [{ TRAILING_DISTANCE: "1" }, "trailingDistance must be within [0, 1), got 1"],
  ];
  for (const [env, message] of cases) {
    assert.throws(() => loadEngineConfig(env), new ConfigError(message));
  }

  assert.throws(() => loadRuntimeConfig({ RUN_MODE: "paper" }), new ConfigError('RUN_MODE must be live|replay, got "paper"'));
  assert.throws(() => loadRuntimeConfig({ SYMBOLS: " , " }), new ConfigError("SYMBOLS must name at least one instrument"));
  assert.throws(() => loadRuntimeConfig({ EMA_LENGTH: "10.5" }), new ConfigError("EMA_LENGTH must be an integer, got 10.5"));
  assert.throws(
    () => loadRuntimeConfig({ PERSIST_INTERVAL_MS: "10" }),
    new ConfigError("PERSIST_INTERVAL_MS must be >= 1000, got 10")
  );
});

test("overrides are validated like the environment", () => {
  assert.equal(resolveEngineConfig({ regimeMinConfidence: 0.6 }).regimeMinConfidence, 0.6);
  assert.throws(() => resolveEngineConfig({ regimeMinConfidence: 2 }), ConfigError);
  assert.deepEqual(parseRoiTable("  "), []);
  assert.throws(() => parseRoiTable("-5:0.1"), new ConfigError("ROI_TABLE minutes must be >= 0, got -5"));
});
