import { promises as fs } from "node:fs";
import type { DecisionEvent, EngineConfig, RegimeCategory, RegimeSignal, Snapshot, StepResult } from "../types.js";
import { resolveEngineConfig } from "../config.js";
import { Orchestrator } from "../orchestrator/orchestrator.js";

export class ReplayFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReplayFormatError";
  }
}

export type ReplayStep = {
  symbol: string;
  snapshot: Snapshot;
  regime: RegimeSignal | null;
};

export type ReplayFile = {
  config: Partial<EngineConfig>;
  steps: ReplayStep[];
};

export type StopTrailPoint = { ts: number; stop: number };

export type ReplayReport = {
  steps: number;
  invalidSteps: number;
  events: DecisionEvent[];
  stopTrail: Record<string, StopTrailPoint[]>;
  results: StepResult[];
};

const PRICE_FIELDS = ["ts", "open", "high", "low", "close", "volume"] as const;
const INDICATOR_FIELDS = ["ema", "bbLower", "bbMiddle", "bbUpper", "mfi", "atr"] as const;
const NUMERIC_CONFIG_FIELDS = [
  "atrRiskFactor",
  "mfiLowerThreshold",
  "mfiHigherThreshold",
  "hardStopFraction",
  "regimeMinConfidence",
  "trailingOffset",
  "trailingDistance",
] as const;
const BOOLEAN_CONFIG_FIELDS = ["exclusiveSides", "consumeOnTrigger", "regimeExit"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// JSON has no NaN; the string "NaN" stands in for a bad value from upstream
function readNumeric(value: unknown, where: string): number {
  if (typeof value === "number") return value;
  if (value === "NaN") return Number.NaN;
  throw new ReplayFormatError(`${where} must be a number or "NaN"`);
}

function parseSnapshot(value: unknown, where: string): Snapshot {
  if (!isRecord(value)) throw new ReplayFormatError(`${where} must be an object`);
  const [ts, open, high, low, close, volume] = PRICE_FIELDS.map((field) => readNumeric(value[field], `${where}.${field}`));
  if (ts === undefined || open === undefined || high === undefined || low === undefined || close === undefined || volume === undefined) {
    throw new ReplayFormatError(`${where} is missing price fields`);
  }
  const snapshot: Snapshot = { ts, open, high, low, close, volume };
  for (const field of INDICATOR_FIELDS) {
    const v = value[field];
    // null or absent: indicator still warming up
    if (v === undefined || v === null) continue;
    snapshot[field] = readNumeric(v, `${where}.${field}`);
  }
  return snapshot;
}

function isCategory(value: unknown): value is RegimeCategory {
  return value === "BULL" || value === "BEAR" || value === "NEUTRAL";
}

function parseRegime(value: unknown, where: string): RegimeSignal | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string") {
    if (!isCategory(value)) throw new ReplayFormatError(`${where} must be BULL, BEAR or NEUTRAL`);
    return { category: value };
  }
  if (!isRecord(value) || !isCategory(value.category)) {
    throw new ReplayFormatError(`${where}.category must be BULL, BEAR or NEUTRAL`);
  }
  const signal: RegimeSignal = { category: value.category };
  if (isRecord(value.confidence)) {
    const confidence: Partial<Record<RegimeCategory, number>> = {};
    for (const category of ["BULL", "BEAR", "NEUTRAL"] as const) {
      const p = value.confidence[category];
      if (p === undefined) continue;
      if (typeof p !== "number") throw new ReplayFormatError(`${where}.confidence.${category} must be a number`);
      confidence[category] = p;
    }
    signal.confidence = confidence;
  }
  return signal;
}

function parseConfig(value: unknown): Partial<EngineConfig> {
  if (value === undefined) return {};
  if (!isRecord(value)) throw new ReplayFormatError("config must be an object");
  const out: Partial<EngineConfig> = {};
  for (const field of NUMERIC_CONFIG_FIELDS) {
    const v = value[field];
    if (v === undefined) continue;
    if (typeof v !== "number") throw new ReplayFormatError(`config.${field} must be a number`);
    out[field] = v;
  }
  for (const field of BOOLEAN_CONFIG_FIELDS) {
    const v = value[field];
    if (v === undefined) continue;
    if (typeof v !== "boolean") throw new ReplayFormatError(`config.${field} must be a boolean`);
    out[field] = v;
  }
  const stage = value.regimeFilterStage;
  if (stage !== undefined) {
    if (stage !== "setup" && stage !== "trigger" && stage !== "none") {
      throw new ReplayFormatError("config.regimeFilterStage must be setup, trigger or none");
    }
    out.regimeFilterStage = stage;
  }
  if (value.roiTable !== undefined) {
    if (!Array.isArray(value.roiTable)) throw new ReplayFormatError("config.roiTable must be an array");
    out.roiTable = value.roiTable.map((step: unknown, i: number) => {
      if (!isRecord(step) || typeof step.afterMinutes !== "number" || typeof step.profitFraction !== "number") {
        throw new ReplayFormatError(`config.roiTable[${i}] must have numeric afterMinutes and profitFraction`);
      }
      return { afterMinutes: step.afterMinutes, profitFraction: step.profitFraction };
    });
  }
  return out;
}

/**
 * Validate a parsed replay document. A top-level "symbol" applies to every
 * step that does not name its own.
 */
export function parseReplayFile(value: unknown): ReplayFile {
  if (!isRecord(value)) throw new ReplayFormatError("replay file must be a JSON object");
  if (!Array.isArray(value.steps)) throw new ReplayFormatError("replay file must have a steps array");
  const defaultSymbol = typeof value.symbol === "string" ? value.symbol : undefined;

  const steps = value.steps.map((raw: unknown, i: number): ReplayStep => {
    const where = `steps[${i}]`;
    if (!isRecord(raw)) throw new ReplayFormatError(`${where} must be an object`);
    const symbol = typeof raw.symbol === "string" ? raw.symbol : defaultSymbol;
    if (!symbol) throw new ReplayFormatError(`${where}.symbol is required (no top-level symbol)`);
    return {
      symbol,
      snapshot: parseSnapshot(raw.snapshot, `${where}.snapshot`),
      regime: parseRegime(raw.regime, `${where}.regime`),
    };
  });

  return { config: parseConfig(value.config), steps };
}

export async function loadReplayFile(filePath: string): Promise<ReplayFile> {
  const raw = await fs.readFile(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ReplayFormatError(`${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseReplayFile(parsed);
}

/**
 * Run steps through a fresh replay-mode orchestrator. Throws StepOrderError on
 * the first out-of-order or duplicate timestamp.
 */
export function replaySteps(steps: ReplayStep[], config: EngineConfig, instanceId = "replay"): ReplayReport {
  const orch = new Orchestrator(instanceId, config, { mode: "replay" });
  const report: ReplayReport = { steps: 0, invalidSteps: 0, events: [], stopTrail: {}, results: [] };

  for (const step of steps) {
    const result = orch.processStep(step.symbol, step.snapshot, step.regime);
    report.steps++;
    if (result.invalid) report.invalidSteps++;
    report.events.push(...result.events);
    report.results.push(result);
    if (result.position) {
      const point = { ts: result.ts, stop: result.position.currentStop };
      const trail = report.stopTrail[step.symbol];
      if (trail) trail.push(point);
      else report.stopTrail[step.symbol] = [point];
    }
  }

  return report;
}

export function replayFile(file: ReplayFile, overrides: Partial<EngineConfig> = {}): ReplayReport {
  return replaySteps(file.steps, resolveEngineConfig({ ...file.config, ...overrides }));
}
