import type { BotMode, Position, Side, SetupState, Snapshot } from "../types.js";
import type { EngineState } from "../orchestrator/instrumentEngine.js";

export interface GovernorPersistedState {
  mode?: BotMode;
  dedupe?: Record<string, number>; // key -> timestamp when sent
}

/**
 * Persisted state schema (versioned)
 */
export interface PersistedBotStateV1 {
  version: 1;
  instanceId: string;
  savedAt: number;
  engines: Record<string, EngineState>;
  governor: GovernorPersistedState;
}

export type PersistedBotState = PersistedBotStateV1;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNum(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function isSide(value: unknown): value is Side {
  return value === "LONG" || value === "SHORT";
}

function isSetupState(value: unknown, side: Side): value is SetupState {
  if (!isRecord(value)) return false;
  return (
    value.side === side &&
    typeof value.armed === "boolean" &&
    (value.armedSince === null || isNum(value.armedSince))
  );
}

function isPosition(value: unknown): value is Position {
  if (!isRecord(value)) return false;
  return (
    typeof value.symbol === "string" &&
    isSide(value.side) &&
    isNum(value.entryPrice) &&
    isNum(value.entryTs) &&
    isNum(value.initialStop) &&
    isNum(value.currentStop) &&
    isNum(value.hardStop)
  );
}

const OPTIONAL_SNAPSHOT_FIELDS = ["ema", "bbLower", "bbMiddle", "bbUpper", "mfi", "atr"] as const;

// JSON turns NaN into null, so a persisted prev may carry nulls where the bar had bad values
function toSnapshot(value: unknown): Snapshot | null | undefined {
  if (value === null) return null;
  if (!isRecord(value)) return undefined;
  const num = (v: unknown): number | undefined => (typeof v === "number" ? v : v === null ? Number.NaN : undefined);
  const ts = num(value.ts);
  const open = num(value.open);
  const high = num(value.high);
  const low = num(value.low);
  const close = num(value.close);
  const volume = num(value.volume);
  if (ts === undefined || open === undefined || high === undefined || low === undefined || close === undefined || volume === undefined) {
    return undefined;
  }
  const snapshot: Snapshot = { ts, open, high, low, close, volume };
  for (const field of OPTIONAL_SNAPSHOT_FIELDS) {
    const v = num(value[field]);
    if (v !== undefined) snapshot[field] = v;
  }
  return snapshot;
}

export function parseEngineState(value: unknown): EngineState | null {
  if (!isRecord(value) || typeof value.symbol !== "string") return null;
  const setups = value.setups;
  if (!isRecord(setups)) return null;
  const long = setups.LONG;
  const short = setups.SHORT;
  if (!isSetupState(long, "LONG") || !isSetupState(short, "SHORT")) return null;
  const position = value.position;
  if (position !== null && !isPosition(position)) return null;
  const lastTs = value.lastTs;
  if (lastTs !== null && !isNum(lastTs)) return null;
  const prev = toSnapshot(value.prev);
  if (prev === undefined) return null;
  // absent in files written before the last close was kept
  const rawClose = value.lastClose;
  const lastClose = rawClose === undefined || rawClose === null ? null : isNum(rawClose) ? rawClose : undefined;
  if (lastClose === undefined) return null;
  return {
    symbol: value.symbol,
    setups: { LONG: long, SHORT: short },
    position,
    lastTs,
    prev,
    lastClose,
  };
}

function parseGovernor(value: unknown): GovernorPersistedState {
  if (!isRecord(value)) return {};
  const out: GovernorPersistedState = {};
  if (value.mode === "QUIET" || value.mode === "ACTIVE") out.mode = value.mode;
  if (isRecord(value.dedupe)) {
    const dedupe: Record<string, number> = {};
    for (const [k, v] of Object.entries(value.dedupe)) {
      if (isNum(v)) dedupe[k] = v;
    }
    out.dedupe = dedupe;
  }
  return out;
}

/**
 * Structural check of a parsed state file. Engines that fail validation are
 * dropped individually so one corrupt instrument does not discard the rest.
 */
export function parsePersistedState(value: unknown): PersistedBotState | null {
  if (!isRecord(value) || value.version !== 1) return null;
  if (typeof value.instanceId !== "string" || !isNum(value.savedAt) || !isRecord(value.engines)) return null;

  const engines: Record<string, EngineState> = {};
  for (const [symbol, raw] of Object.entries(value.engines)) {
    const engine = parseEngineState(raw);
    if (engine && engine.symbol === symbol) {
      engines[symbol] = engine;
    } else {
      console.warn(`[persist] Dropping malformed engine state for ${symbol}`);
    }
  }

  return {
    version: 1,
    instanceId: value.instanceId,
    savedAt: value.savedAt,
    engines,
    governor: parseGovernor(value.governor),
  };
}
