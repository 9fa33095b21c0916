import { randomUUID } from "crypto";
import type {
  EngineConfig,
  EntryPolicy,
  ExitEvent,
  Position,
  RegimeSignal,
  RunMode,
  Side,
  SetupState,
  Snapshot,
  StepDegradation,
  StepResult,
} from "../types.js";
import type { TargetProfitRule } from "../rules/stopProfitRules.js";
import { StopProfitRules } from "../rules/stopProfitRules.js";
import { InstrumentEngine, type EngineState } from "./instrumentEngine.js";

/**
 * A step arrived with a timestamp that cannot follow the last accepted one.
 * Fatal in replay mode.
 */
export class StepOrderError extends Error {
  readonly symbol: string;
  readonly degradation: StepDegradation;

  constructor(symbol: string, degradation: StepDegradation) {
    super(`[${symbol}] ${degradation.code}: ${degradation.detail}`);
    this.name = "StepOrderError";
    this.symbol = symbol;
    this.degradation = degradation;
  }
}

export type OrchestratorOptions = {
  mode: RunMode;
  policy?: EntryPolicy;
  targetProfitRule?: TargetProfitRule;
  initial?: Record<string, EngineState>;
  verbose?: boolean;
};

export type InstrumentStatus = {
  symbol: string;
  lastTs: number | null;
  setups: Record<Side, SetupState>;
  position: Position | null;
  distanceToStopPct?: number;
  lockedInR?: number;
};

export type OrchestratorStats = {
  stepsAccepted: number;
  stepsInvalid: number;
  stepsDropped: number;
  entries: number;
  exits: number;
};

/**
 * Routes steps to one InstrumentEngine per symbol. Instruments never share
 * state; the only thing this class adds is the run-mode policy for steps the
 * timestamp guard rejects, and a place to read status from.
 */
export class Orchestrator {
  private readonly instanceId: string;
  private readonly orchId: string;
  private readonly config: EngineConfig;
  private readonly mode: RunMode;
  private readonly policy?: EntryPolicy;
  private readonly targetProfitRule?: TargetProfitRule;
  private readonly verbose: boolean;
  private readonly engines = new Map<string, InstrumentEngine>();
  private readonly stopRules: StopProfitRules;
  private stats: OrchestratorStats = { stepsAccepted: 0, stepsInvalid: 0, stepsDropped: 0, entries: 0, exits: 0 };

  constructor(instanceId: string, config: EngineConfig, opts: OrchestratorOptions) {
    this.instanceId = instanceId;
    this.orchId = randomUUID();
    this.config = config;
    this.mode = opts.mode;
    this.policy = opts.policy;
    this.targetProfitRule = opts.targetProfitRule;
    this.verbose = opts.verbose ?? opts.mode === "live";
    this.stopRules = new StopProfitRules(config, opts.targetProfitRule);

    for (const [symbol, state] of Object.entries(opts.initial ?? {})) {
      this.engines.set(symbol, this.createEngine(symbol, state));
    }
  }

  getInstanceId(): string {
    return this.instanceId;
  }

  getOrchId(): string {
    return this.orchId;
  }

  getMode(): RunMode {
    return this.mode;
  }

  getStats(): OrchestratorStats {
    return { ...this.stats };
  }

  getSymbols(): string[] {
    return [...this.engines.keys()].sort();
  }

  private createEngine(symbol: string, initial?: EngineState): InstrumentEngine {
    return new InstrumentEngine(symbol, this.config, {
      policy: this.policy,
      targetProfitRule: this.targetProfitRule,
      initial,
    });
  }

  private engineFor(symbol: string): InstrumentEngine {
    let engine = this.engines.get(symbol);
    if (!engine) {
      engine = this.createEngine(symbol);
      this.engines.set(symbol, engine);
    }
    return engine;
  }

  processStep(symbol: string, snapshot: Snapshot, regime?: RegimeSignal | null): StepResult {
    const result = this.engineFor(symbol).step(snapshot, regime);

    if (result.degraded) {
      this.stats.stepsDropped++;
      if (this.mode === "replay") {
        throw new StepOrderError(symbol, result.degraded);
      }
      console.warn(
        `[STALE_STEP_DROPPED] symbol=${symbol} code=${result.degraded.code} ts=${result.degraded.ts} lastTs=${result.degraded.lastTs ?? "none"}`
      );
      return result;
    }

    this.stats.stepsAccepted++;
    if (result.invalid) {
      this.stats.stepsInvalid++;
      console.warn(`[INVALID_SNAPSHOT] symbol=${symbol} ts=${snapshot.ts} state carried forward`);
      return result;
    }

    if (this.verbose) {
      for (const side of ["LONG", "SHORT"] as const) {
        const transition = result.transitions[side];
        if (transition === "ARMED" || transition === "INVALIDATED" || transition === "CLEARED") {
          console.log(`[SETUP] symbol=${symbol} side=${side} ${transition} ts=${snapshot.ts} regime=${result.regime}`);
        }
      }
      if (result.entryBlockers.length) {
        console.log(`[ENTRY_BLOCKED] symbol=${symbol} ts=${snapshot.ts} ${result.entryBlockers.join("; ")}`);
      }
    }

    for (const event of result.events) {
      if (event.type === "ENTRY") {
        this.stats.entries++;
        console.log(
          `[ENTRY] symbol=${symbol} side=${event.side} ts=${event.timestamp} price=${event.referencePrice} stop=${event.stopPrice}`
        );
      } else {
        this.stats.exits++;
        console.log(
          `[EXIT] symbol=${symbol} side=${event.side} ts=${event.timestamp} reason=${event.reason} price=${event.referencePrice}`
        );
      }
    }

    return result;
  }

  /**
   * Close a position on an external instruction, at the given price or else the last close.
   * Returns null when the symbol has nothing open or no price is known.
   */
  closePosition(symbol: string, ts: number, price?: number): ExitEvent | null {
    const engine = this.engines.get(symbol);
    if (!engine) return null;
    const reference = price ?? engine.getLastClose();
    if (reference === null) return null;
    const event = engine.closePosition(ts, reference);
    if (event) {
      this.stats.exits++;
      console.log(`[EXIT] symbol=${symbol} side=${event.side} ts=${ts} reason=manual price=${reference}`);
    }
    return event;
  }

  getPosition(symbol: string): Position | null {
    return this.engines.get(symbol)?.getPosition() ?? null;
  }

  getStatus(): InstrumentStatus[] {
    return this.getSymbols().map((symbol) => {
      const engine = this.engineFor(symbol);
      const position = engine.getPosition();
      const status: InstrumentStatus = {
        symbol,
        lastTs: engine.getLastTs(),
        setups: engine.getSetups(),
        position,
      };
      const close = engine.getLastClose();
      if (position && close !== null) {
        const ctx = this.stopRules.getContext(position, close);
        status.distanceToStopPct = ctx.distanceToStop;
        status.lockedInR = ctx.lockedInR;
      }
      return status;
    });
  }

  exportState(): Record<string, EngineState> {
    const out: Record<string, EngineState> = {};
    for (const symbol of this.getSymbols()) {
      out[symbol] = this.engineFor(symbol).exportState();
    }
    return out;
  }
}
