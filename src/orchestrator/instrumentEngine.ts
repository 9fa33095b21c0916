import type {
  DecisionEvent,
  EngineConfig,
  EntryPolicy,
  ExitEvent,
  Position,
  RegimeSignal,
  SetupState,
  SetupTransition,
  Side,
  Snapshot,
  StepDegradation,
  StepResult,
  TriggerResult,
} from "../types.js";
import { isSnapshotNumericallyValid } from "../rules/setupRules.js";
import { resolveRegime } from "../rules/regimeRules.js";
import { SetupTracker } from "../rules/setupTracker.js";
import { detectTrigger } from "../rules/triggerRules.js";
import { StopProfitRules, type TargetProfitRule } from "../rules/stopProfitRules.js";
import { buildEntryDecision, buildExitDecision, DEFAULT_ENTRY_POLICY, toExitEvent } from "./decisionGate.js";
import { orderEvents } from "./messageOrder.js";

export type EngineState = {
  symbol: string;
  setups: Record<Side, SetupState>;
  position: Position | null;
  lastTs: number | null;
  prev: Snapshot | null;
  lastClose: number | null; // close of the last numerically valid bar
};

export type InstrumentEngineOptions = {
  policy?: EntryPolicy;
  targetProfitRule?: TargetProfitRule;
  initial?: EngineState;
};

const NO_TRIGGER: TriggerResult = { fired: false, suppressed: false, reason: "not evaluated" };

/**
 * Everything one instrument owns: the two setup automatons, the previous
 * snapshot for crossover checks, and at most one open position.
 *
 * step() is synchronous and does no I/O, so live and replay feed the exact
 * same code path.
 */
export class InstrumentEngine {
  readonly symbol: string;
  private readonly config: EngineConfig;
  private readonly policy: EntryPolicy;
  private readonly stopRules: StopProfitRules;
  private readonly long: SetupTracker;
  private readonly short: SetupTracker;
  private position: Position | null;
  private prev: Snapshot | null;
  private lastTs: number | null;
  private lastClose: number | null;

  constructor(symbol: string, config: EngineConfig, opts: InstrumentEngineOptions = {}) {
    this.symbol = symbol;
    this.config = config;
    this.policy = opts.policy ?? DEFAULT_ENTRY_POLICY;
    this.stopRules = new StopProfitRules(config, opts.targetProfitRule);

    const initial = opts.initial;
    this.long = new SetupTracker("LONG", initial?.setups.LONG);
    this.short = new SetupTracker("SHORT", initial?.setups.SHORT);
    this.position = initial?.position ? { ...initial.position } : null;
    this.prev = initial?.prev ? { ...initial.prev } : null;
    this.lastTs = initial?.lastTs ?? null;
    this.lastClose = initial?.lastClose ?? null;
  }

  getPosition(): Position | null {
    return this.position ? { ...this.position } : null;
  }

  getCurrentStop(): number | undefined {
    return this.position?.currentStop;
  }

  getSetups(): Record<Side, SetupState> {
    return { LONG: this.long.getState(), SHORT: this.short.getState() };
  }

  getLastTs(): number | null {
    return this.lastTs;
  }

  getLastClose(): number | null {
    return this.lastClose;
  }

  exportState(): EngineState {
    return {
      symbol: this.symbol,
      setups: this.getSetups(),
      position: this.getPosition(),
      lastTs: this.lastTs,
      prev: this.prev ? { ...this.prev } : null,
      lastClose: this.lastClose,
    };
  }

  private heldTransitions(): Record<Side, SetupTransition> {
    return {
      LONG: this.long.isArmed() ? "HELD" : "IDLE",
      SHORT: this.short.isArmed() ? "HELD" : "IDLE",
    };
  }

  /**
   * Timestamp guard. Returns the reason a step must be rejected, or null.
   */
  checkOrder(ts: number): StepDegradation | null {
    if (!Number.isFinite(ts)) {
      return { code: "MALFORMED_TS", ts, lastTs: this.lastTs, detail: `non-finite timestamp ${String(ts)}` };
    }
    if (this.lastTs === null) return null;
    if (ts === this.lastTs) {
      return { code: "DUPLICATE_TS", ts, lastTs: this.lastTs, detail: `duplicate timestamp ${ts}` };
    }
    if (ts < this.lastTs) {
      return {
        code: "OUT_OF_ORDER",
        ts,
        lastTs: this.lastTs,
        detail: `timestamp ${ts} is ${this.lastTs - ts}ms behind ${this.lastTs}`,
      };
    }
    return null;
  }

  step(snapshot: Snapshot, regimeSignal?: RegimeSignal | null): StepResult {
    const regime = resolveRegime(regimeSignal, this.config.regimeMinConfidence);
    const base: Pick<StepResult, "symbol" | "ts" | "regime" | "triggers" | "entryBlockers"> = {
      symbol: this.symbol,
      ts: snapshot.ts,
      regime: regime.regime,
      triggers: { LONG: NO_TRIGGER, SHORT: NO_TRIGGER },
      entryBlockers: [],
    };

    const degraded = this.checkOrder(snapshot.ts);
    if (degraded) {
      return {
        ...base,
        accepted: false,
        degraded,
        invalid: false,
        setups: this.getSetups(),
        transitions: this.heldTransitions(),
        events: [],
        position: this.getPosition(),
      };
    }

    this.lastTs = snapshot.ts;

    if (!isSnapshotNumericallyValid(snapshot)) {
      // Nothing moves on a bad bar; it still becomes t-1 so no crossover can be read through it.
      this.prev = { ...snapshot };
      return {
        ...base,
        accepted: true,
        invalid: true,
        setups: this.getSetups(),
        transitions: this.heldTransitions(),
        events: [],
        position: this.getPosition(),
      };
    }

    this.lastClose = snapshot.close;
    const events: DecisionEvent[] = [];

    // 1) Position management, independent of setups and triggers
    let exitedThisStep = false;
    if (this.position) {
      const exit = buildExitDecision({ position: this.position, snapshot, regime, stopRules: this.stopRules });
      if (exit.event) {
        events.push(exit.event);
        exitedThisStep = true;
      }
      this.position = exit.position;
    }

    // 2) Both automatons advance on the same snapshot
    const gate = { regime: regime.regime, stage: this.config.regimeFilterStage };
    const longStep = this.long.step(snapshot, gate);
    const shortStep = this.short.step(snapshot, gate);
    const transitions: Record<Side, SetupTransition> = {
      LONG: longStep.transition,
      SHORT: shortStep.transition,
    };

    if (this.config.exclusiveSides) {
      if (longStep.transition === "ARMED" && this.short.clear()) transitions.SHORT = "CLEARED";
      if (shortStep.transition === "ARMED" && this.long.clear()) transitions.LONG = "CLEARED";
    }

    // 3) Triggers read the post-transition state
    const setups = this.getSetups();
    const triggerCtx = {
      prev: this.prev,
      curr: snapshot,
      regime: regime.regime,
      stage: this.config.regimeFilterStage,
      mfiLowerThreshold: this.config.mfiLowerThreshold,
      mfiHigherThreshold: this.config.mfiHigherThreshold,
    };
    const triggers: Record<Side, TriggerResult> = {
      LONG: detectTrigger("LONG", { ...triggerCtx, state: setups.LONG }),
      SHORT: detectTrigger("SHORT", { ...triggerCtx, state: setups.SHORT }),
    };

    // 4) At most one entry
    const decision = buildEntryDecision({
      symbol: this.symbol,
      snapshot,
      triggers,
      setups,
      openPosition: this.position,
      exitedThisStep,
      policy: this.policy,
      stopRules: this.stopRules,
    });
    if (decision.event && decision.position && decision.side) {
      events.push(decision.event);
      this.position = decision.position;
      if (this.config.consumeOnTrigger) {
        const tracker = decision.side === "LONG" ? this.long : this.short;
        if (tracker.clear()) transitions[decision.side] = "CLEARED";
      }
    }

    this.prev = { ...snapshot };

    return {
      ...base,
      accepted: true,
      invalid: false,
      setups: this.getSetups(),
      transitions,
      triggers,
      events: orderEvents(events),
      position: this.getPosition(),
      entryBlockers: decision.blockerReasons,
    };
  }

  /**
   * Close the open position on an external signal (operator or execution layer).
   */
  closePosition(ts: number, price: number): ExitEvent | null {
    if (!this.position) return null;
    const event = toExitEvent(this.position, ts, {
      reason: "manual",
      level: this.position.currentStop,
      referencePrice: price,
    });
    this.position = null;
    return event;
  }
}
