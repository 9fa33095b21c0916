import type { EngineConfig, ExitReason, Position, RoiStep, Side, Snapshot } from "../types.js";
import type { RegimeResult } from "./regimeRules.js";
import { opposingRegime } from "./regimeRules.js";
import { isFiniteNumber, isSnapshotNumericallyValid } from "./setupRules.js";

export interface RulesContext {
  distanceToStop: number; // percentage (using close as denominator)
  distanceToStopDollars: number;
  distanceToHardStopDollars: number;

  risk: number; // |entry - initialStop| per unit
  lockedInR: number; // (currentStop - entry) / risk, signed in the trade's favor
  profitPercent: number;
  stopTightened: boolean; // currentStop has moved off initialStop
}

export interface ExitCheck {
  reason: ExitReason;
  level: number;
  referencePrice: number;
}

/**
 * Externally supplied take-profit rule. Evaluated on close, after the stop checks.
 */
export type TargetProfitRule = (position: Position, snapshot: Snapshot) => boolean;

export type StopRulesConfig = Pick<
  EngineConfig,
  "atrRiskFactor" | "hardStopFraction" | "regimeExit" | "roiTable" | "trailingOffset" | "trailingDistance"
>;

export function profitFraction(side: Side, entryPrice: number, price: number): number {
  return side === "LONG" ? (price - entryPrice) / entryPrice : (entryPrice - price) / entryPrice;
}

/**
 * Time-decaying ROI table: after N minutes in the trade, exit once profit on close reaches the fraction.
 * The step with the largest afterMinutes not exceeding the elapsed time applies.
 */
export function buildRoiRule(table: RoiStep[]): TargetProfitRule | undefined {
  if (table.length === 0) return undefined;
  const steps = [...table].sort((a, b) => a.afterMinutes - b.afterMinutes);

  return (position, snapshot) => {
    const elapsedMinutes = (snapshot.ts - position.entryTs) / 60_000;
    let threshold: number | undefined;
    for (const step of steps) {
      if (step.afterMinutes <= elapsedMinutes) threshold = step.profitFraction;
    }
    if (threshold === undefined) return false;
    return profitFraction(position.side, position.entryPrice, snapshot.close) >= threshold;
  };
}

/**
 * Ratchet stop engine for a single open position.
 *
 * LONG:  initial = close - k*atr; while close >= bbMiddle the stop moves to
 *        max(current, max(close - k*atr, bbMiddle)); otherwise it holds.
 * SHORT: mirror image with min and the band direction reversed.
 *
 * Trailing take-profit (off when trailingDistance is 0): once profit on close
 * reaches trailingOffset, close*(1 - trailingDistance) (long) or
 * close*(1 + trailingDistance) (short) joins the candidates and the tighter wins.
 *
 * Every update is a max (long) or min (short) against the previous value,
 * so the stop cannot loosen.
 */
export class StopProfitRules {
  private readonly targetRule?: TargetProfitRule;

  constructor(private readonly config: StopRulesConfig, targetRule?: TargetProfitRule) {
    this.targetRule = targetRule ?? buildRoiRule(config.roiTable);
  }

  initialStop(side: Side, close: number, atr: number): number {
    const offset = this.config.atrRiskFactor * atr;
    return side === "LONG" ? close - offset : close + offset;
  }

  hardStopLevel(side: Side, entryPrice: number): number {
    const f = this.config.hardStopFraction;
    return side === "LONG" ? entryPrice * (1 - f) : entryPrice * (1 + f);
  }

  /**
   * Open a position at the trigger bar's close. Undefined when ATR is not available yet.
   */
  openPosition(symbol: string, side: Side, snapshot: Snapshot): Position | undefined {
    if (!isSnapshotNumericallyValid(snapshot) || !isFiniteNumber(snapshot.atr)) return undefined;
    const initialStop = this.initialStop(side, snapshot.close, snapshot.atr);
    return {
      symbol,
      side,
      entryPrice: snapshot.close,
      entryTs: snapshot.ts,
      initialStop,
      currentStop: initialStop,
      hardStop: this.hardStopLevel(side, snapshot.close),
    };
  }

  /**
   * Tighter of the fresh ATR trail and the band midline, or undefined when
   * the close is on the wrong side of the midline (no ratchet this step).
   */
  ratchetCandidate(side: Side, snapshot: Snapshot): number | undefined {
    if (!isSnapshotNumericallyValid(snapshot)) return undefined;
    const { close, bbMiddle, atr } = snapshot;
    if (bbMiddle === undefined || atr === undefined) return undefined;

    const offset = this.config.atrRiskFactor * atr;
    if (side === "LONG") {
      if (close < bbMiddle) return undefined;
      const trail = close - offset;
      return trail < bbMiddle ? bbMiddle : trail;
    }
    if (close > bbMiddle) return undefined;
    const trail = close + offset;
    return trail > bbMiddle ? bbMiddle : trail;
  }

  /**
   * Trailing take-profit level, or undefined while disabled or below the offset.
   */
  trailingCandidate(position: Position, snapshot: Snapshot): number | undefined {
    const { trailingOffset, trailingDistance } = this.config;
    if (trailingDistance <= 0 || !isSnapshotNumericallyValid(snapshot)) return undefined;
    const { side, entryPrice } = position;
    if (profitFraction(side, entryPrice, snapshot.close) < trailingOffset) return undefined;
    return side === "LONG" ? snapshot.close * (1 - trailingDistance) : snapshot.close * (1 + trailingDistance);
  }

  advance(position: Position, snapshot: Snapshot): Position {
    const tighter = position.side === "LONG" ? Math.max : Math.min;
    let next = position.currentStop;
    const candidates = [this.ratchetCandidate(position.side, snapshot), this.trailingCandidate(position, snapshot)];
    for (const candidate of candidates) {
      if (candidate !== undefined) next = tighter(next, candidate);
    }
    if (next === position.currentStop) return position;
    return { ...position, currentStop: next };
  }

  /**
   * Intrabar stop check against the stop as it stood before this bar.
   *
   * LONG: hit when low <= level. With both levels inside the bar, the higher one
   * is reached first on the way down; equal levels count as the ratchet.
   * Fill at the level, or at the open when the bar gapped through it.
   */
  stopBreach(position: Position, snapshot: Snapshot): ExitCheck | null {
    const { currentStop, hardStop } = position;

    if (position.side === "LONG") {
      const ratchetHit = snapshot.low <= currentStop;
      const hardHit = snapshot.low <= hardStop;
      if (!ratchetHit && !hardHit) return null;
      const ratchetFirst = ratchetHit && currentStop >= hardStop;
      const level = ratchetFirst ? currentStop : hardStop;
      return {
        reason: ratchetFirst ? "ratchet_stop" : "hard_stop",
        level,
        referencePrice: snapshot.open < level ? snapshot.open : level,
      };
    }

    const ratchetHit = snapshot.high >= currentStop;
    const hardHit = snapshot.high >= hardStop;
    if (!ratchetHit && !hardHit) return null;
    const ratchetFirst = ratchetHit && currentStop <= hardStop;
    const level = ratchetFirst ? currentStop : hardStop;
    return {
      reason: ratchetFirst ? "ratchet_stop" : "hard_stop",
      level,
      referencePrice: snapshot.open > level ? snapshot.open : level,
    };
  }

  /**
   * Full exit evaluation for one step: stops first (intrabar), then target profit
   * and regime flip (both on close).
   */
  checkExit(position: Position, snapshot: Snapshot, regime: RegimeResult): ExitCheck | null {
    if (!isSnapshotNumericallyValid(snapshot)) return null;

    const breach = this.stopBreach(position, snapshot);
    if (breach) return breach;

    if (this.targetRule && this.targetRule(position, snapshot)) {
      return { reason: "target_profit", level: position.currentStop, referencePrice: snapshot.close };
    }

    if (this.config.regimeExit && regime.source === "signal" && regime.regime === opposingRegime(position.side)) {
      return { reason: "regime_flip", level: position.currentStop, referencePrice: snapshot.close };
    }

    return null;
  }

  /**
   * Operator-facing numbers for an open position. Information only, no decisions.
   */
  getContext(position: Position, close: number): RulesContext {
    const { side, entryPrice, initialStop, currentStop, hardStop } = position;

    // LONG: dStop = close - stop; SHORT: dStop = stop - close
    const distanceToStopDollars = side === "LONG" ? close - currentStop : currentStop - close;
    const distanceToHardStopDollars = side === "LONG" ? close - hardStop : hardStop - close;
    const distanceToStop = 100 * (distanceToStopDollars / close);

    // risk = |entry - initialStop|
    const risk = Math.abs(entryPrice - initialStop);
    const lockedIn = side === "LONG" ? currentStop - entryPrice : entryPrice - currentStop;
    const lockedInR = risk > 0 ? lockedIn / risk : 0;

    return {
      distanceToStop,
      distanceToStopDollars,
      distanceToHardStopDollars,
      risk,
      lockedInR,
      profitPercent: 100 * profitFraction(side, entryPrice, close),
      stopTightened: currentStop !== initialStop,
    };
  }
}
