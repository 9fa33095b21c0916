import type { RegimeCategory, RegimeFilterStage, SetupState, Side, Snapshot, TriggerResult } from "../types.js";
import { isSnapshotNumericallyValid } from "./setupRules.js";
import { regimeAllowsTrigger } from "./regimeRules.js";

export interface TriggerContext {
  prev: Snapshot | null;
  curr: Snapshot;
  state: SetupState;
  regime: RegimeCategory;
  stage: RegimeFilterStage;
  mfiLowerThreshold: number;
  mfiHigherThreshold: number;
}

/**
 * Bar magnifier: the high crossing above the lower band is enough, the close does not have to.
 * high(t) > bbLower(t) AND high(t-1) <= bbLower(t-1)
 */
export function highCrossesAboveLower(prev: Snapshot | null, curr: Snapshot): boolean {
  if (!prev || !isSnapshotNumericallyValid(prev) || !isSnapshotNumericallyValid(curr)) return false;
  if (prev.bbLower === undefined || curr.bbLower === undefined) return false;
  return curr.high > curr.bbLower && prev.high <= prev.bbLower;
}

// low(t) < bbUpper(t) AND low(t-1) >= bbUpper(t-1)
export function lowCrossesBelowUpper(prev: Snapshot | null, curr: Snapshot): boolean {
  if (!prev || !isSnapshotNumericallyValid(prev) || !isSnapshotNumericallyValid(curr)) return false;
  if (prev.bbUpper === undefined || curr.bbUpper === undefined) return false;
  return curr.low < curr.bbUpper && prev.low >= prev.bbUpper;
}

const quiet = (reason: string): TriggerResult => ({ fired: false, suppressed: false, reason });

/**
 * Convert an armed setup into an entry signal for one side.
 * Never mutates the setup state; a suppressed trigger may fire on a later bar.
 */
export function detectTrigger(side: Side, ctx: TriggerContext): TriggerResult {
  const { prev, curr, state } = ctx;

  if (!state.armed) return quiet("setup not armed");
  if (curr.mfi === undefined || !Number.isFinite(curr.mfi)) return quiet("MFI unavailable");

  if (side === "LONG") {
    if (!highCrossesAboveLower(prev, curr)) return quiet("no high crossover of lower band");
    if (!(curr.mfi < ctx.mfiLowerThreshold)) {
      return quiet(`MFI ${curr.mfi.toFixed(1)} not below ${ctx.mfiLowerThreshold}`);
    }
  } else {
    if (!lowCrossesBelowUpper(prev, curr)) return quiet("no low crossunder of upper band");
    if (!(curr.mfi > ctx.mfiHigherThreshold)) {
      return quiet(`MFI ${curr.mfi.toFixed(1)} not above ${ctx.mfiHigherThreshold}`);
    }
  }

  if (ctx.stage === "trigger") {
    const verdict = regimeAllowsTrigger(ctx.regime, side);
    if (!verdict.allowed) {
      return { fired: false, suppressed: true, reason: verdict.reason };
    }
  }

  return { fired: true, suppressed: false, reason: `${side} trigger (MFI ${curr.mfi.toFixed(1)})` };
}
