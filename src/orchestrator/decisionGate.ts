import type {
  EntryEvent,
  EntryPolicy,
  ExitEvent,
  Position,
  SetupState,
  Side,
  Snapshot,
  TriggerResult,
} from "../types.js";
import type { RegimeResult } from "../rules/regimeRules.js";
import type { ExitCheck, StopProfitRules } from "../rules/stopProfitRules.js";

export type EntryStatus = "NO_TRIGGER" | "BLOCKED" | "ENTER";
export type EntryBlocker =
  | "side_disabled"
  | "conflicting_triggers"
  | "position_open"
  | "exited_this_step"
  | "stop_unavailable";

export type EntryDecisionInputs = {
  symbol: string;
  snapshot: Snapshot;
  triggers: Record<Side, TriggerResult>;
  setups: Record<Side, SetupState>;
  openPosition: Position | null;
  exitedThisStep: boolean;
  policy: EntryPolicy;
  stopRules: StopProfitRules;
};

export type EntryDecision = {
  decisionId: string;
  status: EntryStatus;
  blockers: EntryBlocker[];
  blockerReasons: string[];
  side?: Side;
  event?: EntryEvent;
  position?: Position;
};

export type ExitDecisionInputs = {
  position: Position;
  snapshot: Snapshot;
  regime: RegimeResult;
  stopRules: StopProfitRules;
};

export type ExitDecision = {
  event?: ExitEvent;
  check?: ExitCheck;
  position: Position | null; // null once closed, otherwise the (possibly tightened) position
};

const SIDES: readonly Side[] = ["LONG", "SHORT"];

export const DEFAULT_ENTRY_POLICY: EntryPolicy = {
  sidesEnabled: { LONG: true, SHORT: true },
  allowEntryOnExitStep: false,
};

/**
 * Sequence trigger output into at most one entry for this step.
 * No computation of its own beyond the position policy.
 */
export function buildEntryDecision(inputs: EntryDecisionInputs): EntryDecision {
  const { symbol, snapshot, triggers, setups, openPosition, exitedThisStep, policy, stopRules } = inputs;
  const blockers: EntryBlocker[] = [];
  const blockerReasons: string[] = [];

  const fired: Side[] = [];
  for (const side of SIDES) {
    if (!triggers[side].fired) continue;
    if (!policy.sidesEnabled[side]) {
      blockers.push("side_disabled");
      blockerReasons.push(`${side} entries disabled by policy`);
      continue;
    }
    fired.push(side);
  }

  const decisionId = `${symbol}_${snapshot.ts}_${fired.join("+") || "none"}`;
  const blocked = (): EntryDecision => ({ decisionId, status: "BLOCKED", blockers, blockerReasons });

  const side = fired[0];
  if (side === undefined) {
    return blockers.length ? blocked() : { decisionId, status: "NO_TRIGGER", blockers, blockerReasons };
  }

  if (fired.length > 1) {
    blockers.push("conflicting_triggers");
    blockerReasons.push("LONG and SHORT triggered on the same bar");
    return blocked();
  }

  if (openPosition) {
    blockers.push("position_open");
    blockerReasons.push(`${openPosition.side} position already open since ${openPosition.entryTs}`);
    return blocked();
  }

  if (exitedThisStep && !policy.allowEntryOnExitStep) {
    blockers.push("exited_this_step");
    blockerReasons.push("position closed on this bar");
    return blocked();
  }

  const position = stopRules.openPosition(symbol, side, snapshot);
  if (!position) {
    blockers.push("stop_unavailable");
    blockerReasons.push("ATR unavailable; cannot place initial stop");
    return blocked();
  }

  const event: EntryEvent = {
    type: "ENTRY",
    symbol,
    timestamp: snapshot.ts,
    side,
    referencePrice: position.entryPrice,
    stopPrice: position.initialStop,
    armedSince: setups[side].armedSince ?? snapshot.ts,
  };

  return { decisionId, status: "ENTER", blockers, blockerReasons, side, event, position };
}

export function toExitEvent(position: Position, timestamp: number, check: ExitCheck): ExitEvent {
  return {
    type: "EXIT",
    symbol: position.symbol,
    timestamp,
    side: position.side,
    referencePrice: check.referencePrice,
    stopPrice: check.level,
    reason: check.reason,
    entryPrice: position.entryPrice,
    entryTs: position.entryTs,
  };
}

/**
 * Exit side of the composer: stop breach / target / regime flip against the
 * stop as it stood before this bar, else ratchet the stop on this bar's close.
 */
export function buildExitDecision(inputs: ExitDecisionInputs): ExitDecision {
  const { position, snapshot, regime, stopRules } = inputs;
  const check = stopRules.checkExit(position, snapshot, regime);
  if (check) {
    return { event: toExitEvent(position, snapshot.ts, check), check, position: null };
  }
  return { position: stopRules.advance(position, snapshot) };
}
