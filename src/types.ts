export type Side = "LONG" | "SHORT";

export type RegimeCategory = "BULL" | "BEAR" | "NEUTRAL";

// Where the regime gate is consulted: while arming, at trigger time, or never
export type RegimeFilterStage = "setup" | "trigger" | "none";

export type RunMode = "replay" | "live";

export type ExitReason = "ratchet_stop" | "hard_stop" | "target_profit" | "regime_flip" | "manual";

/**
 * One closed candle plus the indicators derived from it.
 * Indicator fields stay undefined until the pipeline's warm-up is satisfied.
 */
export type Snapshot = {
  ts: number; // ms epoch at bar close
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  ema?: number;
  bbLower?: number;
  bbMiddle?: number;
  bbUpper?: number;
  mfi?: number;
  atr?: number;
};

export type RegimeSignal = {
  category: RegimeCategory;
  confidence?: Partial<Record<RegimeCategory, number>>; // probability in [0, 1]
};

export type SetupState = {
  side: Side;
  armed: boolean;
  armedSince: number | null;
};

export type Position = {
  symbol: string;
  side: Side;
  entryPrice: number;
  entryTs: number;
  initialStop: number;
  currentStop: number; // only ever tightens
  hardStop: number; // fixed worst-case bound, never ratcheted
};

export type EntryEvent = {
  type: "ENTRY";
  symbol: string;
  timestamp: number;
  side: Side;
  referencePrice: number;
  stopPrice: number;
  armedSince: number;
};

export type ExitEvent = {
  type: "EXIT";
  symbol: string;
  timestamp: number;
  side: Side;
  referencePrice: number;
  stopPrice: number;
  reason: ExitReason;
  entryPrice: number;
  entryTs: number;
};

export type DecisionEvent = EntryEvent | ExitEvent;

export type RoiStep = {
  afterMinutes: number;
  profitFraction: number;
};

export type EngineConfig = {
  atrRiskFactor: number;
  mfiLowerThreshold: number;
  mfiHigherThreshold: number;
  hardStopFraction: number;
  regimeFilterStage: RegimeFilterStage;
  regimeMinConfidence: number; // 0 disables the confidence floor
  exclusiveSides: boolean; // arming one side clears the other
  consumeOnTrigger: boolean; // an entry disarms the side that produced it
  regimeExit: boolean; // opposing regime closes the open position
  roiTable: RoiStep[]; // empty = no target-profit exit
  trailingOffset: number; // profit fraction on close that starts the trailing stop
  trailingDistance: number; // trailing stop gap as a fraction of close; 0 disables
};

export type EntryPolicy = {
  sidesEnabled: Record<Side, boolean>;
  allowEntryOnExitStep: boolean;
};

export type StepDegradationCode = "OUT_OF_ORDER" | "DUPLICATE_TS" | "MALFORMED_TS";

export type StepDegradation = {
  code: StepDegradationCode;
  ts: number;
  lastTs: number | null;
  detail: string;
};

export type SetupTransition = "ARMED" | "INVALIDATED" | "HELD" | "IDLE" | "CLEARED";

export type TriggerResult = {
  fired: boolean;
  suppressed: boolean;
  reason: string;
};

export type StepResult = {
  symbol: string;
  ts: number;
  accepted: boolean;
  degraded?: StepDegradation;
  invalid: boolean; // numerically invalid snapshot, state carried forward
  regime: RegimeCategory;
  setups: Record<Side, SetupState>;
  transitions: Record<Side, SetupTransition>;
  triggers: Record<Side, TriggerResult>;
  events: DecisionEvent[];
  position: Position | null;
  entryBlockers: string[];
};

// Outbound alert mode: QUIET suppresses every push, ACTIVE sends decision events
export type BotMode = "QUIET" | "ACTIVE";
