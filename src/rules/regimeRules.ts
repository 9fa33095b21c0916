import type { RegimeCategory, RegimeSignal, Side } from "../types.js";

export interface RegimeResult {
  regime: RegimeCategory;
  source: "signal" | "default" | "low_confidence" | "malformed";
  confidence?: number;
  reasons: string[];
}

const CATEGORIES: ReadonlySet<string> = new Set<RegimeCategory>(["BULL", "BEAR", "NEUTRAL"]);

export function isRegimeCategory(value: unknown): value is RegimeCategory {
  return typeof value === "string" && CATEGORIES.has(value);
}

export function favorableRegime(side: Side): RegimeCategory {
  return side === "LONG" ? "BULL" : "BEAR";
}

export function opposingRegime(side: Side): RegimeCategory {
  return side === "LONG" ? "BEAR" : "BULL";
}

/**
 * Resolve the regime for one step.
 * No signal (cold start, model missing, feature disabled) → NEUTRAL, which permits both sides.
 * With a confidence floor, a signal below the floor for its own category also falls back to NEUTRAL.
 */
export function resolveRegime(signal: RegimeSignal | null | undefined, minConfidence: number = 0): RegimeResult {
  if (signal === null || signal === undefined) {
    return { regime: "NEUTRAL", source: "default", reasons: ["no regime signal: NEUTRAL default"] };
  }
  if (!isRegimeCategory(signal.category)) {
    return {
      regime: "NEUTRAL",
      source: "malformed",
      reasons: [`unrecognized regime category "${String(signal.category)}": NEUTRAL default`],
    };
  }

  const confidence = signal.confidence?.[signal.category];
  if (minConfidence > 0) {
    if (confidence === undefined || !Number.isFinite(confidence) || confidence < minConfidence) {
      const shown = confidence === undefined ? "n/a" : confidence.toFixed(2);
      return {
        regime: "NEUTRAL",
        source: "low_confidence",
        confidence,
        reasons: [`${signal.category} confidence ${shown} below ${minConfidence.toFixed(2)}: NEUTRAL`],
      };
    }
  }

  return {
    regime: signal.category,
    source: "signal",
    confidence,
    reasons: [`regime=${signal.category}`],
  };
}

/**
 * Setup-stage gate: only the opposing regime vetoes arming.
 * BEAR blocks LONG, BULL blocks SHORT, NEUTRAL allows both.
 */
export function regimeAllowsSetup(regime: RegimeCategory, side: Side): { allowed: boolean; reason: string } {
  if (regime === opposingRegime(side)) {
    return { allowed: false, reason: `blocked: ${regime} regime disallows ${side} setups` };
  }
  return { allowed: true, reason: `allowed: ${regime} regime` };
}

/**
 * Trigger-stage gate: the entry needs the favorable regime outright.
 */
export function regimeAllowsTrigger(regime: RegimeCategory, side: Side): { allowed: boolean; reason: string } {
  const needed = favorableRegime(side);
  if (regime !== needed) {
    return { allowed: false, reason: `suppressed: ${side} trigger needs ${needed} regime, got ${regime}` };
  }
  return { allowed: true, reason: `allowed: ${regime} regime` };
}
