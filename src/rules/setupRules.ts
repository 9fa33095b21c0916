import type { Side, Snapshot } from "../types.js";

export interface SetupCheck {
  setup: boolean;
  invalidation: boolean;
  reasons: string[];
}

const PRICE_FIELDS = ["ts", "open", "high", "low", "close", "volume"] as const satisfies ReadonlyArray<keyof Snapshot>;

const INDICATOR_FIELDS = ["ema", "bbLower", "bbMiddle", "bbUpper", "mfi", "atr"] as const satisfies ReadonlyArray<
  keyof Snapshot
>;

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

/**
 * A snapshot is usable when every field it carries is a finite number.
 * Missing indicator fields are fine (warm-up); NaN or Infinity anywhere is not.
 */
export function isSnapshotNumericallyValid(snapshot: Snapshot): boolean {
  for (const field of PRICE_FIELDS) {
    if (!isFiniteNumber(snapshot[field])) return false;
  }
  for (const field of INDICATOR_FIELDS) {
    const value = snapshot[field];
    if (value !== undefined && !isFiniteNumber(value)) return false;
  }
  return true;
}

/**
 * Long setup: bands sit entirely above the EMA, the bar never touched the EMA,
 * and price closed below the lower band.
 *
 * bbLower > ema AND low > ema AND close < bbLower
 */
export function longSetup(s: Snapshot): boolean {
  if (!isSnapshotNumericallyValid(s)) return false;
  const { ema, bbLower } = s;
  if (ema === undefined || bbLower === undefined) return false;
  return bbLower > ema && s.low > ema && s.close < bbLower;
}

/**
 * bbUpper < ema AND high < ema AND close > bbUpper
 */
export function shortSetup(s: Snapshot): boolean {
  if (!isSnapshotNumericallyValid(s)) return false;
  const { ema, bbUpper } = s;
  if (ema === undefined || bbUpper === undefined) return false;
  return bbUpper < ema && s.high < ema && s.close > bbUpper;
}

// bbLower < ema OR low < ema
export function longInvalidation(s: Snapshot): boolean {
  if (!isSnapshotNumericallyValid(s)) return false;
  const { ema, bbLower } = s;
  if (ema === undefined || bbLower === undefined) return false;
  return bbLower < ema || s.low < ema;
}

// bbUpper > ema OR high > ema
export function shortInvalidation(s: Snapshot): boolean {
  if (!isSnapshotNumericallyValid(s)) return false;
  const { ema, bbUpper } = s;
  if (ema === undefined || bbUpper === undefined) return false;
  return bbUpper > ema || s.high > ema;
}

export function rawSetup(side: Side, s: Snapshot): boolean {
  return side === "LONG" ? longSetup(s) : shortSetup(s);
}

export function invalidation(side: Side, s: Snapshot): boolean {
  return side === "LONG" ? longInvalidation(s) : shortInvalidation(s);
}

/**
 * Evaluate both predicates for one side on the current snapshot.
 * Stateless; the tracker decides which of the two wins.
 */
export function checkSetup(side: Side, s: Snapshot): SetupCheck {
  if (!isSnapshotNumericallyValid(s)) {
    return { setup: false, invalidation: false, reasons: ["snapshot has non-finite fields"] };
  }
  if (s.ema === undefined) {
    return { setup: false, invalidation: false, reasons: ["EMA unavailable (warm-up)"] };
  }
  const band = side === "LONG" ? s.bbLower : s.bbUpper;
  if (band === undefined) {
    return { setup: false, invalidation: false, reasons: ["Bollinger bands unavailable (warm-up)"] };
  }

  const setup = rawSetup(side, s);
  const invalid = invalidation(side, s);
  const reasons: string[] = [];
  if (side === "LONG") {
    reasons.push(
      `bbLower=${band.toFixed(2)} ema=${s.ema.toFixed(2)} low=${s.low.toFixed(2)} close=${s.close.toFixed(2)}`
    );
  } else {
    reasons.push(
      `bbUpper=${band.toFixed(2)} ema=${s.ema.toFixed(2)} high=${s.high.toFixed(2)} close=${s.close.toFixed(2)}`
    );
  }
  if (setup) reasons.push(`${side} setup formed`);
  if (invalid) reasons.push(`${side} setup invalidated`);
  return { setup, invalidation: invalid, reasons };
}
