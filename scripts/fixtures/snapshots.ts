import type { Position, Snapshot } from "../../src/types.js";

export const T0 = 1704067200000; // 2024-01-01T00:00:00Z
export const BAR_MS = 15 * 60 * 1000;

export const tsAt = (i: number): number => T0 + i * BAR_MS;

/**
 * A quiet bar: no setup on either side, nothing to invalidate on the long side.
 * ema=90, bands 95/100/105, close 100.
 */
export function snap(i: number, fields: Partial<Snapshot> = {}): Snapshot {
  return {
    ts: tsAt(i),
    open: 100,
    high: 101,
    low: 99,
    close: 100,
    volume: 1000,
    ema: 90,
    bbLower: 95,
    bbMiddle: 100,
    bbUpper: 105,
    mfi: 50,
    atr: 2,
    ...fields,
  };
}

// close below a lower band that sits above the EMA; high == bbLower so the next bar can cross it
export const longSetupBar = (i: number, fields: Partial<Snapshot> = {}): Snapshot =>
  snap(i, { open: 95, high: 95, low: 93, close: 94, ...fields });

// high crosses back above bbLower with MFI under 40; entry at 95.5
export const longTriggerBar = (i: number, fields: Partial<Snapshot> = {}): Snapshot =>
  snap(i, { open: 94.5, high: 96, low: 94, close: 95.5, mfi: 30, ...fields });

// long invalidation: the bar traded through the EMA
export const longInvalidationBar = (i: number, fields: Partial<Snapshot> = {}): Snapshot =>
  snap(i, { open: 95, high: 96, low: 89, close: 94, ...fields });

// mirror world for shorts: ema=110 sits above the bands
export const shortSetupBar = (i: number, fields: Partial<Snapshot> = {}): Snapshot =>
  snap(i, { ema: 110, open: 105, high: 107, low: 105, close: 106, ...fields });

export const shortTriggerBar = (i: number, fields: Partial<Snapshot> = {}): Snapshot =>
  snap(i, { ema: 110, open: 105.5, high: 106, low: 104, close: 104.5, mfi: 70, ...fields });

export const shortQuietBar = (i: number, fields: Partial<Snapshot> = {}): Snapshot =>
  snap(i, { ema: 110, ...fields });

export function longPosition(fields: Partial<Position> = {}): Position {
  return {
    symbol: "BTC/USDT",
    side: "LONG",
    entryPrice: 100,
    entryTs: tsAt(0),
    initialStop: 95,
    currentStop: 95,
    hardStop: 90,
    ...fields,
  };
}

export function shortPosition(fields: Partial<Position> = {}): Position {
  return {
    symbol: "BTC/USDT",
    side: "SHORT",
    entryPrice: 100,
    entryTs: tsAt(0),
    initialStop: 105,
    currentStop: 105,
    hardStop: 110,
    ...fields,
  };
}
