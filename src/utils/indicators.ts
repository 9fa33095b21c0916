export type OHLCVBar = {
  ts: number;
  open?: number;
  high: number;
  low: number;
  close: number;
  volume?: number;
};

/**
 * Compute Exponential Moving Average (EMA)
 */
export function computeEMA(closes: number[], period: number): number | undefined {
  const ema = new RunningEMA(period);
  let last: number | undefined;
  for (const close of closes) last = ema.push(close);
  return last;
}

export function trueRange(current: OHLCVBar, previousClose?: number): number {
  const range = current.high - current.low;
  if (previousClose === undefined) return range;
  return Math.max(range, Math.abs(current.high - previousClose), Math.abs(current.low - previousClose));
}

/**
 * Compute Average True Range (ATR) with Wilder smoothing.
 * The first bar has no previous close, so `period + 1` bars are needed.
 */
export function computeATR(bars: OHLCVBar[], period: number): number | undefined {
  const atr = new RunningATR(period);
  let last: number | undefined;
  for (const bar of bars) last = atr.push(bar);
  return last;
}

/**
 * Compute Bollinger Bands (SMA +/- stdDev * sigma)
 */
export function computeBollingerBands(
  closes: number[],
  period: number,
  stdDev: number
): { middle: number; upper: number; lower: number } | undefined {
  if (closes.length < period) {
    return undefined;
  }

  const window = closes.slice(-period);
  const mean = window.reduce((sum, v) => sum + v, 0) / period;
  const variance = window.reduce((sum, v) => sum + Math.pow(v - mean, 2), 0) / period;
  const sigma = Math.sqrt(variance);

  return {
    middle: mean,
    upper: mean + stdDev * sigma,
    lower: mean - stdDev * sigma,
  };
}

/**
 * Compute Money Flow Index (MFI) over the last `period` bars.
 * Each bar's flow direction comes from comparing its typical price to the
 * previous bar's, so `period + 1` bars are needed.
 */
export function computeMFI(bars: OHLCVBar[], period: number): number | undefined {
  if (bars.length < period + 1) {
    return undefined;
  }

  const window = bars.slice(-(period + 1));
  let positive = 0;
  let negative = 0;
  let prevTypical: number | undefined;
  for (const bar of window) {
    const typical = (bar.high + bar.low + bar.close) / 3;
    if (prevTypical !== undefined) {
      const flow = typical * (bar.volume ?? 0);
      if (typical > prevTypical) positive += flow;
      else if (typical < prevTypical) negative += flow;
    }
    prevTypical = typical;
  }

  if (negative === 0) {
    return positive === 0 ? 50 : 100;
  }
  const ratio = positive / negative;
  return 100 - 100 / (1 + ratio);
}

/**
 * Incremental EMA, seeded with the SMA of the first `period` values.
 */
export class RunningEMA {
  private readonly multiplier: number;
  private seed: number[] = [];
  private value: number | undefined;

  constructor(private readonly period: number) {
    this.multiplier = 2 / (period + 1);
  }

  push(close: number): number | undefined {
    if (this.value !== undefined) {
      this.value = (close - this.value) * this.multiplier + this.value;
      return this.value;
    }
    this.seed.push(close);
    if (this.seed.length < this.period) return undefined;
    this.value = this.seed.reduce((sum, v) => sum + v, 0) / this.period;
    this.seed = [];
    return this.value;
  }

  current(): number | undefined {
    return this.value;
  }
}

/**
 * Incremental Wilder ATR, seeded with the SMA of the first `period` true ranges.
 */
export class RunningATR {
  private prevClose: number | undefined;
  private seed: number[] = [];
  private value: number | undefined;

  constructor(private readonly period: number) {}

  push(bar: OHLCVBar): number | undefined {
    const prevClose = this.prevClose;
    this.prevClose = bar.close;
    if (prevClose === undefined) return undefined;

    const tr = trueRange(bar, prevClose);
    if (this.value !== undefined) {
      this.value = (this.value * (this.period - 1) + tr) / this.period;
      return this.value;
    }
    this.seed.push(tr);
    if (this.seed.length < this.period) return undefined;
    this.value = this.seed.reduce((sum, v) => sum + v, 0) / this.period;
    this.seed = [];
    return this.value;
  }

  current(): number | undefined {
    return this.value;
  }
}
