import type { Snapshot } from "../types.js";
import type { PipelineConfig } from "../config.js";
import type { Bar } from "./barAggregator.js";
import { computeBollingerBands, computeMFI, RunningATR, RunningEMA, type OHLCVBar } from "../utils/indicators.js";

/**
 * Turns closed bars of one symbol into engine snapshots. Indicator fields stay
 * undefined until their own warm-up is satisfied, so the engine sees warm-up
 * the same way it sees any other missing indicator.
 */
export class SnapshotBuilder {
  private readonly ema: RunningEMA;
  private readonly atr: RunningATR;
  private readonly closes: number[] = [];
  private readonly bars: OHLCVBar[] = [];
  private lastTs: number | null = null;

  constructor(private readonly cfg: Omit<PipelineConfig, "timeframeMinutes">) {
    this.ema = new RunningEMA(cfg.emaLength);
    this.atr = new RunningATR(cfg.atrLength);
  }

  getBarCount(): number {
    return this.closes.length;
  }

  /**
   * Bars must arrive in increasing ts order; anything else is ignored and returns null.
   */
  push(bar: Bar): Snapshot | null {
    if (this.lastTs !== null && bar.ts <= this.lastTs) return null;
    this.lastTs = bar.ts;

    const ema = this.ema.push(bar.close);
    const atr = this.atr.push(bar);

    this.closes.push(bar.close);
    if (this.closes.length > this.cfg.bbLength) this.closes.shift();
    this.bars.push(bar);
    if (this.bars.length > this.cfg.mfiLength + 1) this.bars.shift();

    const bands = computeBollingerBands(this.closes, this.cfg.bbLength, this.cfg.bbStdDev);
    const mfi = computeMFI(this.bars, this.cfg.mfiLength);

    return {
      ts: bar.ts,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
      ema,
      bbLower: bands?.lower,
      bbMiddle: bands?.middle,
      bbUpper: bands?.upper,
      mfi,
      atr,
    };
  }
}
