// src/datafeed/barAggregator.ts
export type Bar = {
  ts: number;        // ms epoch at bar close
  symbol: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/**
 * Folds closed 1m bars into closed N-minute bars, one aggregator per symbol.
 */
export class BarAggregator {
  private readonly bucketMs: number;
  private bucketStartTs: number | null = null;
  private cur: Bar | null = null;

  constructor(bucketMinutes: number = 15) {
    this.bucketMs = bucketMinutes * 60 * 1000;
  }

  private floorToBucket(ts: number): number {
    return Math.floor(ts / this.bucketMs) * this.bucketMs;
  }

  /**
   * Push a CLOSED 1m bar; returns a CLOSED N-minute bar when a later bucket starts.
   *
   * Bar timestamp represents the close time: bucketStart + N minutes - 1ms
   */
  push1m(bar: Bar): Bar | null {
    const start = this.floorToBucket(bar.ts);
    const barCloseTs = start + this.bucketMs - 1;

    // late 1m bar for a bucket already emitted
    if (this.bucketStartTs !== null && start < this.bucketStartTs) return null;

    if (this.cur === null || this.bucketStartTs === null) {
      if (this.bucketStartTs === start) return null; // bucket was flushed
      this.bucketStartTs = start;
      this.cur = { ...bar, ts: barCloseTs };
      return null;
    }

    if (start !== this.bucketStartTs) {
      const finished = this.cur;
      this.bucketStartTs = start;
      this.cur = { ...bar, ts: barCloseTs };
      return finished;
    }

    const c = this.cur;
    c.high = Math.max(c.high, bar.high);
    c.low = Math.min(c.low, bar.low);
    c.close = bar.close;
    c.volume += bar.volume;
    return null;
  }

  /**
   * Emit the bucket in progress, e.g. when its final 1m bar is known to have arrived.
   */
  flush(): Bar | null {
    const finished = this.cur;
    this.cur = null;
    return finished;
  }
}
