import type { StepResult } from "../types.js";
import type { PipelineConfig } from "../config.js";
import type { Orchestrator } from "../orchestrator/orchestrator.js";
import { BarAggregator, type Bar } from "./barAggregator.js";
import type { FeedMessage } from "./barFeed.js";
import { RegimeBook } from "./regimeBook.js";
import { SnapshotBuilder } from "./snapshotBuilder.js";

export type PipelineCounters = {
  bars1m: number;
  barsClosed: number;
  regimeUpdates: number;
  ignored: number;
};

/**
 * Feed messages in, engine steps out: 1m bars are folded into the working
 * timeframe, indicators are attached, and the closed bar is stepped with the
 * freshest regime signal for its symbol.
 */
export class LivePipeline {
  private readonly aggregators = new Map<string, BarAggregator>();
  private readonly builders = new Map<string, SnapshotBuilder>();
  private readonly regimes: RegimeBook;
  private readonly symbols: Set<string>;
  private counters: PipelineCounters = { bars1m: 0, barsClosed: 0, regimeUpdates: 0, ignored: 0 };

  constructor(
    private readonly orch: Orchestrator,
    private readonly cfg: PipelineConfig,
    symbols: string[],
    regimeMaxAgeMs: number
  ) {
    this.symbols = new Set(symbols);
    this.regimes = new RegimeBook(regimeMaxAgeMs);
  }

  /**
   * Counters since the last call; the pulse log reads and resets them.
   */
  drainCounters(): PipelineCounters {
    const out = this.counters;
    this.counters = { bars1m: 0, barsClosed: 0, regimeUpdates: 0, ignored: 0 };
    return out;
  }

  handle(msg: FeedMessage): StepResult[] {
    if (msg.kind === "regime") {
      this.counters.regimeUpdates++;
      this.regimes.update(msg.ts, msg.signal, msg.symbol);
      return [];
    }
    if (!this.symbols.has(msg.bar.symbol)) {
      this.counters.ignored++;
      return [];
    }
    this.counters.bars1m++;
    const closed = this.aggregatorFor(msg.bar.symbol).push1m(msg.bar);
    return closed ? [this.stepClosedBar(closed)] : [];
  }

  /**
   * Step an already-closed bar of the working timeframe, e.g. from a backfill.
   */
  stepClosedBar(bar: Bar): StepResult {
    this.counters.barsClosed++;
    const builder = this.builderFor(bar.symbol);
    const snapshot = builder.push(bar) ?? {
      ts: bar.ts,
      open: bar.open,
      high: bar.high,
      low: bar.low,
      close: bar.close,
      volume: bar.volume,
    };
    // a bar the builder refused still goes to the engine so the timestamp guard reports it
    return this.orch.processStep(bar.symbol, snapshot, this.regimes.lookup(bar.symbol, bar.ts));
  }

  private aggregatorFor(symbol: string): BarAggregator {
    let agg = this.aggregators.get(symbol);
    if (!agg) {
      agg = new BarAggregator(this.cfg.timeframeMinutes);
      this.aggregators.set(symbol, agg);
    }
    return agg;
  }

  private builderFor(symbol: string): SnapshotBuilder {
    let builder = this.builders.get(symbol);
    if (!builder) {
      builder = new SnapshotBuilder(this.cfg);
      this.builders.set(symbol, builder);
    }
    return builder;
  }
}
