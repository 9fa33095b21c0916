import type { RegimeSignal } from "../types.js";

type Entry = { ts: number; signal: RegimeSignal };

/**
 * Latest regime classification per symbol, with a market-wide fallback.
 * A signal older than maxAgeMs at the bar's timestamp is treated as absent,
 * so a stale symbol entry falls through to a fresh market-wide one.
 */
export class RegimeBook {
  private global: Entry | null = null;
  private bySymbol = new Map<string, Entry>();

  constructor(private readonly maxAgeMs: number) {}

  update(ts: number, signal: RegimeSignal, symbol?: string): void {
    const entry = { ts, signal };
    if (symbol) {
      const current = this.bySymbol.get(symbol);
      if (!current || current.ts <= ts) this.bySymbol.set(symbol, entry);
      return;
    }
    if (!this.global || this.global.ts <= ts) this.global = entry;
  }

  lookup(symbol: string, atTs: number): RegimeSignal | null {
    for (const entry of [this.bySymbol.get(symbol), this.global]) {
      if (entry && this.isFresh(entry, atTs)) return entry.signal;
    }
    return null;
  }

  private isFresh(entry: Entry, atTs: number): boolean {
    return this.maxAgeMs <= 0 || atTs - entry.ts <= this.maxAgeMs;
  }
}
