import type { BotMode, DecisionEvent } from "../types.js";
import type { GovernorPersistedState } from "../persistence/persistedState.js";

export type GovernorOptions = {
  dedupeMaxKeys?: number;
  dedupeTtlMs?: number;
  now?: () => number;
};

export function getDedupeKey(event: DecisionEvent): string {
  return `${event.symbol}_${event.type}_${event.timestamp}`;
}

export class MessageGovernor {
  private mode: BotMode = "ACTIVE";
  private dedupe: Map<string, number> = new Map();
  private readonly dedupeMaxKeys: number;
  private readonly dedupeTtlMs: number;
  private readonly now: () => number;

  constructor(initial?: GovernorPersistedState, opts: GovernorOptions = {}) {
    this.dedupeMaxKeys = opts.dedupeMaxKeys ?? Number(process.env.DEDUPE_MAX_KEYS || 2500);
    this.dedupeTtlMs = opts.dedupeTtlMs ?? Number(process.env.DEDUPE_TTL_MS || 48 * 60 * 60 * 1000); // 48h
    this.now = opts.now ?? Date.now;

    if (initial?.mode) this.mode = initial.mode;
    if (initial?.dedupe) {
      for (const [k, v] of Object.entries(initial.dedupe)) {
        if (Number.isFinite(v)) this.dedupe.set(k, v);
      }
      this.pruneDedupe(this.now());
    }
  }

  setMode(mode: BotMode): void {
    this.mode = mode;
  }

  getMode(): BotMode {
    return this.mode;
  }

  getDedupeSize(): number {
    return this.dedupe.size;
  }

  exportState(): GovernorPersistedState {
    const dedupe: Record<string, number> = {};
    for (const [k, v] of this.dedupe.entries()) dedupe[k] = v;
    return {
      mode: this.mode,
      dedupe: Object.keys(dedupe).length ? dedupe : undefined,
    };
  }

  private pruneDedupe(nowMs: number): void {
    // TTL prune
    for (const [k, v] of this.dedupe.entries()) {
      if (nowMs - v > this.dedupeTtlMs) this.dedupe.delete(k);
    }

    // Size prune (remove oldest)
    if (this.dedupe.size <= this.dedupeMaxKeys) return;
    const entries = [...this.dedupe.entries()].sort((a, b) => a[1] - b[1]);
    const toRemove = this.dedupe.size - this.dedupeMaxKeys;
    for (const [key] of entries.slice(0, toRemove)) this.dedupe.delete(key);
  }

  private hasDedupe(key: string, nowMs: number): boolean {
    const v = this.dedupe.get(key);
    if (v === undefined) return false;
    if (nowMs - v > this.dedupeTtlMs) {
      this.dedupe.delete(key);
      return false;
    }
    return true;
  }

  /**
   * Single choke point for all outbound alerts.
   * Returns true if the event should be sent, and records it so a replayed
   * step after restart is not announced twice.
   */
  shouldSend(event: DecisionEvent): boolean {
    if (this.mode === "QUIET") return false;

    const nowMs = this.now();
    const key = getDedupeKey(event);
    if (this.hasDedupe(key, nowMs)) return false;
    this.dedupe.set(key, nowMs);
    this.pruneDedupe(nowMs);
    return true;
  }
}
