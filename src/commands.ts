import type { Orchestrator } from "./orchestrator/orchestrator.js";
import type { MessageGovernor } from "./governor/messageGovernor.js";
import type { DecisionEvent } from "./types.js";
import { formatUtcTimestamp } from "./telegram/telegramFormatter.js";

export type PublishFn = (events: DecisionEvent[]) => Promise<void>;

export class CommandHandler {
  constructor(
    private orch: Orchestrator,
    private governor: MessageGovernor,
    private instanceId: string,
    private publish?: PublishFn,
    private startedAt: number = Date.now(),
    private now: () => number = Date.now
  ) {}

  status(): string {
    const fmt = (ts: number | null) => (ts === null ? "n/a" : formatUtcTimestamp(ts));
    const uptime = Math.floor((this.now() - this.startedAt) / 1000);
    const stats = this.orch.getStats();

    const instruments = this.orch.getStatus().flatMap((s) => {
      const armed = (["LONG", "SHORT"] as const).filter((side) => s.setups[side].armed);
      const lines = [
        `${s.symbol}: last bar ${fmt(s.lastTs)} | armed: ${armed.length ? armed.join("+") : "none"}`,
      ];
      if (s.position) {
        const p = s.position;
        const distance = s.distanceToStopPct !== undefined ? ` (${s.distanceToStopPct.toFixed(2)}% away)` : "";
        const locked = s.lockedInR !== undefined ? ` | locked ${s.lockedInR.toFixed(2)}R` : "";
        lines.push(`  ${p.side} @ ${p.entryPrice.toFixed(2)} | stop ${p.currentStop.toFixed(2)}${distance}${locked}`);
      }
      return lines;
    });

    return [
      "=== Bot Status ===",
      `Instance: ${this.instanceId}`,
      `Mode: ${this.governor.getMode()} | Run: ${this.orch.getMode()}`,
      `Uptime: ${uptime}s`,
      `Steps: ${stats.stepsAccepted} accepted, ${stats.stepsInvalid} invalid, ${stats.stepsDropped} dropped`,
      `Events: ${stats.entries} entries, ${stats.exits} exits`,
      "",
      ...(instruments.length ? instruments : ["No instruments stepped yet"]),
    ].join("\n");
  }

  /**
   * Manually close an open position (when you exit the trade yourself).
   */
  async close(symbol: string | undefined, price?: number): Promise<string> {
    if (!symbol) return "❌ Usage: /close <symbol> [price]";
    if (!this.orch.getPosition(symbol)) return `❌ No open position for ${symbol}.`;
    const event = this.orch.closePosition(symbol, this.now(), price);
    if (!event) return `❌ No bar seen yet for ${symbol}; use /close ${symbol} <price>.`;
    if (this.publish) await this.publish([event]);
    return `✅ ${event.side} ${symbol} closed manually at ${event.referencePrice.toFixed(2)} (entry ${event.entryPrice.toFixed(2)})`;
  }

  quiet(): string {
    this.governor.setMode("QUIET");
    return "🔕 Mode: QUIET (alerts suppressed)";
  }

  active(): string {
    this.governor.setMode("ACTIVE");
    return "🔔 Mode: ACTIVE (alerts on)";
  }

  /**
   * Dispatch a chat message. Returns null for anything that is not a known command.
   */
  async handleText(text: string): Promise<string | null> {
    const [command, ...args] = text.trim().split(/\s+/);
    switch (command?.replace(/@\S+$/, "")) {
      case "/status":
        return this.status();
      case "/quiet":
        return this.quiet();
      case "/active":
        return this.active();
      case "/close": {
        const priceArg = args[1];
        const price = priceArg === undefined ? undefined : Number(priceArg);
        if (price !== undefined && !(Number.isFinite(price) && price > 0)) return `❌ Invalid price: ${priceArg}`;
        return this.close(args[0]?.toUpperCase(), price);
      }
      default:
        return null;
    }
  }
}
