import type { DecisionEvent, EntryEvent, ExitEvent, ExitReason, Side } from "../types.js";
import { profitFraction } from "../rules/stopProfitRules.js";

export type TelegramAlert = {
  type: DecisionEvent["type"];
  lines: string[];
  text: string;
};

const formatPrice = (value: number): string => (Number.isFinite(value) ? value.toFixed(2) : "n/a");

export function formatUtcTimestamp(ts: number): string {
  if (!Number.isFinite(ts)) return "n/a";
  const iso = new Date(ts).toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

function sideEmoji(side: Side): string {
  return side === "LONG" ? "🟢" : "🔴";
}

const EXIT_LABELS: Record<ExitReason, string> = {
  ratchet_stop: "RATCHET STOP",
  hard_stop: "HARD STOP",
  target_profit: "TARGET PROFIT",
  regime_flip: "REGIME FLIP",
  manual: "MANUAL",
};

function formatDuration(ms: number): string {
  const minutes = Math.max(0, Math.round(ms / 60_000));
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest ? `${hours}h${rest}m` : `${hours}h`;
}

function entryLines(event: EntryEvent): string[] {
  const risk = Math.abs(event.referencePrice - event.stopPrice);
  return [
    `${sideEmoji(event.side)} ${event.side} ENTRY ${event.symbol}`,
    `PRICE: ${formatPrice(event.referencePrice)}`,
    `STOP: ${formatPrice(event.stopPrice)} (R=${risk.toFixed(2)})`,
    `ARMED SINCE: ${formatUtcTimestamp(event.armedSince)}`,
    `BAR: ${formatUtcTimestamp(event.timestamp)}`,
  ];
}

function exitLines(event: ExitEvent): string[] {
  const pnl = 100 * profitFraction(event.side, event.entryPrice, event.referencePrice);
  const sign = pnl > 0 ? "+" : "";
  return [
    `⏹ ${event.side} EXIT ${event.symbol} (${EXIT_LABELS[event.reason]})`,
    `PRICE: ${formatPrice(event.referencePrice)}`,
    `ENTRY: ${formatPrice(event.entryPrice)} | P&L: ${sign}${pnl.toFixed(2)}%`,
    `STOP: ${formatPrice(event.stopPrice)}`,
    `HELD: ${formatDuration(event.timestamp - event.entryTs)}`,
    `BAR: ${formatUtcTimestamp(event.timestamp)}`,
  ];
}

export function buildTelegramAlert(event: DecisionEvent, instanceId?: string): TelegramAlert {
  const body = event.type === "ENTRY" ? entryLines(event) : exitLines(event);
  const lines = instanceId ? [`[${instanceId}]`, ...body] : body;
  return { type: event.type, lines, text: lines.join("\n") };
}
