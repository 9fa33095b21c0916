import assert from "node:assert/strict";
import type { EntryEvent, ExitEvent } from "../src/types.js";
import { buildTelegramAlert, formatUtcTimestamp } from "../src/telegram/telegramFormatter.js";
import { chunkString } from "../src/telegram/sendTelegramMessageSafe.js";
import { tsAt } from "./fixtures/snapshots.js";

const entry: EntryEvent = {
  type: "ENTRY",
  symbol: "BTC/USDT",
  timestamp: tsAt(2),
  side: "LONG",
  referencePrice: 95.5,
  stopPrice: 92.5,
  armedSince: tsAt(1),
};

const shortExit: ExitEvent = {
  type: "EXIT",
  symbol: "BTC/USDT",
  timestamp: tsAt(9),
  side: "SHORT",
  referencePrice: 100,
  stopPrice: 100,
  reason: "ratchet_stop",
  entryPrice: 104.5,
  entryTs: tsAt(2),
};

const losingExit: ExitEvent = {
  type: "EXIT",
  symbol: "ETH/USDT",
  timestamp: tsAt(4),
  side: "LONG",
  referencePrice: 90,
  stopPrice: 95,
  reason: "hard_stop",
  entryPrice: 100,
  entryTs: tsAt(0),
};

assert.equal(formatUtcTimestamp(tsAt(0)), "2024-01-01 00:00 UTC");
assert.equal(formatUtcTimestamp(Number.NaN), "n/a");

const entryAlert = buildTelegramAlert(entry, "test");
assert.equal(entryAlert.type, "ENTRY");
assert.deepEqual(entryAlert.lines, [
  "[test]",
  "🟢 LONG ENTRY BTC/USDT",
  "PRICE: 95.50",
  "STOP: 92.50 (R=3.00)",
  "ARMED SINCE: 2024-01-01 00:15 UTC",
  "BAR: 2024-01-01 00:30 UTC",
]);
assert.equal(entryAlert.text, entryAlert.lines.join("\n"));

assert.deepEqual(buildTelegramAlert(shortExit).lines, [
  "⏹ SHORT EXIT BTC/USDT (RATCHET STOP)",
  "PRICE: 100.00",
  "ENTRY: 104.50 | P&L: +4.31%",
  "STOP: 100.00",
  "HELD: 1h45m",
  "BAR: 2024-01-01 02:15 UTC",
]);

const lossLines = buildTelegramAlert(losingExit).lines;
assert.equal(lossLines[0], "⏹ LONG EXIT ETH/USDT (HARD STOP)");
assert.equal(lossLines[2], "ENTRY: 100.00 | P&L: -10.00%");
assert.equal(lossLines[4], "HELD: 1h");

// long alerts split on a newline past 60% of the limit
assert.deepEqual(chunkString("aaaa\nbbbb\ncc", 10), ["aaaa\nbbbb\n", "cc"]);
assert.deepEqual(chunkString("short", 10), ["short"]);

console.log("✅ Telegram formatter tests passed.");
