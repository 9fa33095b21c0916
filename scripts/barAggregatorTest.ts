import assert from "node:assert/strict";
import { test } from "node:test";
import { BarAggregator, type Bar } from "../src/datafeed/barAggregator.js";

const T = 1704067200000; // bucket-aligned
const MIN = 60_000;

const bar = (minute: number, fields: Partial<Bar> = {}): Bar => ({
  ts: T + minute * MIN,
  symbol: "BTC/USDT",
  open: 10,
  high: 10,
  low: 10,
  close: 10,
  volume: 1,
  ...fields,
});

test("1m bars fold into a 15m bar stamped at the bucket close", () => {
  const agg = new BarAggregator(15);
  assert.equal(agg.push1m(bar(0, { open: 10, high: 11, low: 9, close: 10.5, volume: 100 })), null);
  assert.equal(agg.push1m(bar(5, { open: 10.5, high: 12, low: 10, close: 11, volume: 50 })), null);
  assert.equal(agg.push1m(bar(14, { open: 11, high: 11.5, low: 8.5, close: 9, volume: 25 })), null);

  const closed = agg.push1m(bar(15, { open: 9 }));
  assert.deepEqual(closed, {
    ts: T + 15 * MIN - 1,
    symbol: "BTC/USDT",
    open: 10,
    high: 12,
    low: 8.5,
    close: 9,
    volume: 175,
  });
});

test("late bars for an emitted bucket are dropped", () => {
  const agg = new BarAggregator(15);
  agg.push1m(bar(0));
  agg.push1m(bar(16, { high: 20 }));
  assert.equal(agg.push1m(bar(10, { high: 99 })), null);

  const closed = agg.push1m(bar(30));
  assert.equal(closed?.ts, T + 30 * MIN - 1);
  assert.equal(closed?.high, 20);
});

test("flush emits the bucket in progress once and ignores its stragglers", () => {
  const agg = new BarAggregator(15);
  agg.push1m(bar(0, { close: 11 }));
  const flushed = agg.flush();
  assert.equal(flushed?.close, 11);
  assert.equal(agg.flush(), null);

  assert.equal(agg.push1m(bar(14, { close: 12 })), null);
  assert.equal(agg.push1m(bar(15, { close: 13 })), null);
  assert.equal(agg.flush()?.close, 13);
});
