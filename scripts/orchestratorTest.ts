import assert from "node:assert/strict";
import { test } from "node:test";
import { resolveEngineConfig } from "../src/config.js";
import { Orchestrator, StepOrderError } from "../src/orchestrator/orchestrator.js";
import { longSetupBar, longTriggerBar, snap, tsAt } from "./fixtures/snapshots.js";

const config = resolveEngineConfig({ atrRiskFactor: 1.5 });

function withEntry(orch: Orchestrator, symbol = "BTC/USDT"): void {
  orch.processStep(symbol, snap(0));
  orch.processStep(symbol, longSetupBar(1));
  orch.processStep(symbol, longTriggerBar(2));
}

test("replay mode treats an out-of-order step as fatal", () => {
  const orch = new Orchestrator("test", config, { mode: "replay" });
  orch.processStep("BTC/USDT", snap(1));
  assert.throws(
    () => orch.processStep("BTC/USDT", snap(1)),
    (err: unknown) =>
      err instanceof StepOrderError &&
      err.symbol === "BTC/USDT" &&
      err.degradation.code === "DUPLICATE_TS" &&
      err.message === `[BTC/USDT] DUPLICATE_TS: duplicate timestamp ${tsAt(1)}`
  );
});

test("live mode drops the step and keeps running", () => {
  const orch = new Orchestrator("test", config, { mode: "live", verbose: false });
  orch.processStep("BTC/USDT", snap(2));
  const r = orch.processStep("BTC/USDT", snap(1));
  assert.equal(r.accepted, false);
  assert.equal(r.degraded?.code, "OUT_OF_ORDER");
  assert.deepEqual(orch.getStats(), { stepsAccepted: 1, stepsInvalid: 0, stepsDropped: 1, entries: 0, exits: 0 });
});

test("instruments do not share setups", () => {
  const orch = new Orchestrator("test", config, { mode: "replay" });
  orch.processStep("BTC/USDT", snap(0));
  orch.processStep("BTC/USDT", longSetupBar(1));
  orch.processStep("ETH/USDT", snap(1, { high: 95 }));

  const eth = orch.processStep("ETH/USDT", longTriggerBar(2));
  assert.deepEqual(eth.events, []);
  const btc = orch.processStep("BTC/USDT", longTriggerBar(2));
  assert.equal(btc.events[0]?.type, "ENTRY");

  assert.deepEqual(orch.getSymbols(), ["BTC/USDT", "ETH/USDT"]);
  assert.equal(orch.getPosition("ETH/USDT"), null);
  assert.equal(orch.getPosition("BTC/USDT")?.entryPrice, 95.5);
});

test("stats count invalid snapshots, entries and exits", () => {
  const orch = new Orchestrator("test", config, { mode: "replay" });
  withEntry(orch);
  orch.processStep("BTC/USDT", snap(3, { close: Number.NaN }));
  orch.processStep("BTC/USDT", snap(4, { open: 92, low: 91 }));
  assert.deepEqual(orch.getStats(), { stepsAccepted: 5, stepsInvalid: 1, stepsDropped: 0, entries: 1, exits: 1 });
});

test("status reports stop distance and locked-in R", () => {
  const orch = new Orchestrator("test", config, { mode: "replay" });
  withEntry(orch);
  // close 100 on the midline: stop moves from 92.5 to 100
  orch.processStep("BTC/USDT", snap(3));

  const [status] = orch.getStatus();
  assert.equal(status?.symbol, "BTC/USDT");
  assert.equal(status?.lastTs, tsAt(3));
  assert.equal(status?.position?.currentStop, 100);
  assert.equal(status?.distanceToStopPct, 0);
  assert.equal(status?.lockedInR, 1.5);
});

test("manual close falls back to the last close", () => {
  const orch = new Orchestrator("test", config, { mode: "replay" });
  assert.equal(orch.closePosition("BTC/USDT", tsAt(0)), null);

  withEntry(orch);
  orch.processStep("BTC/USDT", snap(3, { close: 99, high: 99.5, low: 98.5 }));
  const exit = orch.closePosition("BTC/USDT", tsAt(4));
  assert.equal(exit?.reason, "manual");
  assert.equal(exit?.referencePrice, 99);
  assert.equal(exit?.entryPrice, 95.5);
  assert.equal(orch.getPosition("BTC/USDT"), null);
  assert.equal(orch.getStats().exits, 1);
});

test("the last close survives a restore and prices a manual close", () => {
  const a = new Orchestrator("test", config, { mode: "replay" });
  withEntry(a);
  a.processStep("BTC/USDT", snap(3, { close: 99, high: 99.5, low: 98.5 }));
  assert.equal(a.exportState()["BTC/USDT"]?.lastClose, 99);

  const b = new Orchestrator("test", config, { mode: "replay", initial: a.exportState() });
  assert.equal(b.closePosition("BTC/USDT", tsAt(4))?.referencePrice, 99);
});

test("without a known close a manual close needs a price", () => {
  const a = new Orchestrator("test", config, { mode: "replay" });
  withEntry(a);
  const saved = Object.fromEntries(Object.entries(a.exportState()).map(([symbol, s]) => [symbol, { ...s, lastClose: null }]));
  const b = new Orchestrator("test", config, { mode: "replay", initial: saved });

  assert.equal(b.closePosition("BTC/USDT", tsAt(3)), null);
  assert.equal(b.getPosition("BTC/USDT")?.entryPrice, 95.5);
  assert.equal(b.closePosition("BTC/USDT", tsAt(3), 97)?.referencePrice, 97);
  assert.equal(b.getPosition("BTC/USDT"), null);
});

test("exported state restores into a new orchestrator", () => {
  const a = new Orchestrator("test", config, { mode: "replay" });
  withEntry(a);
  const b = new Orchestrator("test", config, { mode: "replay", initial: a.exportState() });
  assert.deepEqual(b.exportState(), a.exportState());
  assert.notEqual(b.getOrchId(), a.getOrchId());

  const next = snap(3, { close: 102, high: 102.5, low: 99.5 });
  assert.deepEqual(b.processStep("BTC/USDT", next), a.processStep("BTC/USDT", next));
});
