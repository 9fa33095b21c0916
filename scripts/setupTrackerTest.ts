import assert from "node:assert/strict";
import { test } from "node:test";
import { SetupTracker, type SetupGate } from "../src/rules/setupTracker.js";
import { longInvalidationBar, longSetupBar, shortSetupBar, snap, tsAt } from "./fixtures/snapshots.js";

const open: SetupGate = { regime: "NEUTRAL", stage: "setup" };

test("arming is re-entrant after invalidation", () => {
  const tracker = new SetupTracker("LONG");
  const bars = [longSetupBar(1), longSetupBar(2), longSetupBar(3), longInvalidationBar(4), longSetupBar(5)];
  const transitions = bars.map((b) => tracker.step(b, open).transition);

  assert.deepEqual(transitions, ["ARMED", "HELD", "HELD", "INVALIDATED", "ARMED"]);
  // armedSince is the most recent arming, not the first one
  assert.deepEqual(tracker.getState(), { side: "LONG", armed: true, armedSince: tsAt(5) });
});

test("armedSince stays at the first bar while repeated setups hold", () => {
  const tracker = new SetupTracker("LONG");
  tracker.step(longSetupBar(1), open);
  tracker.step(longSetupBar(2), open);
  tracker.step(snap(3), open);
  assert.equal(tracker.getState().armedSince, tsAt(1));
});

test("a bar whose lower band drops under the EMA disarms", () => {
  const tracker = new SetupTracker("LONG");
  tracker.step(longSetupBar(1), open);
  const r = tracker.step(longSetupBar(2, { bbLower: 89, close: 88, low: 91 }), open);
  assert.equal(r.transition, "INVALIDATED");
  assert.equal(tracker.isArmed(), false);
});

test("an idle tracker ignores invalidation", () => {
  const tracker = new SetupTracker("LONG");
  assert.equal(tracker.step(longInvalidationBar(1), open).transition, "IDLE");
});

test("setup-stage regime gate blocks arming against the regime", () => {
  const tracker = new SetupTracker("LONG");
  const r = tracker.step(longSetupBar(1), { regime: "BEAR", stage: "setup" });
  assert.equal(r.transition, "IDLE");
  assert.equal(r.reasons[r.reasons.length - 1], "blocked: BEAR regime disallows LONG setups");
  assert.equal(tracker.step(longSetupBar(2), { regime: "BULL", stage: "setup" }).transition, "ARMED");
});

test("the gate is ignored when filtering at trigger or not at all", () => {
  for (const stage of ["trigger", "none"] as const) {
    const tracker = new SetupTracker("SHORT");
    assert.equal(tracker.step(shortSetupBar(1), { regime: "BULL", stage }).transition, "ARMED");
  }
});

test("an armed setup is not disturbed by a later opposing regime", () => {
  const tracker = new SetupTracker("LONG");
  tracker.step(longSetupBar(1), open);
  assert.equal(tracker.step(snap(2), { regime: "BEAR", stage: "setup" }).transition, "HELD");
});

test("non-finite snapshot leaves state untouched", () => {
  const tracker = new SetupTracker("LONG");
  tracker.step(longSetupBar(1), open);
  const r = tracker.step(longInvalidationBar(2, { low: Number.NaN }), open);
  assert.equal(r.transition, "HELD");
  assert.equal(tracker.getState().armedSince, tsAt(1));
});

test("clear() reports whether anything changed", () => {
  const tracker = new SetupTracker("SHORT", { side: "SHORT", armed: true, armedSince: tsAt(0) });
  assert.equal(tracker.clear(), true);
  assert.equal(tracker.clear(), false);
  assert.deepEqual(tracker.getState(), { side: "SHORT", armed: false, armedSince: null });
});

test("restored state for the wrong side is ignored", () => {
  const tracker = new SetupTracker("LONG", { side: "SHORT", armed: true, armedSince: tsAt(0) });
  assert.equal(tracker.isArmed(), false);
});
