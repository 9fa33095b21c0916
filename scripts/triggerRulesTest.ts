import assert from "node:assert/strict";
import { test } from "node:test";
import type { SetupState, Snapshot } from "../src/types.js";
import { detectTrigger, highCrossesAboveLower, lowCrossesBelowUpper, type TriggerContext } from "../src/rules/triggerRules.js";
import { longSetupBar, longTriggerBar, shortSetupBar, shortTriggerBar, snap, tsAt } from "./fixtures/snapshots.js";

const armedLong: SetupState = { side: "LONG", armed: true, armedSince: tsAt(1) };
const armedShort: SetupState = { side: "SHORT", armed: true, armedSince: tsAt(1) };

function ctx(prev: Snapshot | null, curr: Snapshot, fields: Partial<TriggerContext> = {}): TriggerContext {
  return {
    prev,
    curr,
    state: armedLong,
    regime: "NEUTRAL",
    stage: "setup",
    mfiLowerThreshold: 40,
    mfiHigherThreshold: 60,
    ...fields,
  };
}

test("bar magnifier: the high crossing the lower band is enough", () => {
  const prev = snap(1, { high: 103, bbLower: 104 });
  const curr = snap(2, { high: 105, bbLower: 104, close: 103.5, mfi: 35 });
  assert.equal(highCrossesAboveLower(prev, curr), true);
  const r = detectTrigger("LONG", ctx(prev, curr));
  assert.deepEqual(r, { fired: true, suppressed: false, reason: "LONG trigger (MFI 35.0)" });
});

test("no crossover when the previous high was already above the band", () => {
  const prev = snap(1, { high: 104.5, bbLower: 104 });
  const curr = snap(2, { high: 105, bbLower: 104, mfi: 35 });
  assert.equal(highCrossesAboveLower(prev, curr), false);
  assert.equal(detectTrigger("LONG", ctx(prev, curr)).reason, "no high crossover of lower band");
});

test("MFI must be strictly below the lower threshold", () => {
  const r = detectTrigger("LONG", ctx(longSetupBar(1), longTriggerBar(2, { mfi: 40 })));
  assert.deepEqual(r, { fired: false, suppressed: false, reason: "MFI 40.0 not below 40" });
});

test("unarmed side never fires", () => {
  const r = detectTrigger("LONG", ctx(longSetupBar(1), longTriggerBar(2), { state: { side: "LONG", armed: false, armedSince: null } }));
  assert.equal(r.fired, false);
  assert.equal(r.reason, "setup not armed");
});

test("first step has no previous snapshot", () => {
  assert.equal(detectTrigger("LONG", ctx(null, longTriggerBar(2))).reason, "no high crossover of lower band");
});

test("a non-finite previous snapshot blocks the crossover", () => {
  const prev = longSetupBar(1, { close: Number.NaN });
  assert.equal(highCrossesAboveLower(prev, longTriggerBar(2)), false);
});

test("missing MFI is quiet", () => {
  assert.equal(detectTrigger("LONG", ctx(longSetupBar(1), longTriggerBar(2, { mfi: undefined }))).reason, "MFI unavailable");
});

test("short trigger: low crosses under the upper band with MFI above 60", () => {
  const prev = shortSetupBar(1);
  const curr = shortTriggerBar(2);
  assert.equal(lowCrossesBelowUpper(prev, curr), true);
  assert.deepEqual(detectTrigger("SHORT", ctx(prev, curr, { state: armedShort })), {
    fired: true,
    suppressed: false,
    reason: "SHORT trigger (MFI 70.0)",
  });
  assert.equal(
    detectTrigger("SHORT", ctx(prev, shortTriggerBar(2, { mfi: 60 }), { state: armedShort })).reason,
    "MFI 60.0 not above 60"
  );
});

test("trigger-stage filter suppresses without touching state", () => {
  const r = detectTrigger("LONG", ctx(longSetupBar(1), longTriggerBar(2), { stage: "trigger", regime: "NEUTRAL" }));
  assert.deepEqual(r, {
    fired: false,
    suppressed: true,
    reason: "suppressed: LONG trigger needs BULL regime, got NEUTRAL",
  });
  assert.equal(detectTrigger("LONG", ctx(longSetupBar(1), longTriggerBar(2), { stage: "trigger", regime: "BULL" })).fired, true);
});

test("setup-stage filter does not apply at trigger time", () => {
  assert.equal(detectTrigger("LONG", ctx(longSetupBar(1), longTriggerBar(2), { stage: "setup", regime: "BEAR" })).fired, true);
});
