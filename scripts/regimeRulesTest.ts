import assert from "node:assert/strict";
import { test } from "node:test";
import { regimeAllowsSetup, regimeAllowsTrigger, resolveRegime } from "../src/rules/regimeRules.js";

test("absent signal defaults to NEUTRAL and says so", () => {
  for (const signal of [null, undefined]) {
    const r = resolveRegime(signal);
    assert.equal(r.regime, "NEUTRAL");
    assert.equal(r.source, "default");
    assert.deepEqual(r.reasons, ["no regime signal: NEUTRAL default"]);
  }
});

test("explicit signal passes through", () => {
  const r = resolveRegime({ category: "BEAR", confidence: { BEAR: 0.8 } });
  assert.equal(r.regime, "BEAR");
  assert.equal(r.source, "signal");
  assert.equal(r.confidence, 0.8);
});

test("confidence floor demotes weak signals to NEUTRAL", () => {
  const weak = resolveRegime({ category: "BULL", confidence: { BULL: 0.4, BEAR: 0.3 } }, 0.5);
  assert.equal(weak.regime, "NEUTRAL");
  assert.equal(weak.source, "low_confidence");
  assert.deepEqual(weak.reasons, ["BULL confidence 0.40 below 0.50: NEUTRAL"]);

  const missing = resolveRegime({ category: "BULL" }, 0.5);
  assert.equal(missing.regime, "NEUTRAL");
  assert.deepEqual(missing.reasons, ["BULL confidence n/a below 0.50: NEUTRAL"]);

  assert.equal(resolveRegime({ category: "BULL", confidence: { BULL: 0.5 } }, 0.5).regime, "BULL");
  // floor of zero ignores confidence entirely
  assert.equal(resolveRegime({ category: "BULL" }, 0).regime, "BULL");
});

test("setup-stage gate: only the opposing regime vetoes", () => {
  assert.equal(regimeAllowsSetup("BULL", "LONG").allowed, true);
  assert.equal(regimeAllowsSetup("NEUTRAL", "LONG").allowed, true);
  assert.deepEqual(regimeAllowsSetup("BEAR", "LONG"), {
    allowed: false,
    reason: "blocked: BEAR regime disallows LONG setups",
  });
  assert.equal(regimeAllowsSetup("BEAR", "SHORT").allowed, true);
  assert.equal(regimeAllowsSetup("NEUTRAL", "SHORT").allowed, true);
  assert.equal(regimeAllowsSetup("BULL", "SHORT").allowed, false);
});

test("trigger-stage gate needs the favorable regime", () => {
  assert.equal(regimeAllowsTrigger("BULL", "LONG").allowed, true);
  assert.deepEqual(regimeAllowsTrigger("NEUTRAL", "LONG"), {
    allowed: false,
    reason: "suppressed: LONG trigger needs BULL regime, got NEUTRAL",
  });
  assert.equal(regimeAllowsTrigger("BEAR", "SHORT").allowed, true);
  assert.equal(regimeAllowsTrigger("BULL", "SHORT").allowed, false);
});
