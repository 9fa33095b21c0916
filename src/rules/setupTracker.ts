import type { RegimeCategory, RegimeFilterStage, SetupState, SetupTransition, Side, Snapshot } from "../types.js";
import { checkSetup } from "./setupRules.js";
import { regimeAllowsSetup } from "./regimeRules.js";

export interface SetupGate {
  regime: RegimeCategory;
  stage: RegimeFilterStage;
}

export interface SetupStepResult {
  transition: SetupTransition;
  state: SetupState;
  reasons: string[];
}

/**
 * Per-side "potential order" automaton: IDLE ⇄ ARMED.
 *
 * Evaluated once per step, in order:
 * 1) ARMED and invalidated → IDLE (invalidation wins over a fresh setup on the same bar)
 * 2) IDLE and raw setup (and the regime gate, when filtering at setup) → ARMED at this ts
 * 3) otherwise hold
 */
export class SetupTracker {
  readonly side: Side;
  private armed: boolean;
  private armedSince: number | null;

  constructor(side: Side, initial?: SetupState) {
    this.side = side;
    this.armed = initial?.side === side ? initial.armed : false;
    this.armedSince = this.armed ? initial?.armedSince ?? null : null;
  }

  getState(): SetupState {
    return { side: this.side, armed: this.armed, armedSince: this.armedSince };
  }

  isArmed(): boolean {
    return this.armed;
  }

  step(snapshot: Snapshot, gate: SetupGate): SetupStepResult {
    const check = checkSetup(this.side, snapshot);
    const reasons = [...check.reasons];

    if (this.armed && check.invalidation) {
      this.armed = false;
      this.armedSince = null;
      return { transition: "INVALIDATED", state: this.getState(), reasons };
    }

    if (!this.armed && check.setup) {
      if (gate.stage === "setup") {
        const verdict = regimeAllowsSetup(gate.regime, this.side);
        reasons.push(verdict.reason);
        if (!verdict.allowed) {
          return { transition: "IDLE", state: this.getState(), reasons };
        }
      }
      this.armed = true;
      this.armedSince = snapshot.ts;
      return { transition: "ARMED", state: this.getState(), reasons };
    }

    return { transition: this.armed ? "HELD" : "IDLE", state: this.getState(), reasons };
  }

  /**
   * Force IDLE from outside the automaton (opposite side armed, or an entry consumed the setup).
   * Returns true when the state actually changed.
   */
  clear(): boolean {
    if (!this.armed) return false;
    this.armed = false;
    this.armedSince = null;
    return true;
  }
}
