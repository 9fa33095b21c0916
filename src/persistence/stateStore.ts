import { promises as fs } from "node:fs";
import path from "node:path";
import type { PersistedBotState } from "./persistedState.js";
import { parsePersistedState } from "./persistedState.js";

function getDefaultStateFile(instanceId: string): string {
  return `/tmp/ratchet-state-${instanceId}.json`;
}

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class StateStore {
  private stateFile: string;

  constructor(instanceId: string, stateFile?: string) {
    this.stateFile = stateFile || process.env.STATE_FILE || getDefaultStateFile(instanceId);
  }

  getPath(): string {
    return this.stateFile;
  }

  async load(): Promise<PersistedBotState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.stateFile, "utf8");
    } catch (err: unknown) {
      if (errorCode(err) === "ENOENT") {
        // File doesn't exist yet - that's fine
        return null;
      }
      console.warn(`[persist] Failed to load state: ${errorMessage(err)}`);
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err: unknown) {
      console.warn(`[persist] State file is not valid JSON: ${errorMessage(err)}`);
      return null;
    }

    const state = parsePersistedState(parsed);
    if (!state) {
      console.warn(`[persist] Unsupported or malformed state in ${this.stateFile}, ignoring`);
      return null;
    }
    return state;
  }

  async save(state: PersistedBotState): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.stateFile), { recursive: true });
      // write-then-rename so a crash mid-write leaves the previous file intact
      const tmp = `${this.stateFile}.tmp`;
      await fs.writeFile(tmp, JSON.stringify(state, null, 2) + "\n", "utf8");
      await fs.rename(tmp, this.stateFile);
    } catch (err: unknown) {
      console.warn(`[persist] Failed to save state: ${errorMessage(err)}`);
      throw err;
    }
  }
}
