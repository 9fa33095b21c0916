import type { DecisionEvent } from "../types.js";

const priority: Record<DecisionEvent["type"], number> = {
  EXIT: 1,
  ENTRY: 2,
};

// Exits before entries so a consumer never sees two open positions at once
export function orderEvents<T extends DecisionEvent>(events: T[]): T[] {
  return [...events].sort((a, b) => {
    const pa = priority[a.type];
    const pb = priority[b.type];
    if (pa !== pb) return pa - pb;
    if (a.timestamp !== b.timestamp) return a.timestamp - b.timestamp;
    return a.symbol.localeCompare(b.symbol);
  });
}
