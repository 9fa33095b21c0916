import { loadReplayFile, replayFile, ReplayFormatError } from "../src/replay/replayRunner.js";
import { StepOrderError } from "../src/orchestrator/orchestrator.js";
import { ConfigError } from "../src/config.js";
import { formatUtcTimestamp } from "../src/telegram/telegramFormatter.js";

const inputPath = process.argv[2];
const asJson = process.argv.includes("--json");

if (!inputPath) {
  console.error("Usage: tsx scripts/replaySnapshots.ts <replay.json> [--json]");
  process.exit(1);
}

try {
  const file = await loadReplayFile(inputPath);
  const report = replayFile(file);

  if (asJson) {
    console.log(JSON.stringify({ steps: report.steps, invalidSteps: report.invalidSteps, events: report.events, stopTrail: report.stopTrail }, null, 2));
  } else {
    for (const event of report.events) {
      const when = formatUtcTimestamp(event.timestamp);
      if (event.type === "ENTRY") {
        console.log(`${when} ENTRY ${event.symbol} ${event.side} @ ${event.referencePrice} stop=${event.stopPrice}`);
      } else {
        console.log(`${when} EXIT  ${event.symbol} ${event.side} @ ${event.referencePrice} reason=${event.reason}`);
      }
    }
    console.log(`\nsteps=${report.steps} invalid=${report.invalidSteps} events=${report.events.length}`);
  }
} catch (err: unknown) {
  if (err instanceof ReplayFormatError || err instanceof StepOrderError || err instanceof ConfigError) {
    console.error(`[replay] ${err.name}: ${err.message}`);
    process.exit(2);
  }
  throw err;
}
