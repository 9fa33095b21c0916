import { initTelegram } from "./telegram/telegram.js";
import { sendTelegramMessageSafe } from "./telegram/sendTelegramMessageSafe.js";
import { Orchestrator, StepOrderError } from "./orchestrator/orchestrator.js";
import { MessageGovernor } from "./governor/messageGovernor.js";
import { MessagePublisher } from "./telegram/messagePublisher.js";
import { CommandHandler } from "./commands.js";
import { WsBarFeed } from "./datafeed/barFeed.js";
import { LivePipeline } from "./datafeed/livePipeline.js";
import { StateStore } from "./persistence/stateStore.js";
import type { PersistedBotState } from "./persistence/persistedState.js";
import { loadEngineConfig, loadEntryPolicy, loadRuntimeConfig } from "./config.js";
import type { DecisionEvent } from "./types.js";

const runtime = loadRuntimeConfig();
const engineConfig = loadEngineConfig();
const policy = loadEntryPolicy();
const instanceId = runtime.instanceId;

console.log("=== STARTUP INVENTORY ===");
console.log(`INSTANCE_ID: ${instanceId}`);
console.log(`SYMBOLS: ${runtime.symbols.join(",")}`);
console.log(`RUN_MODE: ${runtime.mode}`);
console.log(`TIMEFRAME: ${runtime.pipeline.timeframeMinutes}m`);
console.log(`ENGINE: ${JSON.stringify(engineConfig)}`);
console.log(`POLICY: ${JSON.stringify(policy)}`);
console.log(`BAR_FEED_URL: ${runtime.barFeedUrl ?? "not_set"}`);
console.log("=========================");

const store = new StateStore(instanceId, runtime.stateFile);
const persisted = await store.load();
if (persisted) {
  console.log(`[persist] Restored ${Object.keys(persisted.engines).length} instrument(s) from ${store.getPath()}`);
}

const governor = new MessageGovernor(persisted?.governor);
const orch = new Orchestrator(instanceId, engineConfig, {
  mode: runtime.mode,
  policy,
  initial: persisted?.engines,
});
const pipeline = new LivePipeline(orch, runtime.pipeline, runtime.symbols, runtime.regimeMaxAgeMs);

const telegram = initTelegram();
const publisher = telegram ? new MessagePublisher(governor, telegram.bot, telegram.chatId, instanceId) : null;
if (!telegram) {
  console.warn(`[${instanceId}] TELEGRAM_BOT_TOKEN not set - alerts are logged only`);
}

async function publish(events: DecisionEvent[]): Promise<void> {
  if (publisher) await publisher.publishOrdered(events);
}

const commands = new CommandHandler(orch, governor, instanceId, publish);

if (telegram) {
  const { bot, chatId } = telegram;
  bot.on("message", (msg) => {
    if (msg.chat.id !== chatId || !msg.text) return;
    commands
      .handleText(msg.text)
      .then((reply) => (reply ? sendTelegramMessageSafe(bot, chatId, reply) : undefined))
      .catch((err: unknown) => {
        console.error(`[cmd] ${msg.text} failed: ${err instanceof Error ? err.message : String(err)}`);
      });
  });
  bot.on("polling_error", (err) => {
    console.warn(`[telegram] polling error: ${err.message}`);
  });
}

function snapshotState(): PersistedBotState {
  return {
    version: 1,
    instanceId,
    savedAt: Date.now(),
    engines: orch.exportState(),
    governor: governor.exportState(),
  };
}

function logStructuredPulse(): void {
  const counters = pipeline.drainCounters();
  const pulse = {
    mode: governor.getMode(),
    ...counters,
    ...orch.getStats(),
    instruments: orch.getStatus().map((s) => ({
      symbol: s.symbol,
      lastTs: s.lastTs,
      armed: { LONG: s.setups.LONG.armed, SHORT: s.setups.SHORT.armed },
      position: s.position ? s.position.side : null,
      stop: s.position?.currentStop ?? null,
    })),
  };
  console.log(`[PULSE] ${JSON.stringify(pulse)}`);
}

const pulseTimer = setInterval(logStructuredPulse, 60000);

// Periodic state persistence
const persistTimer = setInterval(() => {
  store.save(snapshotState()).catch((err: unknown) => {
    console.warn(`[persist] save failed: ${err instanceof Error ? err.message : String(err)}`);
  });
}, runtime.persistIntervalMs);

const feed = runtime.barFeedUrl
  ? new WsBarFeed({ url: runtime.barFeedUrl, symbols: runtime.symbols, token: process.env.BAR_FEED_TOKEN })
  : null;

async function runFeed(source: WsBarFeed): Promise<void> {
  console.log(`[${instanceId}] Starting bar processing loop...`);
  for await (const msg of source.messages()) {
    try {
      const results = pipeline.handle(msg);
      for (const result of results) await publish(result.events);
    } catch (processError: unknown) {
      if (processError instanceof StepOrderError) throw processError;
      // Log processing errors but keep the loop alive
      const message = processError instanceof Error ? processError.message : String(processError);
      console.error(`[${instanceId}] Error processing feed message:`, message);
    }
  }
}

if (feed) {
  runFeed(feed)
    .catch((err: unknown) => {
      console.error(`[${instanceId}] Feed loop stopped: ${err instanceof Error ? err.message : String(err)}`);
      return shutdown("FEED_STOPPED", 1);
    })
    .catch((err: unknown) => {
      console.error(`[${instanceId}] shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
} else {
  console.log(`[${instanceId}] No BAR_FEED_URL - bot running without market data feed`);
}

let shuttingDown = false;
async function shutdown(signal: string, exitCode = 0): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`[${instanceId}] ${signal} received, saving state...`);
  clearInterval(pulseTimer);
  clearInterval(persistTimer);
  feed?.close();
  if (telegram) await telegram.bot.stopPolling();
  try {
    await store.save(snapshotState());
  } finally {
    process.exit(exitCode);
  }
}

for (const signal of ["SIGTERM", "SIGINT"] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      console.error(`[${instanceId}] shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
  });
}
