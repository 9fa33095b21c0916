import type { DecisionEvent } from "../types.js";
import type { MessageGovernor } from "../governor/messageGovernor.js";
import type { TelegramBotLike } from "./sendTelegramMessageSafe.js";
import { sendTelegramMessageSafe } from "./sendTelegramMessageSafe.js";
import { buildTelegramAlert } from "./telegramFormatter.js";
import { orderEvents } from "../orchestrator/messageOrder.js";

export class MessagePublisher {
  // Single publish queue so batches from different symbols never interleave
  private publishQueue: Promise<void> = Promise.resolve();
  private sentCount = 0;
  private skippedCount = 0;

  constructor(
    private governor: MessageGovernor,
    private bot: TelegramBotLike,
    private chatId: number,
    private instanceId: string,
    private spacingMs: number = 100
  ) {}

  getCounters(): { sent: number; skipped: number } {
    return { sent: this.sentCount, skipped: this.skippedCount };
  }

  private async publish(event: DecisionEvent): Promise<boolean> {
    if (!this.governor.shouldSend(event)) {
      return false;
    }
    const alert = buildTelegramAlert(event, this.instanceId);
    await sendTelegramMessageSafe(this.bot, this.chatId, alert.text);
    return true;
  }

  /**
   * Publish a batch in order (exits before entries). Resolves once this batch
   * and every batch queued before it has been sent.
   */
  async publishOrdered(events: DecisionEvent[]): Promise<void> {
    if (events.length === 0) return;

    const run = this.publishQueue.then(() => this.publishOrderedInternal(events));
    // a failed batch must not wedge the queue for later ones
    this.publishQueue = run.catch((err: unknown) => {
      console.error(`[PUB] batch failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    await run;
  }

  private async publishOrderedInternal(events: DecisionEvent[]): Promise<void> {
    const orderedEvents = orderEvents(events);
    const total = orderedEvents.length;

    for (const [idx, event] of orderedEvents.entries()) {
      const startTime = Date.now();
      console.log(`[PUB] sending ${event.type} symbol=${event.symbol} idx=${idx + 1}/${total}`);

      const sent = await this.publish(event);
      if (sent) {
        this.sentCount++;
        console.log(`[PUB] done ${event.type} durationMs=${Date.now() - startTime}`);
        if (this.spacingMs > 0) await new Promise((r) => setTimeout(r, this.spacingMs));
      } else {
        this.skippedCount++;
        console.log(`[PUB] skipped ${event.type} (blocked by governor)`);
      }
    }
  }
}
