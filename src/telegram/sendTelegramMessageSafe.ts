import type TelegramBot from "node-telegram-bot-api";

// Only the one method the bot needs, so tests can pass a recording stub
export type TelegramBotLike = Pick<TelegramBot, "sendMessage">;

export function chunkString(str: string, maxLen: number): string[] {
  if (str.length <= maxLen) return [str];
  const chunks: string[] = [];
  let i = 0;

  while (i < str.length) {
    let end = Math.min(i + maxLen, str.length);
    const slice = str.slice(i, end);
    const lastNewline = slice.lastIndexOf("\n");
    if (end < str.length && lastNewline > Math.floor(maxLen * 0.6)) end = i + lastNewline + 1;
    chunks.push(str.slice(i, end));
    i = end;
  }
  return chunks;
}

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

// node-telegram-bot-api rejects with the HTTP body attached when Telegram rate-limits
function retryAfterSeconds(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("response" in err)) return undefined;
  const response = err.response;
  if (typeof response !== "object" || response === null || !("body" in response)) return undefined;
  const body = response.body;
  if (typeof body !== "object" || body === null || !("parameters" in body)) return undefined;
  const parameters = body.parameters;
  if (typeof parameters !== "object" || parameters === null || !("retry_after" in parameters)) return undefined;
  const retryAfter = parameters.retry_after;
  return typeof retryAfter === "number" && retryAfter > 0 ? retryAfter : undefined;
}

export async function sendTelegramMessageSafe(
  bot: TelegramBotLike,
  chatId: number,
  text: string
): Promise<void> {
  const MAX = 3800;
  const chunks = chunkString(text, MAX);

  for (const part of chunks) {
    try {
      await bot.sendMessage(chatId, part, { disable_web_page_preview: true });
    } catch (err: unknown) {
      const retryAfter = retryAfterSeconds(err);
      if (retryAfter === undefined) throw err;
      await sleep(retryAfter * 1000);
      await bot.sendMessage(chatId, part, { disable_web_page_preview: true });
    }
    if (chunks.length > 1) await sleep(80);
  }
}
