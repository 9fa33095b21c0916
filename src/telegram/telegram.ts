import TelegramBot from "node-telegram-bot-api";

/**
 * Telegram is optional: without a token the bot runs log-only.
 */
export function initTelegram(env: Record<string, string | undefined> = process.env): { bot: TelegramBot; chatId: number } | null {
  const token = env.TELEGRAM_BOT_TOKEN?.trim();
  if (!token) return null;
  const chatIdStr = env.TELEGRAM_CHAT_ID?.trim();
  if (!chatIdStr) throw new Error("Missing required env: TELEGRAM_CHAT_ID");
  const chatId = Number(chatIdStr);
  if (!Number.isFinite(chatId)) throw new Error("TELEGRAM_CHAT_ID must be a number");

  const bot = new TelegramBot(token, { polling: true });
  return { bot, chatId };
}
