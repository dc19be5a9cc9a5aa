/**
 * Alert sink selection.
 */

import type { Logger } from "../logging/logger";
import { ConsoleAlertSink } from "./consoleAlertSink";
import { TelegramAlertSink } from "./telegramAlertSink";
import type { AlertSink } from "./types";

export type { AlertSeverity, AlertSink } from "./types";
export { ConsoleAlertSink } from "./consoleAlertSink";
export { TelegramAlertSink, formatAlert } from "./telegramAlertSink";

/**
 * Telegram when a bot token and chat id are configured, the log otherwise.
 */
export function createAlertSink(
  telegram: { botToken: string | null; chatId: string | null },
  logger: Logger
): AlertSink {
  if (telegram.botToken && telegram.chatId) {
    logger.info("Alerts go to Telegram");
    return new TelegramAlertSink({ botToken: telegram.botToken, chatId: telegram.chatId }, logger);
  }
  logger.info("Alerts go to the log (Telegram not configured)");
  return new ConsoleAlertSink(logger);
}
