/**
 * Telegram alert sink.
 *
 * Messages are queued and sent one at a time with a small gap (Telegram
 * allows roughly 30 messages per second). `notify` returns at once;
 * delivery failures are retried, then logged.
 */

import TelegramBot from "node-telegram-bot-api";
import { getErrorMessage } from "../errors";
import type { Logger } from "../logging/logger";
import { sleep } from "../utils/timeout";
import type { AlertSeverity, AlertSink } from "./types";

export interface TelegramAlertConfig {
  botToken: string;
  chatId: string;
}

/**
 * The part of the bot API the sink uses.
 */
export interface TelegramSender {
  sendMessage(
    chatId: string,
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<unknown>;
}

const SEVERITY_ICONS: Record<AlertSeverity, string> = {
  info: "ℹ️",
  warning: "⚠️",
  critical: "🚨",
};

const MAX_RETRIES = 3;
const SEND_GAP_MS = 100;

function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

/**
 * Render an alert as Telegram HTML.
 */
export function formatAlert(
  severity: AlertSeverity,
  message: string,
  context?: Record<string, unknown>
): string {
  const lines = [`${SEVERITY_ICONS[severity]} <b>${severity.toUpperCase()}</b>`, escapeHtml(message)];
  if (context) {
    for (const [key, value] of Object.entries(context)) {
      if (value === undefined) continue;
      lines.push(`<code>${escapeHtml(key)}</code>: ${escapeHtml(String(value))}`);
    }
  }
  return lines.join("\n");
}

export class TelegramAlertSink implements AlertSink {
  private readonly sender: TelegramSender;
  private readonly queue: string[] = [];
  private draining: Promise<void> | null = null;

  constructor(
    private readonly config: TelegramAlertConfig,
    private readonly logger: Logger,
    sender?: TelegramSender
  ) {
    this.sender = sender ?? new TelegramBot(config.botToken, { polling: false });
  }

  notify(severity: AlertSeverity, message: string, context?: Record<string, unknown>): void {
    this.queue.push(formatAlert(severity, message, context));
    this.drain().catch((error: unknown) => {
      this.logger.error("Telegram alert queue failed", { error: getErrorMessage(error) });
    });
  }

  /**
   * Resolves once every queued message has been attempted.
   */
  async flush(): Promise<void> {
    await this.drain();
  }

  get pending(): number {
    return this.queue.length;
  }

  /**
   * One drain loop at a time; callers share the running one.
   */
  private drain(): Promise<void> {
    if (!this.draining) {
      this.draining = this.sendQueued().finally(() => {
        this.draining = null;
      });
    }
    return this.draining;
  }

  private async sendQueued(): Promise<void> {
    for (let message = this.queue.shift(); message !== undefined; message = this.queue.shift()) {
      await this.deliver(message);
      if (this.queue.length > 0) await sleep(SEND_GAP_MS);
    }
  }

  private async deliver(message: string): Promise<void> {
    for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
      try {
        await this.sender.sendMessage(this.config.chatId, message, {
          parse_mode: "HTML",
          disable_web_page_preview: true,
        });
        return;
      } catch (error) {
        if (attempt === MAX_RETRIES) {
          this.logger.error("Telegram alert not delivered", {
            attempts: attempt,
            error: getErrorMessage(error),
          });
          return;
        }
        await sleep(SEND_GAP_MS * attempt);
      }
    }
  }
}
