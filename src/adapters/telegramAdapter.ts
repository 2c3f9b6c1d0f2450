import type { AppSettings } from "../core/config";
import { NotificationDeliveryError, errorMessage } from "../core/errors";
import { logger } from "../core/logger";
import type { Signal } from "../types/models";
import { type ApiRequestLogSink, fetchWithApiLog } from "../utils/fetchWithApiLog";

export interface SignalNotifier {
  send(signal: Signal): Promise<boolean>;
  sendText(text: string): Promise<boolean>;
}

interface SignalMessageFormatter {
  formatSignal(signal: Signal): string;
}

type TelegramSettings = Pick<
  AppSettings,
  "telegramBotToken" | "telegramChatId" | "telegramBaseUrl" | "fetchTimeoutMs"
>;

const log = logger.scope("telegram");

export class TelegramAdapter implements SignalNotifier {
  constructor(
    private readonly config: TelegramSettings,
    private readonly formatter: SignalMessageFormatter,
    private readonly logSink: ApiRequestLogSink
  ) {}

  get enabled(): boolean {
    return Boolean(this.config.telegramBotToken && this.config.telegramChatId);
  }

  async send(signal: Signal): Promise<boolean> {
    return this.sendText(this.formatter.formatSignal(signal));
  }

  /** Resolves false when Telegram is not configured; throws when delivery fails. */
  async sendText(text: string): Promise<boolean> {
    if (!this.enabled) {
      log.debug("Telegram disabled; message not sent");
      return false;
    }

    const url = `${this.config.telegramBaseUrl}/bot${this.config.telegramBotToken}/sendMessage`;
    let response: Response;
    try {
      response = await fetchWithApiLog(
        url,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify({
            chat_id: this.config.telegramChatId,
            text,
            parse_mode: "HTML",
            disable_web_page_preview: true
          }),
          signal: AbortSignal.timeout(this.config.fetchTimeoutMs)
        },
        {
          provider: "telegram",
          endpoint: "/sendMessage",
          reason: "Deliver notification",
          requestPayload: { chatId: this.config.telegramChatId, length: text.length }
        },
        this.logSink
      );
    } catch (error) {
      throw new NotificationDeliveryError(`Telegram request failed: ${errorMessage(error)}`, {
        cause: error
      });
    }

    if (!response.ok) {
      throw new NotificationDeliveryError(`Telegram responded ${response.status}.`, {
        statusCode: response.status
      });
    }
    return true;
  }
}
