import { TelegramApiResponseSchema, type TelegramApiResponse } from '../schemas/telegram.js';
import { TelegramAPIError, ValidationError, ConfigurationError } from '../types/errors.js';
import { Logger } from '../utils/logger.js';
import type { TelegramConfig } from '../types/index.js';

const TELEGRAM_API_BASE = 'https://api.telegram.org';
const REQUEST_TIMEOUT_MS = 10000;

export interface SendMessageOptions {
  chatId?: string;
  replyToMessageId?: number;
  disableWebPagePreview?: boolean;
}

export interface EditCaptionOptions {
  messageId: number;
  caption: string;
  chatId?: string;
}

/**
 * Where replies go. Implemented by the Bot API client; replaced by a fake in tests.
 */
export interface ReplyChannel {
  sendMessage(text: string, options?: SendMessageOptions): Promise<TelegramApiResponse>;
  editMessageCaption(options: EditCaptionOptions): Promise<TelegramApiResponse>;
}

export class TelegramService implements ReplyChannel {
  private readonly botToken: string;

  constructor(
    private readonly config: TelegramConfig,
    private readonly baseUrl: string = TELEGRAM_API_BASE
  ) {
    if (!config.botToken) {
      throw new ConfigurationError('Telegram bot token is required to deliver replies');
    }
    this.botToken = config.botToken;
  }

  async sendMessage(text: string, options: SendMessageOptions = {}): Promise<TelegramApiResponse> {
    if (!text.trim()) {
      throw new ValidationError('Telegram messages must contain non-empty text');
    }

    const chatId = this.resolveChatId(options.chatId, 'send a message');
    return this.call('sendMessage', {
      chat_id: chatId,
      text,
      disable_web_page_preview: options.disableWebPagePreview ?? false,
      ...(options.replyToMessageId !== undefined
        ? { reply_parameters: { message_id: options.replyToMessageId, allow_sending_without_reply: true } }
        : {}),
    });
  }

  async editMessageCaption(options: EditCaptionOptions): Promise<TelegramApiResponse> {
    const caption = options.caption.trim();
    if (!caption) {
      throw new ValidationError('Telegram captions must contain non-empty text');
    }

    const chatId = this.resolveChatId(options.chatId, 'edit a message caption');
    return this.call('editMessageCaption', {
      chat_id: chatId,
      message_id: options.messageId,
      caption,
    });
  }

  private resolveChatId(chatId: string | undefined, action: string): string {
    const target = chatId || this.config.channelId;
    if (!target) {
      throw new ValidationError(`A chat_id is required to ${action}`);
    }
    return target;
  }

  private async call(method: string, payload: Record<string, unknown>): Promise<TelegramApiResponse> {
    const response = await fetch(`${this.baseUrl}/bot${this.botToken}/${method}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    const body = await response.text();

    if (response.status !== 200) {
      throw new TelegramAPIError(`${method} request failed: status=${response.status}, body=${body}`, {
        method,
        status: response.status,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      throw new TelegramAPIError(`${method} response was not valid JSON`, { method });
    }

    const parsed = TelegramApiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TelegramAPIError(`${method} response had unexpected structure`, { method });
    }

    if (!parsed.data.ok) {
      throw new TelegramAPIError(`${method} failed: ${parsed.data.description ?? 'Unknown error'}`, {
        method,
      });
    }

    Logger.debug(`Telegram ${method} succeeded`, { chatId: payload.chat_id });
    return parsed.data;
  }
}
