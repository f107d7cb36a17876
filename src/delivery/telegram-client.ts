import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '@/utils/logger';
import { DeliveryFailed, getErrorMessage } from '@/utils/error-handler';

export interface TelegramClientOptions {
  botToken: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

const sendResultSchema = z.object({
  ok: z.literal(true),
  result: z.object({ message_id: z.number() })
});

const apiErrorSchema = z.object({
  ok: z.literal(false),
  error_code: z.number().optional(),
  description: z.string().optional(),
  parameters: z.object({ retry_after: z.number().optional() }).optional()
});

/** A failed Bot API call. `retryAfterMs` is set when Telegram asked us to wait. */
export class TelegramSendError extends DeliveryFailed {
  readonly status: number | null;
  readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    options: { status: number | null; retryAfterMs?: number; retryable: boolean; cause?: unknown }
  ) {
    super(message, ['telegram'], {
      cause: options.cause,
      retryable: options.retryable,
      context: { status: options.status }
    });
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }
}

export class TelegramClient {
  private httpClient: AxiosInstance;

  constructor(options: TelegramClientOptions) {
    this.httpClient = axios.create({
      baseURL: `https://api.telegram.org/bot${options.botToken}`,
      timeout: options.timeoutMs ?? 15000,
      adapter: options.adapter,
      headers: { 'Content-Type': 'application/json' }
    });
  }

  /** Sends plain text and returns the Telegram message id. */
  async sendMessage(chatId: string, text: string): Promise<number> {
    try {
      const response = await this.httpClient.post<unknown>('/sendMessage', {
        chat_id: chatId,
        text,
        disable_web_page_preview: true
      });

      const parsed = sendResultSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new TelegramSendError('Unexpected response from Telegram sendMessage', {
          status: response.status,
          retryable: false,
          cause: parsed.error
        });
      }

      logger.debug('Telegram message sent', { chatId, messageId: parsed.data.result.message_id, length: text.length });
      return parsed.data.result.message_id;

    } catch (error) {
      if (error instanceof TelegramSendError) {
        throw error;
      }
      throw this.toSendError(error);
    }
  }

  private toSendError(error: unknown): TelegramSendError {
    if (!axios.isAxiosError(error)) {
      return new TelegramSendError(`Telegram sendMessage failed: ${getErrorMessage(error)}`, {
        status: null,
        retryable: false,
        cause: error
      });
    }

    const response = error.response;
    if (!response) {
      return new TelegramSendError(`Telegram sendMessage failed: ${error.message}`, {
        status: null,
        retryable: true,
        cause: error
      });
    }

    const parsed = apiErrorSchema.safeParse(response.data);
    const description = parsed.success && parsed.data.description ? parsed.data.description : error.message;
    const retryAfter = parsed.success ? parsed.data.parameters?.retry_after : undefined;

    return new TelegramSendError(`Telegram sendMessage failed (${response.status}): ${description}`, {
      status: response.status,
      retryAfterMs: retryAfter !== undefined ? retryAfter * 1000 : undefined,
      retryable: response.status === 429 || response.status >= 500,
      cause: error
    });
  }
}

export default TelegramClient;
