import TelegramClient, { TelegramSendError } from './telegram-client';
import { ExportSink } from './export-sink';
import { splitMessage } from './message-splitter';
import logger from '@/utils/logger';
import { getErrorMessage } from '@/utils/error-handler';
import { Sleep, computeBackoff, delay } from '@/utils/retry';
import { ExportFile } from '@/reports/formatter';

export type LegStatus = 'delivered' | 'failed' | 'skipped';

export interface DeliveryLeg {
  destination: string;
  status: LegStatus;
  attempts: number;
  error: string | null;
  /** Chat messages sent, or the file location written. */
  detail: string | null;
}

export interface DeliveryReport {
  legs: DeliveryLeg[];
  messages: string[];
  failedLegs: string[];
}

export interface DeliveryPayload {
  text: string;
  exports: ExportFile[];
}

export interface TelegramTarget {
  client: TelegramClient;
  chatId: string;
  messageLimit: number;
}

export interface DeliverySinkOptions {
  telegram?: TelegramTarget | null;
  exportSink?: ExportSink | null;
  maxRetries?: number;
  retryDelayMs?: number;
  sleep?: Sleep;
}

type SendOutcome = { ok: true; attempts: number } | { ok: false; attempts: number; error: unknown };

export class DeliverySink {
  private telegram: TelegramTarget | null;
  private exportSink: ExportSink | null;
  private maxRetries: number;
  private retryDelayMs: number;
  private sleep: Sleep;

  constructor(options: DeliverySinkOptions = {}) {
    this.telegram = options.telegram ?? null;
    this.exportSink = options.exportSink ?? null;
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 1000;
    this.sleep = options.sleep ?? delay;
  }

  /**
   * Pushes the text to the chat, then each export file. Every destination
   * gets its own leg in the report; a failed leg never stops the others.
   */
  async deliver(payload: DeliveryPayload): Promise<DeliveryReport> {
    const legs: DeliveryLeg[] = [];
    let messages: string[] = [];

    if (this.telegram) {
      messages = splitMessage(payload.text, this.telegram.messageLimit);
      legs.push(await this.sendText(this.telegram, messages));
    } else {
      legs.push({ destination: 'telegram', status: 'skipped', attempts: 0, error: null, detail: 'not configured' });
    }

    for (const file of payload.exports) {
      legs.push(await this.writeExport(file));
    }

    const failedLegs = legs.filter(leg => leg.status === 'failed').map(leg => leg.destination);

    logger.info('Report delivery finished', {
      delivered: legs.filter(leg => leg.status === 'delivered').length,
      failed: failedLegs.length,
      skipped: legs.filter(leg => leg.status === 'skipped').length,
      messageCount: messages.length
    });

    return { legs, messages, failedLegs };
  }

  private async sendText(target: TelegramTarget, chunks: string[]): Promise<DeliveryLeg> {
    const destination = `telegram:${target.chatId}`;
    let attempts = 0;

    for (let index = 0; index < chunks.length; index++) {
      const outcome = await this.sendWithRetry(target, chunks[index]);
      attempts += outcome.attempts;

      if (!outcome.ok) {
        const message = `message ${index + 1} of ${chunks.length}: ${getErrorMessage(outcome.error)}`;
        logger.error('Telegram delivery failed', { chatId: target.chatId, error: message });
        // Later chunks are held back so the chat never shows them out of order
        return { destination, status: 'failed', attempts, error: message, detail: `${index} of ${chunks.length} sent` };
      }
    }

    return { destination, status: 'delivered', attempts, error: null, detail: `${chunks.length} of ${chunks.length} sent` };
  }

  private async sendWithRetry(target: TelegramTarget, text: string): Promise<SendOutcome> {
    for (let attempt = 0; ; attempt++) {
      try {
        await target.client.sendMessage(target.chatId, text);
        return { ok: true, attempts: attempt + 1 };
      } catch (error) {
        const retryable = !(error instanceof TelegramSendError) || error.retryable;
        if (!retryable || attempt >= this.maxRetries) {
          return { ok: false, attempts: attempt + 1, error };
        }

        const retryAfterMs = error instanceof TelegramSendError ? error.retryAfterMs : undefined;
        const waitMs = computeBackoff(attempt, this.retryDelayMs, retryAfterMs);
        logger.warn('Telegram send failed, retrying', { attempt: attempt + 1, waitMs, error: getErrorMessage(error) });
        await this.sleep(waitMs);
      }
    }
  }

  private async writeExport(file: ExportFile): Promise<DeliveryLeg> {
    const destination = `export:${file.path}`;

    if (!this.exportSink) {
      return { destination, status: 'skipped', attempts: 0, error: null, detail: 'no export sink' };
    }

    try {
      const location = await this.exportSink.write(file);
      return { destination, status: 'delivered', attempts: 1, error: null, detail: location };
    } catch (error) {
      logger.error('Export delivery failed', { path: file.path, sink: this.exportSink.name, error: getErrorMessage(error) });
      return { destination, status: 'failed', attempts: 1, error: getErrorMessage(error), detail: null };
    }
  }
}

export default DeliverySink;
