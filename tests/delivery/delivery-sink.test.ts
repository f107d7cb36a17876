import { describe, it, expect } from 'vitest';
import DeliverySink from '@/delivery/delivery-sink';
import TelegramClient from '@/delivery/telegram-client';
import { ExportFile } from '@/reports/formatter';
import { MemoryExportSink } from '../helpers/memory-export-sink';
import { FakeHandler, fakeTransport, noSleep, recordingSleep, requestBody, sequence } from '../helpers/fake-axios';

const ok = (id: number) => ({ status: 200, data: { ok: true, result: { message_id: id } } });
const badRequest = { status: 400, data: { ok: false, error_code: 400, description: 'Bad Request: chat not found' } };
const serverError = { status: 500, data: { ok: false, error_code: 500, description: 'Internal Server Error' } };

function telegram(handler: FakeHandler, messageLimit = 4096) {
  const transport = fakeTransport(handler);
  return {
    transport,
    target: { client: new TelegramClient({ botToken: 'test-token', adapter: transport.adapter }), chatId: '123', messageLimit }
  };
}

const csvFile: ExportFile = { path: 'daily/2024-01-01/campaign_report.csv', format: 'csv', contentType: 'text/csv', content: 'a,b\n' };
const jsonFile: ExportFile = { path: 'daily/2024-01-01/campaign_report.json', format: 'json', contentType: 'application/json', content: '{}' };

const text = 'first paragraph\n\nsecond paragraph';

describe('DeliverySink', () => {
  it('sends chunks in order and writes every export', async () => {
    const { transport, target } = telegram(sequence(ok(1), ok(2)), 20);
    const exportSink = new MemoryExportSink();
    const sink = new DeliverySink({ telegram: target, exportSink, sleep: noSleep });

    const result = await sink.deliver({ text, exports: [csvFile, jsonFile] });

    expect(result.messages).toEqual(['first paragraph\n\n', 'second paragraph']);
    expect(transport.calls.map(call => requestBody(call))).toEqual([
      { chat_id: '123', text: 'first paragraph\n\n', disable_web_page_preview: true },
      { chat_id: '123', text: 'second paragraph', disable_web_page_preview: true }
    ]);
    expect(result.legs).toEqual([
      { destination: 'telegram:123', status: 'delivered', attempts: 2, error: null, detail: '2 of 2 sent' },
      { destination: `export:${csvFile.path}`, status: 'delivered', attempts: 1, error: null, detail: `memory/${csvFile.path}` },
      { destination: `export:${jsonFile.path}`, status: 'delivered', attempts: 1, error: null, detail: `memory/${jsonFile.path}` }
    ]);
    expect(result.failedLegs).toEqual([]);
    expect(exportSink.written).toEqual([csvFile, jsonFile]);
  });

  it('holds back later chunks after a failed one and still writes exports', async () => {
    const { transport, target } = telegram(sequence(ok(1), badRequest, ok(3)), 20);
    const sink = new DeliverySink({ telegram: target, exportSink: new MemoryExportSink(), sleep: noSleep });

    const result = await sink.deliver({ text: `${text}\n\nthird paragraph`, exports: [csvFile] });

    expect(transport.calls).toHaveLength(2);
    expect(result.legs[0]).toEqual({
      destination: 'telegram:123',
      status: 'failed',
      attempts: 2,
      error: 'message 2 of 3: Telegram sendMessage failed (400): Bad Request: chat not found',
      detail: '1 of 3 sent'
    });
    expect(result.legs[1].status).toBe('delivered');
    expect(result.failedLegs).toEqual(['telegram:123']);
  });

  it('retries with exponential backoff until the attempts run out', async () => {
    const { transport, target } = telegram(() => serverError);
    const { sleep, waits } = recordingSleep();
    const sink = new DeliverySink({ telegram: target, maxRetries: 2, retryDelayMs: 1000, sleep });

    const result = await sink.deliver({ text: 'hello', exports: [] });

    expect(transport.calls).toHaveLength(3);
    expect(waits).toEqual([1000, 2000]);
    expect(result.legs[0]).toMatchObject({ status: 'failed', attempts: 3, detail: '0 of 1 sent' });
    expect(result.failedLegs).toEqual(['telegram:123']);
  });

  it('waits as long as Telegram asks on 429', async () => {
    const tooMany = {
      status: 429,
      data: { ok: false, error_code: 429, description: 'Too Many Requests: retry after 3', parameters: { retry_after: 3 } }
    };
    const { target } = telegram(sequence(tooMany, ok(7)));
    const { sleep, waits } = recordingSleep();
    const sink = new DeliverySink({ telegram: target, retryDelayMs: 1000, sleep });

    const result = await sink.deliver({ text: 'hello', exports: [] });

    expect(waits).toEqual([3000]);
    expect(result.legs[0]).toMatchObject({ status: 'delivered', attempts: 2 });
  });

  it('does not retry a rejected message', async () => {
    const { transport, target } = telegram(() => badRequest);
    const sink = new DeliverySink({ telegram: target, sleep: noSleep });

    await sink.deliver({ text: 'hello', exports: [] });

    expect(transport.calls).toHaveLength(1);
  });

  it('marks unconfigured destinations as skipped', async () => {
    const sink = new DeliverySink();

    const result = await sink.deliver({ text: 'hello', exports: [csvFile] });

    expect(result.legs).toEqual([
      { destination: 'telegram', status: 'skipped', attempts: 0, error: null, detail: 'not configured' },
      { destination: `export:${csvFile.path}`, status: 'skipped', attempts: 0, error: null, detail: 'no export sink' }
    ]);
    expect(result.messages).toEqual([]);
    expect(result.failedLegs).toEqual([]);
  });

  it('keeps going after one export fails', async () => {
    const exportSink = new MemoryExportSink(new Set([csvFile.path]));
    const sink = new DeliverySink({ exportSink });

    const result = await sink.deliver({ text: 'hello', exports: [csvFile, jsonFile] });

    expect(result.legs.slice(1)).toEqual([
      {
        destination: `export:${csvFile.path}`,
        status: 'failed',
        attempts: 1,
        error: `disk full writing ${csvFile.path}`,
        detail: null
      },
      { destination: `export:${jsonFile.path}`, status: 'delivered', attempts: 1, error: null, detail: `memory/${jsonFile.path}` }
    ]);
    expect(result.failedLegs).toEqual([`export:${csvFile.path}`]);
    expect(exportSink.written).toEqual([jsonFile]);
  });
});
