import { describe, it, expect } from 'vitest';
import TelegramClient, { TelegramSendError } from '@/delivery/telegram-client';
import { fakeTransport, requestBody } from '../helpers/fake-axios';

describe('TelegramClient', () => {
  it('posts plain text to sendMessage and returns the message id', async () => {
    const transport = fakeTransport(() => ({ status: 200, data: { ok: true, result: { message_id: 42 } } }));
    const client = new TelegramClient({ botToken: 'test-token', adapter: transport.adapter });

    await expect(client.sendMessage('123', 'hello')).resolves.toBe(42);

    const [call] = transport.calls;
    expect(call.method).toBe('post');
    expect(call.baseURL).toBe('https://api.telegram.org/bottest-token');
    expect(call.url).toBe('/sendMessage');
    expect(requestBody(call)).toEqual({ chat_id: '123', text: 'hello', disable_web_page_preview: true });
  });

  it('reports the wait Telegram asks for on 429', async () => {
    const transport = fakeTransport(() => ({
      status: 429,
      data: { ok: false, error_code: 429, description: 'Too Many Requests: retry after 5', parameters: { retry_after: 5 } }
    }));
    const client = new TelegramClient({ botToken: 'test-token', adapter: transport.adapter });

    const error = await client.sendMessage('123', 'hello').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TelegramSendError);
    if (!(error instanceof TelegramSendError)) return;
    expect(error.message).toBe('Telegram sendMessage failed (429): Too Many Requests: retry after 5');
    expect(error.status).toBe(429);
    expect(error.retryAfterMs).toBe(5000);
    expect(error.retryable).toBe(true);
    expect(error.failedLegs).toEqual(['telegram']);
  });

  it('does not retry client errors', async () => {
    const transport = fakeTransport(() => ({
      status: 400,
      data: { ok: false, error_code: 400, description: 'Bad Request: chat not found' }
    }));
    const client = new TelegramClient({ botToken: 'test-token', adapter: transport.adapter });

    await expect(client.sendMessage('123', 'hello')).rejects.toMatchObject({
      message: 'Telegram sendMessage failed (400): Bad Request: chat not found',
      status: 400,
      retryable: false
    });
  });

  it('treats server errors and lost connections as retryable', async () => {
    const server = new TelegramClient({
      botToken: 'test-token',
      adapter: fakeTransport(() => ({ status: 502, data: 'Bad Gateway' })).adapter
    });
    const offline = new TelegramClient({
      botToken: 'test-token',
      adapter: fakeTransport(() => new Error('socket hang up')).adapter
    });

    await expect(server.sendMessage('123', 'hello')).rejects.toMatchObject({ status: 502, retryable: true });
    await expect(offline.sendMessage('123', 'hello')).rejects.toMatchObject({
      message: 'Telegram sendMessage failed: socket hang up',
      status: null,
      retryable: true
    });
  });

  it('rejects an unexpected success body', async () => {
    const transport = fakeTransport(() => ({ status: 200, data: { ok: true } }));
    const client = new TelegramClient({ botToken: 'test-token', adapter: transport.adapter });

    await expect(client.sendMessage('123', 'hello')).rejects.toMatchObject({
      message: 'Unexpected response from Telegram sendMessage',
      retryable: false
    });
  });
});
