import { describe, expect, it, vi } from 'vitest';
import { createHttpCommandChannel } from './http-channel.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function stubFetch(...responses: Array<Response | Error>) {
  const fetch = vi.fn<typeof globalThis.fetch>();
  for (const response of responses) {
    if (response instanceof Error) {
      fetch.mockRejectedValueOnce(response);
    } else {
      fetch.mockResolvedValueOnce(response);
    }
  }
  return fetch;
}

const noSleep = async () => {};

describe('createHttpCommandChannel', () => {
  it('posts the command as JSON and returns the result as text', async () => {
    const fetch = stubFetch(jsonResponse({ ok: true, result: true }));
    const channel = createHttpCommandChannel({ endpoint: 'http://engine.test/command', fetch, sleep: noSleep });

    await expect(channel.execute('existsObject(.Models.Model)')).resolves.toBe('true');

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0] ?? [];
    expect(url).toBe('http://engine.test/command');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"command":"existsObject(.Models.Model)"}');
    expect(init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('returns string results unchanged and a missing result as empty text', async () => {
    const fetch = stubFetch(jsonResponse({ ok: true, result: 'Mill' }), jsonResponse({ ok: true, result: null }));
    const channel = createHttpCommandChannel({ endpoint: 'http://engine.test', fetch, sleep: noSleep });

    await expect(channel.execute('a')).resolves.toBe('Mill');
    await expect(channel.execute('b')).resolves.toBe('');
  });

  it('sends the shared secret header when configured', async () => {
    const fetch = stubFetch(jsonResponse({ ok: true }));
    const channel = createHttpCommandChannel({
      endpoint: 'http://engine.test',
      sharedSecret: 'test-secret',
      fetch,
      sleep: noSleep,
    });

    await channel.execute('x');

    expect(fetch.mock.calls[0]?.[1]?.headers).toEqual({
      'Content-Type': 'application/json',
      'X-Shared-Secret': 'test-secret',
    });
  });

  it('retries transport failures and logs each retry', async () => {
    const fetch = stubFetch(new TypeError('fetch failed'), jsonResponse({ ok: false }, 503), jsonResponse({ ok: true, result: 1 }));
    const sleep = vi.fn(noSleep);
    const logger = { warn: vi.fn() };
    const channel = createHttpCommandChannel({
      endpoint: 'http://engine.test',
      retries: 2,
      retryDelayMs: 25,
      fetch,
      sleep,
      logger,
    });

    await expect(channel.execute('x', { idempotent: true })).resolves.toBe('1');

    expect(fetch).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(25);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn.mock.calls[0]?.[0]).toBe('backend.remote.retry');
    expect(logger.warn.mock.calls[0]?.[1]).toMatchObject({ attempt: 1, code: 'B001' });
  });

  it('fails with B003 once timeouts exhaust the retries', async () => {
    const timeout = () => Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const fetch = stubFetch(timeout(), timeout());
    const channel = createHttpCommandChannel({
      endpoint: 'http://engine.test',
      timeoutMs: 50,
      retries: 1,
      fetch,
      sleep: noSleep,
    });

    await expect(channel.execute('x', { idempotent: true })).rejects.toMatchObject({
      code: 'B003',
      message: 'Command timed out after 50ms',
    });
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('sends a command that is not idempotent only once after a timeout', async () => {
    const timeout = Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    const fetch = stubFetch(timeout, jsonResponse({ ok: true }));
    const sleep = vi.fn(noSleep);
    const channel = createHttpCommandChannel({
      endpoint: 'http://engine.test',
      timeoutMs: 50,
      retries: 2,
      fetch,
      sleep,
    });

    await expect(channel.execute('.MaterialFlow.SingleProc.derive(.Models.Model, "Mill")')).rejects.toMatchObject({
      code: 'B003',
    });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not resend a command that is not idempotent after a server error', async () => {
    const fetch = stubFetch(new Response('engine busy', { status: 503 }), jsonResponse({ ok: true }));
    const channel = createHttpCommandChannel({ endpoint: 'http://engine.test', retries: 2, fetch, sleep: noSleep });

    await expect(channel.execute('.MaterialFlow.Connector.connect(.Models.Model.A, .Models.Model.B)')).rejects.toMatchObject({
      code: 'B001',
      message: 'Engine endpoint answered 503: engine busy',
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('does not retry client errors', async () => {
    const fetch = stubFetch(new Response('bad request', { status: 400 }));
    const channel = createHttpCommandChannel({ endpoint: 'http://engine.test', fetch, sleep: noSleep });

    await expect(channel.execute('x')).rejects.toMatchObject({
      code: 'B001',
      message: 'Engine endpoint answered 400: bad request',
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('reports a refused command as B002 without retrying', async () => {
    const fetch = stubFetch(jsonResponse({ ok: false, error: 'unknown object .Foo' }));
    const channel = createHttpCommandChannel({ endpoint: 'http://engine.test', fetch, sleep: noSleep });

    await expect(channel.execute('.Foo.derive(.Models.Model, "x")')).rejects.toMatchObject({
      code: 'B002',
      message: 'Engine rejected command: unknown object .Foo',
    });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('rejects replies without a boolean ok field', async () => {
    const fetch = stubFetch(jsonResponse({ status: 'fine' }));
    const channel = createHttpCommandChannel({ endpoint: 'http://engine.test', fetch, sleep: noSleep });

    await expect(channel.execute('x')).rejects.toMatchObject({ code: 'B001' });
  });
});
