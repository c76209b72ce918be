import { describe, expect, it, vi } from 'vitest';
import { TransportError } from '../errors/custom-errors.js';
import { HttpTransport } from './http-transport.js';

function createTransport(fetchImpl: typeof fetch, overrides: { timeout?: number; httpsOnly?: boolean } = {}) {
  return new HttpTransport({
    timeout: overrides.timeout ?? 1000,
    userAgent: 'TestAgent/1.0',
    httpsOnly: overrides.httpsOnly ?? true,
    fetchImpl,
  });
}

/**
 * A fetch that never answers until its signal aborts
 */
const hangingFetch: typeof fetch = (_input, init) =>
  new Promise<Response>((_resolve, reject) => {
    init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
  });

describe('HttpTransport', () => {
  it('should return the raw body and status', async () => {
    const fetchImpl = vi.fn<typeof fetch>(() => Promise.resolve(new Response('{"ok":true}', { status: 200 })));
    const transport = createTransport(fetchImpl);

    const response = await transport.fetch({ url: 'https://api.example.com/api' });

    expect(response.status).toBe(200);
    expect(response.text).toBe('{"ok":true}');
  });

  it('should merge headers over defaults and append query parameters', async () => {
    const fetchImpl = vi.fn<typeof fetch>(() => Promise.resolve(new Response('ok')));
    const transport = createTransport(fetchImpl);

    await transport.fetch({
      url: 'https://api.example.com/api?fixed=1',
      query: { variables: '{"q":"a b"}' },
      headers: { Referer: 'https://ref.example.com', 'User-Agent': 'Override/2.0' },
    });

    const [input, init] = fetchImpl.mock.calls[0] ?? [];
    expect(String(input)).toBe('https://api.example.com/api?fixed=1&variables=%7B%22q%22%3A%22a+b%22%7D');
    expect(init?.headers).toEqual({
      'User-Agent': 'Override/2.0',
      Accept: '*/*',
      'Accept-Language': 'en-US,en;q=0.9',
      Referer: 'https://ref.example.com',
    });
    expect(init?.method).toBe('GET');
  });

  it('should surface non-2xx responses as status errors', async () => {
    const transport = createTransport(() =>
      Promise.resolve(new Response('Not Found', { status: 404, statusText: 'Not Found' })),
    );

    const attempt = transport.fetch({ url: 'https://api.example.com/missing' });

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toMatchObject({ kind: 'status', status: 404, message: 'HTTP 404: Not Found' });
  });

  it('should classify network failures as connection errors', async () => {
    const transport = createTransport(() => Promise.reject(new TypeError('fetch failed')));

    await expect(transport.fetch({ url: 'https://api.example.com' })).rejects.toMatchObject({
      kind: 'connection',
      message: 'Connection failed: fetch failed',
    });
  });

  it('should time out after the configured delay', async () => {
    const transport = createTransport(hangingFetch, { timeout: 20 });

    await expect(transport.fetch({ url: 'https://api.example.com/slow' })).rejects.toMatchObject({
      kind: 'timeout',
      message: 'Request timed out after 20ms',
    });
  });

  it('should report caller aborts as aborted', async () => {
    const transport = createTransport(hangingFetch);
    const controller = new AbortController();

    const attempt = transport.fetch({ url: 'https://api.example.com/slow', signal: controller.signal });
    controller.abort();

    await expect(attempt).rejects.toMatchObject({ kind: 'aborted' });
  });

  it('should not start a request whose signal is already aborted', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const transport = createTransport(fetchImpl);

    const attempt = transport.fetch({ url: 'https://api.example.com', signal: AbortSignal.abort() });

    await expect(attempt).rejects.toMatchObject({ kind: 'aborted' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should refuse plain HTTP when httpsOnly is set', async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const transport = createTransport(fetchImpl);

    await expect(transport.fetch({ url: 'http://api.example.com' })).rejects.toMatchObject({ kind: 'invalid' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('should reject invalid URLs', async () => {
    const transport = createTransport(vi.fn<typeof fetch>());
    const attempt = transport.fetch({ url: 'not-a-url' });

    await expect(attempt).rejects.toThrow('Invalid URL: "not-a-url"');
    await expect(attempt).rejects.toMatchObject({ kind: 'invalid' });
  });
});
