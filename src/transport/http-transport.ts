import { TransportError } from '../errors/custom-errors.js';
import { logger } from '../utils/logger.js';
import type { Transport, TransportRequest, TransportResponse } from './types.js';

export type HttpTransportOptions = {
  /** Per-request timeout in milliseconds */
  timeout: number;
  userAgent: string;
  /** Refuse plain HTTP URLs */
  httpsOnly?: boolean;
  /** Injected for tests; defaults to the global fetch */
  fetchImpl?: typeof fetch;
};

/**
 * Transport client over the global fetch. Stateless apart from its defaults,
 * so a single instance is shared by every source.
 */
export class HttpTransport implements Transport {
  private readonly fetchImpl: typeof fetch;
  private readonly defaultHeaders: Record<string, string>;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.defaultHeaders = {
      'User-Agent': options.userAgent,
      Accept: '*/*',
      'Accept-Language': 'en-US,en;q=0.9',
    };
  }

  async fetch(request: TransportRequest): Promise<TransportResponse> {
    const url = this.buildUrl(request);

    if (this.options.httpsOnly && url.protocol !== 'https:') {
      throw new TransportError(`Refusing non-HTTPS URL: ${url.href}`, 'invalid', url.href);
    }

    if (request.signal?.aborted) {
      throw new TransportError('Request aborted', 'aborted', url.href);
    }

    const timeoutSignal = AbortSignal.timeout(this.options.timeout);
    const signal = request.signal ? AbortSignal.any([request.signal, timeoutSignal]) : timeoutSignal;
    const method = request.method ?? 'GET';

    logger.debug(`${method} ${url.href}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: { ...this.defaultHeaders, ...request.headers },
        body: request.body,
        signal,
      });
    } catch (error) {
      throw this.toTransportError(error, url.href, request.signal, timeoutSignal);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.toTransportError(error, url.href, request.signal, timeoutSignal);
    }

    if (!response.ok) {
      throw new TransportError(
        `HTTP ${response.status}${response.statusText ? `: ${response.statusText}` : ''}`,
        'status',
        url.href,
        response.status,
      );
    }

    return {
      url: response.url || url.href,
      status: response.status,
      statusText: response.statusText,
      headers: Object.fromEntries(response.headers.entries()),
      text,
    };
  }

  private buildUrl(request: TransportRequest): URL {
    let url: URL;
    try {
      url = new URL(request.url);
    } catch (error) {
      throw new TransportError(`Invalid URL: "${request.url}"`, 'invalid', request.url, undefined, { cause: error });
    }

    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    return url;
  }

  private toTransportError(
    error: unknown,
    url: string,
    callerSignal: AbortSignal | undefined,
    timeoutSignal: AbortSignal,
  ): TransportError {
    if (callerSignal?.aborted) {
      return new TransportError('Request aborted', 'aborted', url, undefined, { cause: error });
    }
    if (timeoutSignal.aborted) {
      return new TransportError(`Request timed out after ${this.options.timeout}ms`, 'timeout', url, undefined, {
        cause: error,
      });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(`Connection failed: ${message}`, 'connection', url, undefined, { cause: error });
  }
}
