/**
 * Base error class for shio
 */
export class ShioError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ShioError';
  }
}

/**
 * Configuration error (detected at startup, fatal)
 */
export class ConfigError extends ShioError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Kind of transport failure
 */
/**
 * `invalid` marks a request refused before any I/O (malformed URL, plain HTTP under httpsOnly)
 */
export type TransportErrorKind = 'timeout' | 'connection' | 'status' | 'aborted' | 'invalid';

/**
 * Network failure raised by the transport client
 */
export class TransportError extends ShioError {
  constructor(
    message: string,
    public readonly kind: TransportErrorKind,
    public readonly url: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'TransportError';
  }

  /**
   * Whether repeating the same request may succeed
   */
  isTransient(): boolean {
    if (this.kind === 'timeout' || this.kind === 'connection') {
      return true;
    }
    if (this.kind === 'status' && this.status !== undefined) {
      return this.status === 429 || this.status >= 500;
    }
    return false;
  }
}

/**
 * A source adapter could not interpret a backend response
 */
export class ParseError extends ShioError {
  constructor(
    message: string,
    public readonly source: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/**
 * Query, anime or episode does not exist on the backend
 */
export class NotFoundError extends ShioError {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = 'NotFoundError';
  }
}

/**
 * The external player could not be started
 */
export class LaunchError extends ShioError {
  constructor(
    message: string,
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LaunchError';
  }
}

/**
 * A request was superseded or aborted before it completed
 */
export class CancelledError extends ShioError {
  constructor(message = 'Request cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Render any thrown value as a one-line message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
