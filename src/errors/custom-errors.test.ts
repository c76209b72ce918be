import { describe, expect, it } from 'vitest';
import {
  CancelledError,
  ConfigError,
  errorMessage,
  LaunchError,
  NotFoundError,
  ParseError,
  ShioError,
  TransportError,
} from './custom-errors.js';

describe('Custom Errors', () => {
  it('ShioError should store message and have correct name', () => {
    const error = new ShioError('test message');
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(ShioError);
    expect(error.message).toBe('test message');
    expect(error.name).toBe('ShioError');
  });

  it('ConfigError should inherit from ShioError', () => {
    const error = new ConfigError('config error');
    expect(error).toBeInstanceOf(ShioError);
    expect(error.name).toBe('ConfigError');
  });

  it('TransportError should carry kind, url, status and cause', () => {
    const cause = new Error('socket hang up');
    const error = new TransportError('HTTP 503', 'status', 'https://example.com', 503, { cause });
    expect(error).toBeInstanceOf(ShioError);
    expect(error.name).toBe('TransportError');
    expect(error.kind).toBe('status');
    expect(error.url).toBe('https://example.com');
    expect(error.status).toBe(503);
    expect(error.cause).toBe(cause);
  });

  describe('TransportError.isTransient', () => {
    it('should treat timeouts and connection failures as transient', () => {
      expect(new TransportError('t', 'timeout', 'u').isTransient()).toBe(true);
      expect(new TransportError('c', 'connection', 'u').isTransient()).toBe(true);
    });

    it('should treat 429 and 5xx as transient', () => {
      expect(new TransportError('s', 'status', 'u', 429).isTransient()).toBe(true);
      expect(new TransportError('s', 'status', 'u', 502).isTransient()).toBe(true);
    });

    it('should not retry other statuses or aborted requests', () => {
      expect(new TransportError('s', 'status', 'u', 404).isTransient()).toBe(false);
      expect(new TransportError('s', 'status', 'u', 403).isTransient()).toBe(false);
      expect(new TransportError('a', 'aborted', 'u').isTransient()).toBe(false);
      expect(new TransportError('i', 'invalid', 'u').isTransient()).toBe(false);
    });
  });

  it('ParseError and NotFoundError should have source property', () => {
    const parse = new ParseError('bad json', 'allanime');
    const missing = new NotFoundError('no episodes', 'animeworld');
    expect(parse.name).toBe('ParseError');
    expect(parse.source).toBe('allanime');
    expect(missing.name).toBe('NotFoundError');
    expect(missing.source).toBe('animeworld');
  });

  it('LaunchError should have command property', () => {
    const error = new LaunchError('spawn mpv ENOENT', 'mpv');
    expect(error).toBeInstanceOf(ShioError);
    expect(error.command).toBe('mpv');
  });

  it('CancelledError should have a default message', () => {
    expect(new CancelledError().message).toBe('Request cancelled');
  });

  it('errorMessage should format errors and other values', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
