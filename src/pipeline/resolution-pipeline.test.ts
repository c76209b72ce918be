import { describe, expect, it, vi } from 'vitest';
import type { RetryConfig } from '../config/config-schema.js';
import { CancelledError, NotFoundError, ParseError, TransportError } from '../errors/custom-errors.js';
import type { EpisodeRef, SearchResult, StreamDescriptor } from '../types/anime.types.js';
import { SearchPolicy } from '../types/search-policy.js';
import { HttpTransport } from '../transport/http-transport.js';
import type { SourceAdapter } from '../types/source.types.js';
import { dedupeResults, isRetryableError, ResolutionPipeline } from './resolution-pipeline.js';

const retry: RetryConfig = { maxRetries: 2, initialTimeout: 1, backoffMultiplier: 2, jitterPercentage: 0 };

function result(source: string, id: string): SearchResult {
  return { source, id, title: `${source} ${id}` };
}

function createAdapter(name: string, overrides: Partial<Omit<SourceAdapter, 'name'>> = {}) {
  return {
    name,
    search: vi.fn<SourceAdapter['search']>(async () => []),
    listEpisodes: vi.fn<SourceAdapter['listEpisodes']>(async () => []),
    resolveStream: vi.fn<SourceAdapter['resolveStream']>(async () => ({ url: `https://${name}.example.com/v.m3u8` })),
    ...overrides,
  };
}

function createPipeline(sources: SourceAdapter[], policy: SearchPolicy = SearchPolicy.FIRST_SUCCESS) {
  return new ResolutionPipeline({ sources, policy, retry });
}

describe('ResolutionPipeline', () => {
  describe('search (first-success)', () => {
    it('should return the first non-empty result set', async () => {
      const first = createAdapter('first', { search: vi.fn(async () => []) });
      const second = createAdapter('second', { search: vi.fn(async () => [result('second', 'a')]) });
      const third = createAdapter('third', { search: vi.fn(async () => [result('third', 'b')]) });

      const results = await createPipeline([first, second, third]).search('naruto');

      expect(results).toEqual([result('second', 'a')]);
      expect(third.search).not.toHaveBeenCalled();
    });

    it('should fall through parse errors to the next source', async () => {
      const broken = createAdapter('broken', {
        search: vi.fn(async () => {
          throw new ParseError('bad markup', 'broken');
        }),
      });
      const working = createAdapter('working', { search: vi.fn(async () => [result('working', 'a')]) });

      await expect(createPipeline([broken, working]).search('naruto')).resolves.toEqual([result('working', 'a')]);
    });

    it('should throw the last error when every source fails', async () => {
      const missing = new NotFoundError('missing', 'one');
      const failure = new ParseError('bad', 'two');
      const one = createAdapter('one', {
        search: vi.fn(async () => {
          throw missing;
        }),
      });
      const two = createAdapter('two', {
        search: vi.fn(async () => {
          throw failure;
        }),
      });

      await expect(createPipeline([one, two]).search('naruto')).rejects.toBe(failure);
    });

    it('should throw NotFoundError when every source is empty', async () => {
      await expect(createPipeline([createAdapter('one'), createAdapter('two')]).search('zzz')).rejects.toThrow(
        new NotFoundError('No results for "zzz"', 'one, two'),
      );
    });

    it('should retry transient transport errors', async () => {
      const adapter = createAdapter('flaky', {
        search: vi
          .fn<SourceAdapter['search']>()
          .mockRejectedValueOnce(new TransportError('Connection failed: reset', 'connection', 'u'))
          .mockRejectedValueOnce(new TransportError('HTTP 503: Service Unavailable', 'status', 'u', 503))
          .mockResolvedValue([result('flaky', 'a')]),
      });

      await expect(createPipeline([adapter]).search('naruto')).resolves.toEqual([result('flaky', 'a')]);
      expect(adapter.search).toHaveBeenCalledTimes(3);
    });

    it('should not retry non-transient errors', async () => {
      const failure = new TransportError('HTTP 403: Forbidden', 'status', 'u', 403);
      const adapter = createAdapter('strict', { search: vi.fn<SourceAdapter['search']>().mockRejectedValue(failure) });

      await expect(createPipeline([adapter]).search('naruto')).rejects.toBe(failure);
      expect(adapter.search).toHaveBeenCalledTimes(1);
    });

    it('should not retry requests the transport refuses up front', async () => {
      const fetchImpl = vi.fn<typeof fetch>();
      const transport = new HttpTransport({ timeout: 1000, userAgent: 'TestAgent/1.0', httpsOnly: true, fetchImpl });
      const adapter = createAdapter('plain', {
        search: vi.fn<SourceAdapter['search']>(async () => {
          await transport.fetch({ url: 'http://plain.example.com/search' });
          return [];
        }),
      });

      await expect(createPipeline([adapter]).search('naruto')).rejects.toMatchObject({ kind: 'invalid' });
      expect(adapter.search).toHaveBeenCalledTimes(1);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should return unique (source, id) pairs in backend order', async () => {
      const adapter = createAdapter('dup', {
        search: vi.fn(async () => [result('dup', 'a'), result('dup', 'b'), { ...result('dup', 'a'), title: 'again' }]),
      });

      const results = await createPipeline([adapter]).search('naruto');

      expect(results.map((r) => r.id)).toEqual(['a', 'b']);
      expect(results[0]?.title).toBe('dup a');
    });

    it('should reject with CancelledError when aborted', async () => {
      const controller = new AbortController();
      const adapter = createAdapter('slow', {
        search: vi.fn(async () => {
          controller.abort();
          throw new TransportError('Request aborted', 'aborted', 'u');
        }),
      });
      const next = createAdapter('next', { search: vi.fn(async () => [result('next', 'a')]) });

      await expect(createPipeline([adapter, next]).search('naruto', controller.signal)).rejects.toBeInstanceOf(
        CancelledError,
      );
      expect(next.search).not.toHaveBeenCalled();
    });
  });

  describe('search (aggregate)', () => {
    it('should concatenate results in configured order and skip failing sources', async () => {
      const slow = createAdapter('slow', {
        search: vi.fn(
          () => new Promise<SearchResult[]>((resolve) => setTimeout(() => resolve([result('slow', 'a')]), 5)),
        ),
      });
      const broken = createAdapter('broken', {
        search: vi.fn(async () => {
          throw new ParseError('bad', 'broken');
        }),
      });
      const fast = createAdapter('fast', { search: vi.fn(async () => [result('fast', 'a'), result('fast', 'b')]) });

      const results = await createPipeline([slow, broken, fast], SearchPolicy.AGGREGATE).search('naruto');

      expect(results).toEqual([result('slow', 'a'), result('fast', 'a'), result('fast', 'b')]);
    });

    it('should throw the first error when every source fails', async () => {
      const first = new ParseError('first', 'one');
      const one = createAdapter('one', {
        search: vi.fn(async () => {
          throw first;
        }),
      });
      const two = createAdapter('two', {
        search: vi.fn(async () => {
          throw new NotFoundError('second', 'two');
        }),
      });

      await expect(createPipeline([one, two], SearchPolicy.AGGREGATE).search('naruto')).rejects.toBe(first);
    });
  });

  describe('routing', () => {
    const secondEpisode: EpisodeRef = { source: 'two', animeId: 'x', number: 2, label: '2' };
    const episodes: EpisodeRef[] = [{ source: 'two', animeId: 'x', number: 1, label: '1' }, secondEpisode];

    it('should route listEpisodes by the result source tag', async () => {
      const one = createAdapter('one');
      const two = createAdapter('two', { listEpisodes: vi.fn(async () => episodes) });
      const pipeline = createPipeline([one, two]);

      const first = await pipeline.listEpisodes(result('two', 'x'));
      const second = await pipeline.listEpisodes(result('two', 'x'));

      expect(first).toEqual(episodes);
      expect(second).toEqual(first);
      expect(two.listEpisodes).toHaveBeenCalledWith('x', undefined);
      expect(one.listEpisodes).not.toHaveBeenCalled();
    });

    it('should route resolveStream by the episode source tag', async () => {
      const descriptor: StreamDescriptor = {
        url: 'https://cdn.example.com/2.m3u8',
        referer: 'https://ref.example.com/',
      };
      const two = createAdapter('two', { resolveStream: vi.fn(async () => descriptor) });

      await expect(createPipeline([createAdapter('one'), two]).resolveStream(secondEpisode)).resolves.toBe(descriptor);
      expect(two.resolveStream).toHaveBeenCalledWith('x', secondEpisode, undefined);
    });

    it('should raise NotFoundError for an unknown source tag', async () => {
      await expect(createPipeline([createAdapter('one')]).listEpisodes(result('gone', 'x'))).rejects.toBeInstanceOf(
        NotFoundError,
      );
    });
  });
});

describe('dedupeResults', () => {
  it('should treat equal ids from different sources as distinct', () => {
    expect(dedupeResults([result('a', '1'), result('b', '1'), result('a', '1')])).toEqual([
      result('a', '1'),
      result('b', '1'),
    ]);
  });
});

describe('isRetryableError', () => {
  it('should only accept transient transport errors', () => {
    expect(isRetryableError(new TransportError('t', 'timeout', 'u'))).toBe(true);
    expect(isRetryableError(new TransportError('a', 'aborted', 'u'))).toBe(false);
    expect(isRetryableError(new ParseError('p', 's'))).toBe(false);
  });
});
