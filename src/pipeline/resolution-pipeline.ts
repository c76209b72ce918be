import type { RetryConfig } from '../config/config-schema.js';
import { CancelledError, errorMessage, NotFoundError, TransportError } from '../errors/custom-errors.js';
import type { EpisodeRef, SearchResult, StreamDescriptor } from '../types/anime.types.js';
import { SearchPolicy } from '../types/search-policy.js';
import type { SourceAdapter } from '../types/source.types.js';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from './retry-strategy.js';

export type ResolutionPipelineOptions = {
  /** Adapters in configured priority order */
  sources: SourceAdapter[];
  policy: SearchPolicy;
  retry: RetryConfig;
};

/**
 * Whether a failed call may be repeated as is
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError && error.isTransient();
}

/**
 * Orchestrates calls across source adapters: search policy, routing by
 * source tag, retry of transient failures and cancellation.
 */
export class ResolutionPipeline {
  private readonly sources: SourceAdapter[];
  private readonly policy: SearchPolicy;
  private readonly retry: RetryConfig;

  constructor(options: ResolutionPipelineOptions) {
    if (options.sources.length === 0) {
      throw new Error('ResolutionPipeline needs at least one source');
    }
    this.sources = options.sources;
    this.policy = options.policy;
    this.retry = options.retry;
  }

  getSourceNames(): string[] {
    return this.sources.map((source) => source.name);
  }

  /**
   * Search every configured source according to the policy
   *
   * @returns Results unique by (source, id)
   * @throws CancelledError when the signal aborts
   */
  async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    const results =
      this.policy === SearchPolicy.AGGREGATE
        ? await this.searchAggregate(query, signal)
        : await this.searchFirstSuccess(query, signal);

    return dedupeResults(results);
  }

  /**
   * List episodes of a search result on the source that produced it
   */
  async listEpisodes(result: SearchResult, signal?: AbortSignal): Promise<EpisodeRef[]> {
    const source = this.getSource(result.source);
    return this.call(source, (s) => source.listEpisodes(result.id, s), signal);
  }

  /**
   * Resolve an episode into a playable stream on the source that listed it
   */
  async resolveStream(episode: EpisodeRef, signal?: AbortSignal): Promise<StreamDescriptor> {
    const source = this.getSource(episode.source);
    return this.call(source, (s) => source.resolveStream(episode.animeId, episode, s), signal);
  }

  private async searchFirstSuccess(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    let lastError: unknown;

    for (const source of this.sources) {
      try {
        // biome-ignore lint/performance/noAwaitInLoops: sources are tried in priority order
        const results = await this.call(source, (s) => source.search(query, s), signal);
        if (results.length > 0) {
          return results;
        }
        logger.debug(`No results for "${query}" on ${source.name}`);
      } catch (error) {
        if (error instanceof CancelledError) {
          throw error;
        }
        lastError = error;
        logger.warning(`Search on ${source.name} failed: ${errorMessage(error)}`);
      }
    }

    if (lastError !== undefined) {
      throw lastError;
    }

    throw new NotFoundError(`No results for "${query}"`, this.getSourceNames().join(', '));
  }

  private async searchAggregate(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    const settled = await Promise.allSettled(
      this.sources.map((source) => this.call(source, (s) => source.search(query, s), signal)),
    );

    if (signal?.aborted) {
      throw new CancelledError();
    }

    const results: SearchResult[] = [];
    let firstError: unknown;
    let failures = 0;

    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.push(...outcome.value);
        return;
      }
      failures++;
      firstError ??= outcome.reason;
      const name = this.sources[index]?.name ?? 'unknown source';
      logger.warning(`Search on ${name} failed: ${errorMessage(outcome.reason)}`);
    });

    if (failures === this.sources.length) {
      throw firstError;
    }

    if (results.length === 0) {
      throw new NotFoundError(`No results for "${query}"`, this.getSourceNames().join(', '));
    }

    return results;
  }

  /**
   * Run one adapter call with retry. Aborts and transport aborts
   * surface as CancelledError.
   */
  private async call<T>(
    source: SourceAdapter,
    fn: (signal?: AbortSignal) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    try {
      return await retryWithBackoff(() => fn(signal), this.retry, {
        isRetryable: isRetryableError,
        signal,
        onRetry: (attempt, error, delay) => {
          logger.debug(
            `Retrying ${source.name} (${attempt}/${this.retry.maxRetries}) in ${delay}ms: ${errorMessage(error)}`,
          );
        },
      });
    } catch (error) {
      if (signal?.aborted || (error instanceof TransportError && error.kind === 'aborted')) {
        throw error instanceof CancelledError ? error : new CancelledError();
      }
      throw error;
    }
  }

  private getSource(name: string): SourceAdapter {
    const source = this.sources.find((candidate) => candidate.name === name);
    if (!source) {
      throw new NotFoundError(`Source "${name}" is not configured`, name);
    }
    return source;
  }
}

/**
 * Keep the first occurrence of every (source, id) pair
 */
export function dedupeResults(results: SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  return results.filter((result) => {
    const key = `${result.source}\u0000${result.id}`;
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}
