import type { EpisodeRef, SearchResult, StreamDescriptor } from './anime.types.js';

/**
 * Capability set every backend implements. Each operation fails independently
 * with a TransportError, ParseError or NotFoundError.
 */
export type SourceAdapter = {
  /**
   * Unique name, used to tag results and route follow-up calls
   */
  readonly name: string;

  /**
   * Search titles; order is the backend's relevance ranking
   * @param query - Trimmed, non-empty query
   * @param signal - Aborts the underlying requests
   */
  search(query: string, signal?: AbortSignal): Promise<SearchResult[]>;

  /**
   * List episodes in broadcast order. Listing the same anime twice yields the same order.
   * @param animeId - Id from a SearchResult of this source
   */
  listEpisodes(animeId: string, signal?: AbortSignal): Promise<EpisodeRef[]>;

  /**
   * Resolve a playable stream for one episode
   */
  resolveStream(animeId: string, episode: EpisodeRef, signal?: AbortSignal): Promise<StreamDescriptor>;
};
