/**
 * A title returned by a source for a search query.
 * Identity is the (source, id) pair.
 */
export type SearchResult = {
  /** Name of the source adapter that produced the result */
  source: string;
  /** Source-scoped opaque identifier */
  id: string;
  title: string;
  /** Alternative (usually romaji or native) title */
  altTitle?: string;
  year?: number;
  /** Number of episodes available in the configured translation */
  episodeCount?: number;
  /** Poster/thumbnail URL */
  thumbnail?: string;
};

/**
 * One entry of an anime's episode list
 */
export type EpisodeRef = {
  source: string;
  animeId: string;
  /** Numeric value used for ordering ("12.5" -> 12.5) */
  number: number;
  /** Episode string as the backend names it */
  label: string;
  title?: string;
  /** Source-private identifier needed to resolve this episode, if any */
  key?: string;
};

/**
 * Everything the external player needs to open a stream.
 * Consumed once by the playback launcher, never cached.
 */
export type StreamDescriptor = {
  url: string;
  userAgent?: string;
  referer?: string;
  headers?: Record<string, string>;
  /** Provider the stream came from, for display */
  sourceName?: string;
};
