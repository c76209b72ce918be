import { z } from 'zod';
import { CancelledError, errorMessage, NotFoundError, TransportError } from '../../errors/custom-errors.js';
import type { EpisodeRef, SearchResult, StreamDescriptor } from '../../types/anime.types.js';
import type { TranslationMode } from '../../types/translation-mode.js';
import { logger } from '../../utils/logger.js';
import { BaseSource, type BaseSourceOptions } from '../base/base-source.js';
import { isClockUrl, normalizeSourceUrl } from './allanime-url.js';

const API_URL = 'https://api.allanime.day/api';
const REFERER = 'https://allmanga.to';
const SEARCH_LIMIT = 40;

const SEARCH_QUERY =
  'query( $search: SearchInput $limit: Int $page: Int $translationType: VaildTranslationTypeEnumType $countryOrigin: VaildCountryOriginEnumType ) { shows( search: $search limit: $limit page: $page translationType: $translationType countryOrigin: $countryOrigin ) { edges { _id name englishName availableEpisodes __typename } }}';

const SHOW_QUERY = 'query ($showId: String!) { show( _id: $showId ) { _id name availableEpisodesDetail }}';

const EPISODE_QUERY =
  'query ($showId: String!, $translationType: VaildTranslationTypeEnumType!, $episodeString: String!) { episode( showId: $showId translationType: $translationType episodeString: $episodeString ) { episodeString sourceUrls }}';

const SearchResponseSchema = z.object({
  data: z.object({
    shows: z.object({
      edges: z.array(
        z.object({
          _id: z.string(),
          name: z.string(),
          englishName: z.string().nullish(),
          availableEpisodes: z.record(z.unknown()).nullish(),
        }),
      ),
    }),
  }),
});

const ShowResponseSchema = z.object({
  data: z.object({
    show: z
      .object({
        _id: z.string(),
        name: z.string(),
        availableEpisodesDetail: z.record(z.array(z.string())),
      })
      .nullable(),
  }),
});

const EpisodeResponseSchema = z.object({
  data: z.object({
    episode: z
      .object({
        episodeString: z.string(),
        sourceUrls: z.array(
          z.object({
            sourceUrl: z.string(),
            sourceName: z.string(),
          }),
        ),
      })
      .nullable(),
  }),
});

const ClockResponseSchema = z.object({
  links: z.array(
    z.object({
      link: z.string(),
      resolutionStr: z.string().optional(),
    }),
  ),
});

type SourceUrl = { sourceUrl: string; sourceName: string };

export type AllAnimeSourceOptions = BaseSourceOptions & {
  mode: TranslationMode;
  /** Provider names tried first, in order; other providers follow in backend order */
  providerPriority: string[];
};

/**
 * Source for the AllAnime GraphQL API
 */
export class AllAnimeSource extends BaseSource {
  readonly name = 'allanime';

  private readonly mode: TranslationMode;
  private readonly providerPriority: string[];

  constructor(options: AllAnimeSourceOptions) {
    super(options);
    this.mode = options.mode;
    this.providerPriority = options.providerPriority;
  }

  protected override getHeaders(): Record<string, string> {
    return { Referer: REFERER };
  }

  async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    const variables = {
      search: { allowAdult: false, allowUnknown: false, query },
      limit: SEARCH_LIMIT,
      page: 1,
      translationType: this.mode,
      countryOrigin: 'ALL',
    };

    const response = await this.graphql(SEARCH_QUERY, variables, SearchResponseSchema, signal);

    return response.data.shows.edges.map((edge) => {
      const available = edge.availableEpisodes?.[this.mode];
      const result: SearchResult = {
        source: this.name,
        id: edge._id,
        title: edge.englishName || edge.name,
      };
      if (edge.englishName && edge.englishName !== edge.name) {
        result.altTitle = edge.name;
      }
      if (typeof available === 'number') {
        result.episodeCount = available;
      }
      return result;
    });
  }

  async listEpisodes(animeId: string, signal?: AbortSignal): Promise<EpisodeRef[]> {
    const response = await this.graphql(SHOW_QUERY, { showId: animeId }, ShowResponseSchema, signal);
    const show = response.data.show;

    if (!show) {
      throw new NotFoundError(`Anime "${animeId}" not found on ${this.name}`, this.name);
    }

    const labels = show.availableEpisodesDetail[this.mode];
    if (!labels || labels.length === 0) {
      throw new NotFoundError(`No ${this.mode} episodes available for "${show.name}"`, this.name);
    }

    const episodes = labels.map((label) => ({
      source: this.name,
      animeId: show._id,
      number: this.parseEpisodeNumber(label) ?? 0,
      label,
    }));

    return this.orderEpisodes(episodes);
  }

  async resolveStream(animeId: string, episode: EpisodeRef, signal?: AbortSignal): Promise<StreamDescriptor> {
    const variables = { showId: animeId, translationType: this.mode, episodeString: episode.label };
    const response = await this.graphql(EPISODE_QUERY, variables, EpisodeResponseSchema, signal);
    const data = response.data.episode;

    if (!data || data.sourceUrls.length === 0) {
      throw new NotFoundError(`No sources for episode ${episode.label} on ${this.name}`, this.name);
    }

    let lastError: unknown;

    for (const source of this.prioritize(data.sourceUrls)) {
      if (signal?.aborted) {
        throw new CancelledError();
      }

      try {
        // biome-ignore lint/performance/noAwaitInLoops: providers are tried one after another on purpose
        const url = await this.resolveSourceUrl(source.sourceUrl, signal);
        logger.debug(`Resolved episode ${episode.label} through ${source.sourceName}`);
        return { url, referer: REFERER, userAgent: this.userAgent, sourceName: source.sourceName };
      } catch (error) {
        if (error instanceof TransportError && error.kind === 'aborted') {
          throw error;
        }
        lastError = error;
        logger.debug(`Provider ${source.sourceName} failed: ${errorMessage(error)}`);
      }
    }

    if (lastError instanceof TransportError) {
      throw lastError;
    }

    throw new NotFoundError(`No playable stream for episode ${episode.label} on ${this.name}`, this.name);
  }

  /**
   * Order providers by configured priority, keeping backend order for the rest
   */
  private prioritize(sources: SourceUrl[]): SourceUrl[] {
    const rank = (name: string) => {
      const index = this.providerPriority.indexOf(name);
      return index === -1 ? this.providerPriority.length : index;
    };
    return [...sources].sort((a, b) => rank(a.sourceName) - rank(b.sourceName));
  }

  private async resolveSourceUrl(raw: string, signal?: AbortSignal): Promise<string> {
    const url = normalizeSourceUrl(raw);

    if (!isClockUrl(url)) {
      return url;
    }

    const clock = await this.fetchJson({ url, signal }, ClockResponseSchema);
    const first = clock.links[0];
    if (!first) {
      throw new NotFoundError(`Clock endpoint returned no links: ${url}`, this.name);
    }
    return first.link;
  }

  private graphql<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal?: AbortSignal,
  ): Promise<T> {
    return this.fetchJson(
      {
        url: API_URL,
        query: { variables: JSON.stringify(variables), query },
        signal,
      },
      schema,
    );
  }
}
