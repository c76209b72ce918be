import { NotFoundError, ParseError } from '../../errors/custom-errors.js';
import type { EpisodeRef, SearchResult, StreamDescriptor } from '../../types/anime.types.js';
import { BaseSource, type BaseSourceOptions } from '../base/base-source.js';

export type AnimeWorldSourceOptions = BaseSourceOptions & {
  baseUrl: string;
};

/**
 * Source for AnimeWorld, scraped from its HTML pages
 */
export class AnimeWorldSource extends BaseSource {
  readonly name = 'animeworld';

  private readonly baseUrl: string;

  constructor(options: AnimeWorldSourceOptions) {
    super(options);
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  async search(query: string, signal?: AbortSignal): Promise<SearchResult[]> {
    const html = await this.fetchText({ url: `${this.baseUrl}/search`, query: { keyword: query }, signal });
    const $ = this.parseHtml(html);

    if ($('.film-list').length === 0) {
      throw new ParseError(`Search page layout not recognized on ${this.name}`, this.name);
    }

    const results: SearchResult[] = [];

    $('.film-list .item a.name').each((_, element) => {
      const $link = $(element);
      const id = this.extractAnimeId($link.attr('href'));
      const title = $link.text().trim();

      if (!id || !title) {
        return;
      }

      const result: SearchResult = { source: this.name, id, title };
      const altTitle = $link.attr('data-jtitle')?.trim();
      if (altTitle && altTitle !== title) {
        result.altTitle = altTitle;
      }
      const thumbnail = $link.closest('.item').find('img').attr('src');
      if (thumbnail) {
        result.thumbnail = thumbnail;
      }
      results.push(result);
    });

    return results;
  }

  async listEpisodes(animeId: string, signal?: AbortSignal): Promise<EpisodeRef[]> {
    const html = await this.fetchText({ url: this.playUrl(animeId), signal });
    const $ = this.parseHtml(html);
    const episodes: EpisodeRef[] = [];

    $('ul.episodes li.episode a').each((_, element) => {
      const $link = $(element);
      const label = ($link.attr('data-episode-num') ?? $link.text()).trim();
      if (!label) {
        return;
      }

      const episode: EpisodeRef = {
        source: this.name,
        animeId,
        number: this.parseEpisodeNumber(label) ?? 0,
        label,
      };
      const key = $link.attr('data-id');
      if (key) {
        episode.key = key;
      }
      episodes.push(episode);
    });

    if (episodes.length === 0) {
      throw new NotFoundError(`No episodes found for "${animeId}" on ${this.name}`, this.name);
    }

    return this.orderEpisodes(episodes);
  }

  async resolveStream(animeId: string, episode: EpisodeRef, signal?: AbortSignal): Promise<StreamDescriptor> {
    const pageUrl = this.playUrl(animeId, episode.key ?? episode.label);
    const html = await this.fetchText({ url: pageUrl, signal });
    const $ = this.parseHtml(html);

    const candidates = [
      $('#alternativeDownloadLink').attr('href'),
      $('#downloadLink').attr('href'),
      $('video source').attr('src'),
      $('video').attr('src'),
      $('iframe').attr('src'),
    ];
    const link = candidates.find((candidate) => candidate?.trim());

    if (!link) {
      throw new NotFoundError(`No playable stream for episode ${episode.label} on ${this.name}`, this.name);
    }

    return {
      url: new URL(link.trim(), pageUrl).toString(),
      referer: pageUrl,
      userAgent: this.userAgent,
      sourceName: this.name,
    };
  }

  private playUrl(animeId: string, episodeId?: string): string {
    const base = `${this.baseUrl}/play/${encodeURIComponent(animeId)}`;
    return episodeId ? `${base}/${encodeURIComponent(episodeId)}` : base;
  }

  /**
   * Extract the anime id from a link like "/play/naruto.ABC12" or "/play/naruto.ABC12/xyz"
   */
  private extractAnimeId(href: string | undefined): string | null {
    const match = href?.match(/\/play\/([^/?#]+)/);
    return match?.[1] ? decodeURIComponent(match[1]) : null;
  }
}
