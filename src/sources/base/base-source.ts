import * as cheerio from 'cheerio';
import type { z } from 'zod';
import { NotFoundError, ParseError, TransportError } from '../../errors/custom-errors.js';
import type { Transport, TransportRequest } from '../../transport/types.js';
import type { EpisodeRef, SearchResult, StreamDescriptor } from '../../types/anime.types.js';
import type { SourceAdapter } from '../../types/source.types.js';

export type BaseSourceOptions = {
  transport: Transport;
  /** User agent sent by the transport; players must present the same one */
  userAgent: string;
};

/**
 * Base source class with common request and parsing helpers
 */
export abstract class BaseSource implements SourceAdapter {
  abstract readonly name: string;

  protected readonly transport: Transport;
  protected readonly userAgent: string;

  constructor(options: BaseSourceOptions) {
    this.transport = options.transport;
    this.userAgent = options.userAgent;
  }

  abstract search(query: string, signal?: AbortSignal): Promise<SearchResult[]>;

  abstract listEpisodes(animeId: string, signal?: AbortSignal): Promise<EpisodeRef[]>;

  abstract resolveStream(animeId: string, episode: EpisodeRef, signal?: AbortSignal): Promise<StreamDescriptor>;

  /**
   * Headers this backend expects on every request
   */
  protected getHeaders(): Record<string, string> {
    return {};
  }

  /**
   * Fetch a response body. HTTP 404 becomes NotFoundError, other failures
   * stay TransportError so the pipeline can decide whether to retry.
   */
  protected async fetchText(request: TransportRequest): Promise<string> {
    try {
      const response = await this.transport.fetch({
        ...request,
        headers: { ...this.getHeaders(), ...request.headers },
      });
      return response.text;
    } catch (error) {
      if (error instanceof TransportError && error.kind === 'status' && error.status === 404) {
        throw new NotFoundError(`Not found on ${this.name}: ${error.url}`, this.name);
      }
      throw error;
    }
  }

  /**
   * Fetch and validate a JSON response
   *
   * @throws ParseError if the body is not JSON or does not match the schema
   */
  protected async fetchJson<T>(request: TransportRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const text = await this.fetchText(request);

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new ParseError(`Invalid JSON from ${this.name}`, this.name, { cause: error });
    }

    return this.validate(schema, data);
  }

  /**
   * Validate already parsed data against a schema
   */
  protected validate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new ParseError(
        `Unexpected response from ${this.name}${where}: ${issue?.message ?? 'invalid data'}`,
        this.name,
        { cause: result.error },
      );
    }
    return result.data;
  }

  /**
   * Parse cheerio document from HTML
   */
  protected parseHtml(html: string): cheerio.CheerioAPI {
    return cheerio.load(html);
  }

  /**
   * Parse episode number from text
   * Handles formats like "12", "12.5", "EP12", "Episode 12", "Episodio 12"
   */
  protected parseEpisodeNumber(text: string): number | null {
    const trimmed = text.trim();

    // Plain numeric label, including specials like "12.5"
    if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
      return Number.parseFloat(trimmed);
    }

    const prefixed = trimmed.match(/(?:episodio|episode|ep|e)\s?(\d+(?:\.\d+)?)/i);
    if (prefixed?.[1]) {
      return Number.parseFloat(prefixed[1]);
    }

    const numberMatch = trimmed.match(/\b(\d+(?:\.\d+)?)\b/);
    if (numberMatch?.[1]) {
      return Number.parseFloat(numberMatch[1]);
    }

    return null;
  }

  /**
   * Deduplicate episodes by label and sort by number.
   * The sort is stable, so equal numbers keep backend order.
   */
  protected orderEpisodes(episodes: EpisodeRef[]): EpisodeRef[] {
    const unique = new Map<string, EpisodeRef>();

    for (const episode of episodes) {
      if (!unique.has(episode.label)) {
        unique.set(episode.label, episode);
      }
    }

    return Array.from(unique.values()).sort((a, b) => a.number - b.number);
  }
}
