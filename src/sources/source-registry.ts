import type { Config } from '../config/config-schema.js';
import { ConfigError } from '../errors/custom-errors.js';
import type { Transport } from '../transport/types.js';
import type { SourceAdapter } from '../types/source.types.js';
import { AllAnimeSource } from './impl/allanime-source.js';
import { AnimeWorldSource } from './impl/animeworld-source.js';

/**
 * What a factory gets to build an adapter
 */
export type SourceContext = {
  config: Config;
  transport: Transport;
};

export type SourceFactory = (context: SourceContext) => SourceAdapter;

/**
 * Source registry: adapter names to factories
 */
export class SourceRegistry {
  private factories: Map<string, SourceFactory> = new Map();

  /**
   * Register a factory under a source name
   */
  register(name: string, factory: SourceFactory): void {
    this.factories.set(name, factory);
  }

  /**
   * Get all registered source names
   */
  getNames(): string[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Create one adapter or throw error
   */
  create(name: string, context: SourceContext): SourceAdapter {
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigError(`Unknown source: "${name}". Available sources: ${this.getNames().join(', ')}`);
    }
    return factory(context);
  }

  /**
   * Create the adapters listed in `sources.order`, keeping that order
   */
  createAll(context: SourceContext): SourceAdapter[] {
    const names = context.config.sources.order;
    if (names.length === 0) {
      throw new ConfigError('No sources configured');
    }
    return names.map((name) => this.create(name, context));
  }
}

/**
 * Register the sources shipped with shio
 */
export function registerBuiltinSources(registry: SourceRegistry): SourceRegistry {
  registry.register(
    'allanime',
    ({ config, transport }) =>
      new AllAnimeSource({
        transport,
        userAgent: config.transport.userAgent,
        mode: config.translation,
        providerPriority: config.sources.allanime.providerPriority,
      }),
  );
  registry.register(
    'animeworld',
    ({ config, transport }) =>
      new AnimeWorldSource({
        transport,
        userAgent: config.transport.userAgent,
        baseUrl: config.sources.animeworld.baseUrl,
      }),
  );
  return registry;
}

// Global registry instance
export const sourceRegistry: SourceRegistry = registerBuiltinSources(new SourceRegistry());
