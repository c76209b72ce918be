export { BaseSource } from './base/base-source.js';
export { AllAnimeSource } from './impl/allanime-source.js';
export { AnimeWorldSource } from './impl/animeworld-source.js';
export { registerBuiltinSources, SourceRegistry, sourceRegistry } from './source-registry.js';
export type { SourceContext, SourceFactory } from './source-registry.js';
