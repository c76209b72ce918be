import { boolean, command, flag, oneOf, option, optional, restPositionals, string } from 'cmd-ts';
import { loadConfig } from './config/config-loader.js';
import type { Config } from './config/config-schema.js';
import { ConfigError, errorMessage, ShioError } from './errors/custom-errors.js';
import { ResolutionPipeline } from './pipeline/resolution-pipeline.js';
import { PlayerLauncher } from './player/player-launcher.js';
import { SessionController, type SessionLauncher } from './session/session-controller.js';
import { type SourceRegistry, sourceRegistry } from './sources/index.js';
import { HttpTransport } from './transport/http-transport.js';
import type { Transport } from './transport/types.js';
import { SEARCH_POLICIES, type SearchPolicy } from './types/search-policy.js';
import { TRANSLATION_MODES, type TranslationMode } from './types/translation-mode.js';
import { InteractiveController } from './ui/interactive-controller.js';
import { NodeTerminal } from './ui/node-terminal.js';
import type { Terminal } from './ui/terminal.js';
import type { DeepPartial } from './utils/deep-merge.js';
import { type LogFile, openLogFile } from './utils/log-file.js';
import { LogLevel, logger } from './utils/logger.js';

export type AppOptions = {
  query?: string;
  mode?: TranslationMode;
  player?: string;
  configPath?: string;
  policy?: SearchPolicy;
  sources?: string[];
  debug: boolean;
};

export type AppDependencies = {
  loadConfig: typeof loadConfig;
  sourceRegistry: SourceRegistry;
  createTransport: (config: Config) => Transport;
  createLauncher: (template: string) => SessionLauncher;
  /** Returns null when stdin/stdout are not interactive */
  createTerminal: () => Terminal | null;
  openLogFile: (path: string) => Promise<LogFile>;
};

const defaultDependencies: AppDependencies = {
  loadConfig,
  sourceRegistry,
  createTransport: (config) =>
    new HttpTransport({
      timeout: config.transport.timeout,
      userAgent: config.transport.userAgent,
      httpsOnly: config.transport.httpsOnly,
    }),
  createLauncher: (template) => new PlayerLauncher(template),
  createTerminal: () => (NodeTerminal.isSupported() ? new NodeTerminal() : null),
  openLogFile,
};

const LOG_LEVELS: Record<Config['logging']['level'], LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  success: LogLevel.SUCCESS,
  warning: LogLevel.WARNING,
  error: LogLevel.ERROR,
};

/**
 * Turn command line options into a config layer
 */
export function buildOverrides(options: AppOptions): DeepPartial<Config> {
  const overrides: DeepPartial<Config> = {};

  if (options.mode) {
    overrides.translation = options.mode;
  }
  if (options.player) {
    overrides.player = { command: options.player };
  }
  if (options.policy || options.sources) {
    const sources: DeepPartial<Config['sources']> = {};
    if (options.policy) sources.policy = options.policy;
    if (options.sources) sources.order = options.sources;
    overrides.sources = sources;
  }
  if (options.debug) {
    overrides.logging = { level: 'debug' };
  }

  return overrides;
}

/**
 * Split a comma separated source list
 */
export function parseSourceList(value: string): string[] {
  return value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

/**
 * Start the interactive session and resolve when the user quits
 *
 * @throws ShioError when startup fails (configuration, sources, no terminal)
 */
export async function runApp(options: AppOptions, deps: AppDependencies = defaultDependencies): Promise<void> {
  if (options.debug) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const config = await deps.loadConfig({ configPath: options.configPath, overrides: buildOverrides(options) });
  logger.setLevel(LOG_LEVELS[config.logging.level]);
  logger.debug(`Sources: ${config.sources.order.join(', ')} (${config.sources.policy})`);

  const transport = deps.createTransport(config);
  const sources = deps.sourceRegistry.createAll({ config, transport });
  const pipeline = new ResolutionPipeline({ sources, policy: config.sources.policy, retry: config.retry });
  const launcher = deps.createLauncher(config.player.command);

  const terminal = deps.createTerminal();
  if (!terminal) {
    throw new ShioError('An interactive terminal is required');
  }

  const logFile = await deps.openLogFile(config.logging.file);
  const session = new SessionController({ pipeline, launcher });

  let quit: () => void = () => {};
  const quitRequested = new Promise<void>((resolve) => {
    quit = resolve;
  });
  const ui = new InteractiveController({ session, terminal, onQuit: () => quit() });

  const previousOutput = logger.setOutput(logFile, false);
  const onTerminate = () => session.dispatch({ type: 'quit' });
  process.once('SIGTERM', onTerminate);

  try {
    ui.start();
    logger.info(`Session started (${config.translation}, player: ${config.player.command})`);

    if (options.query?.trim()) {
      session.dispatch({ type: 'submit', query: options.query });
    }

    await quitRequested;
  } finally {
    process.off('SIGTERM', onTerminate);
    ui.stop();
    await session.close();
    logger.setOutput(previousOutput, true);
    await logFile.close();
  }

  const logError = logFile.getError();
  if (logError) {
    logger.warning(`Could not write log file "${logFile.path}": ${logError.message}`);
  }
}

// Define CLI using cmd-ts
export const cli = command({
  name: 'shio',
  description: 'Search anime across streaming sources and play episodes in an external player',
  version: '0.1.0',
  args: {
    query: restPositionals({
      type: string,
      displayName: 'query',
      description: 'Title to search for right away',
    }),
    mode: option({
      type: optional(oneOf([...TRANSLATION_MODES])),
      long: 'mode',
      short: 'm',
      description: 'Translation: sub, dub or raw',
    }),
    player: option({
      type: optional(string),
      long: 'player',
      short: 'p',
      description: 'Player command template, e.g. "mpv --referrer={referer} {url}"',
    }),
    config: option({
      type: optional(string),
      long: 'config',
      short: 'c',
      description: 'Path to configuration file (default: ~/.config/shio/config.yaml)',
    }),
    policy: option({
      type: optional(oneOf([...SEARCH_POLICIES])),
      long: 'policy',
      description: 'How sources are searched: first-success or aggregate',
    }),
    sources: option({
      type: optional(string),
      long: 'sources',
      short: 's',
      description: 'Comma separated sources in priority order, e.g. allanime,animeworld',
    }),
    debug: flag({
      type: boolean,
      long: 'debug',
      short: 'd',
      description: 'Log debug messages',
    }),
  },
  handler: async ({ query, mode, player, config, policy, sources, debug }) => {
    try {
      await runApp({
        query: query.join(' '),
        mode,
        player,
        configPath: config,
        policy,
        sources: sources === undefined ? undefined : parseSourceList(sources),
        debug,
      });
      process.exit(0);
    } catch (error) {
      if (error instanceof ConfigError) {
        logger.error(`Configuration error: ${error.message}`);
      } else {
        logger.error(`Fatal error: ${errorMessage(error)}`);
      }
      process.exit(1);
    }
  },
});
