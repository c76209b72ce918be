import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SearchPolicy } from '../types/search-policy.js';
import { TranslationMode } from '../types/translation-mode.js';
import type { Config } from './config-schema.js';

export type Platform = 'android' | 'linux' | 'macos' | 'windows' | 'unknown';

/**
 * Desktop browser identity sent to backends that fingerprint requests
 */
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0';

/**
 * Environment variable that overrides the player command template
 */
export const PLAYER_ENV_VAR = 'SHIO_PLAYER_CMD';

/**
 * Detect the platform the way the install script does: Termux on Android
 * reports Linux but sets a PREFIX pointing into its app directory.
 */
export function detectPlatform(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): Platform {
  switch (platform) {
    case 'android':
      return 'android';
    case 'linux':
      return env.PREFIX?.toLowerCase().includes('termux') ? 'android' : 'linux';
    case 'darwin':
      return 'macos';
    case 'win32':
    case 'cygwin':
      return 'windows';
    default:
      return 'unknown';
  }
}

/**
 * Player command used when nothing is configured
 */
export function defaultPlayerCommand(platform: Platform): string {
  if (platform === 'android') {
    return 'termux-open {url} --content-type video';
  }
  return 'mpv {url}';
}

/**
 * Default configuration values
 */
export function getDefaults(platform: Platform = detectPlatform()): Config {
  return {
    player: {
      command: defaultPlayerCommand(platform),
    },
    translation: TranslationMode.SUB,
    sources: {
      order: ['allanime'],
      policy: SearchPolicy.FIRST_SUCCESS,
      allanime: {
        providerPriority: ['Default', 'Yt-mp4', 'S-mp4', 'Luf-Mp4'],
      },
      animeworld: {
        baseUrl: 'https://www.animeworld.ac',
      },
    },
    transport: {
      timeout: 12_000,
      userAgent: DEFAULT_USER_AGENT,
      httpsOnly: true,
    },
    retry: {
      maxRetries: 2,
      initialTimeout: 300,
      backoffMultiplier: 2,
      jitterPercentage: 10,
    },
    logging: {
      level: 'info',
      file: join(tmpdir(), 'shio.log'),
    },
  };
}
