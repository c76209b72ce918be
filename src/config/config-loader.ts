import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigError, errorMessage } from '../errors/custom-errors.js';
import { parseCommandTemplate } from '../player/command-template.js';
import { type DeepPartial, deepMerge } from '../utils/deep-merge.js';
import { resolveEnvRecursive } from '../utils/env-resolver.js';
import { getDefaults, PLAYER_ENV_VAR, type Platform } from './config-defaults.js';
import { type Config, FileConfigSchema, type FileConfig, formatZodError, validateConfigSafe } from './config-schema.js';

export type LoadConfigOptions = {
  /** Explicit config file; must exist when given */
  configPath?: string;
  /** Values from the command line, applied last */
  overrides?: DeepPartial<Config>;
  env?: NodeJS.ProcessEnv;
  platform?: Platform;
};

/**
 * Default config file path ($XDG_CONFIG_HOME/shio/config.yaml)
 */
export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const configHome = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(configHome, 'shio', 'config.yaml');
}

/**
 * Read and validate the YAML config file
 *
 * @returns Parsed file contents, or an empty object when the file is optional and missing
 * @throws ConfigError if the file is required and missing, or invalid
 */
export async function readConfigFile(
  path: string,
  required: boolean,
  env: NodeJS.ProcessEnv = process.env,
): Promise<FileConfig> {
  const absolutePath = resolve(path);

  if (!existsSync(absolutePath)) {
    if (required) {
      throw new ConfigError(`Configuration file not found: "${absolutePath}"`);
    }
    return {};
  }

  const content = await readFile(absolutePath, 'utf8');

  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse YAML in "${absolutePath}": ${errorMessage(error)}`);
  }

  let resolved: unknown;
  try {
    resolved = resolveEnvRecursive(raw ?? {}, env);
  } catch (error) {
    throw new ConfigError(`${errorMessage(error)} (referenced in "${absolutePath}")`);
  }

  const result = FileConfigSchema.safeParse(resolved);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in "${absolutePath}": ${formatZodError(result.error)}`);
  }

  return result.data;
}

/**
 * Build the effective configuration.
 *
 * Precedence, lowest first: defaults, config file, SHIO_PLAYER_CMD, command line.
 *
 * @throws ConfigError on any invalid layer or a malformed player template
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Config> {
  const env = options.env ?? process.env;
  const path = options.configPath ?? defaultConfigPath(env);

  const fileConfig = await readConfigFile(path, options.configPath !== undefined, env);

  const envPlayer = env[PLAYER_ENV_VAR];
  const envLayer: DeepPartial<Config> = envPlayer ? { player: { command: envPlayer } } : {};

  const base = deepMerge(deepMerge(getDefaults(options.platform), fileConfig), envLayer);
  const merged = deepMerge(base, options.overrides);

  const validation = validateConfigSafe(merged);
  if (!validation.success) {
    throw new ConfigError(`Invalid configuration: ${validation.error}`);
  }

  // Fails fast on a malformed template so the process never starts half-configured
  parseCommandTemplate(validation.config.player.command);

  return validation.config;
}
