/**
 * Zod schemas for configuration validation
 *
 * This file defines both the validation schemas AND the TypeScript types.
 * Types are automatically inferred from the schemas, ensuring they stay in sync.
 */

import { z } from 'zod';
import { SearchPolicySchema } from '../types/search-policy.js';
import { TranslationModeSchema } from '../types/translation-mode.js';
import { createEnum } from '../utils/create-enum.js';

const logLevel = createEnum(['debug', 'info', 'success', 'warning', 'error'] as const);

export const LogLevelNameSchema = logLevel.schema;

export type LogLevelName = typeof logLevel.type;

/**
 * External player settings
 */
export const PlayerConfigSchema = z
  .object({
    command: z
      .string()
      .min(1, 'Cannot be empty')
      .describe('Player command template with {url}, {user_agent}, {referer}, {headers}'),
  })
  .strict();

/**
 * Source selection and per-source settings
 */
export const SourcesConfigSchema = z
  .object({
    order: z
      .array(z.string().min(1))
      .min(1, 'At least one source must be configured')
      .refine((names) => new Set(names).size === names.length, 'Source names must be unique')
      .describe('Sources to query, in priority order'),
    policy: SearchPolicySchema.describe('How search results from several sources are combined'),
    allanime: z
      .object({
        providerPriority: z.array(z.string()).describe('Stream providers to try first, in order'),
      })
      .strict()
      .describe('AllAnime source settings'),
    animeworld: z
      .object({
        baseUrl: z.string().url().describe('Site root'),
      })
      .strict()
      .describe('AnimeWorld source settings'),
  })
  .strict();

/**
 * Outbound HTTP settings
 */
export const TransportConfigSchema = z
  .object({
    timeout: z.number().int().positive().describe('Per-request timeout in milliseconds'),
    userAgent: z.string().min(1).describe('Default User-Agent header'),
    httpsOnly: z.boolean().describe('Refuse plain HTTP URLs'),
  })
  .strict();

/**
 * Retry configuration with exponential backoff
 */
export const RetryConfigSchema = z
  .object({
    maxRetries: z.number().int().nonnegative().describe('Maximum number of retry attempts'),
    initialTimeout: z.number().nonnegative().describe('Delay before the first retry in milliseconds'),
    backoffMultiplier: z.number().positive().describe('Multiplier for exponential backoff'),
    jitterPercentage: z.number().int().min(0).max(100).describe('Jitter percentage for retry delays'),
  })
  .strict();

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export const LoggingConfigSchema = z
  .object({
    level: LogLevelNameSchema.describe('Minimum log level'),
    file: z.string().min(1).describe('Log file used while the interface owns the terminal'),
  })
  .strict();

/**
 * Main configuration schema. Every object is strict, so a misspelled key fails validation at any depth.
 */
export const ConfigSchema = z
  .object({
    player: PlayerConfigSchema,
    translation: TranslationModeSchema.describe('Translation to request: sub, dub or raw'),
    sources: SourcesConfigSchema,
    transport: TransportConfigSchema,
    retry: RetryConfigSchema,
    logging: LoggingConfigSchema,
  })
  .strict();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Shape accepted from the YAML file: every field optional. deepPartial keeps
 * the strict objects, so unknown keys are rejected at every level.
 */
export const FileConfigSchema = ConfigSchema.deepPartial();

export type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Validate a fully merged configuration
 *
 * @throws z.ZodError if validation fails
 */
export function validateConfig(rawConfig: unknown): Config {
  return ConfigSchema.parse(rawConfig);
}

/**
 * Validate without throwing
 */
export function validateConfigSafe(
  rawConfig: unknown,
): { success: true; config: Config } | { success: false; error: string } {
  const result = ConfigSchema.safeParse(rawConfig);
  if (result.success) {
    return { success: true, config: result.data };
  }
  return { success: false, error: formatZodError(result.error) };
}

/**
 * Format Zod error into a readable message
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `"${issue.path.join('.')}"` : 'value';
      const code = issue.code.toUpperCase();
      return `${path} ${issue.message} [${code}]`;
    })
    .join('; ');
}
