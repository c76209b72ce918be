import { describe, expect, it } from 'vitest';
import { getDefaults } from './config-defaults.js';
import { FileConfigSchema, validateConfig, validateConfigSafe } from './config-schema.js';

describe('Config Schema', () => {
  const validConfig = getDefaults('linux');

  it('should validate correct config', () => {
    expect(() => validateConfig(validConfig)).not.toThrow();
    expect(validateConfigSafe(validConfig).success).toBe(true);
  });

  it('should reject duplicate sources', () => {
    const result = validateConfigSafe({
      ...validConfig,
      sources: { ...validConfig.sources, order: ['allanime', 'allanime'] },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBe('"sources.order" Source names must be unique [CUSTOM]');
    }
  });

  it('should reject an unknown search policy', () => {
    const result = validateConfigSafe({ ...validConfig, sources: { ...validConfig.sources, policy: 'merge' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toContain('"sources.policy"');
    }
  });

  it('should reject negative retries and out of range jitter', () => {
    const result = validateConfigSafe({
      ...validConfig,
      retry: { ...validConfig.retry, maxRetries: -1, jitterPercentage: 150 },
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toContain('"retry.maxRetries"');
      expect(result.error).toContain('"retry.jitterPercentage"');
    }
  });

  it('should reject an unknown translation mode', () => {
    expect(validateConfigSafe({ ...validConfig, translation: 'fansub' }).success).toBe(false);
  });

  it('should accept a partial file config', () => {
    expect(FileConfigSchema.safeParse({ retry: { maxRetries: 1 } }).success).toBe(true);
    expect(FileConfigSchema.safeParse({}).success).toBe(true);
  });

  it('should reject unknown keys inside nested sections', () => {
    expect(FileConfigSchema.safeParse({ sources: { allanime: { providerPriorty: ['Default'] } } }).success).toBe(false);
    expect(FileConfigSchema.safeParse({ retry: { maxRetry: 1 } }).success).toBe(false);
    const withExtraKey = { ...validConfig, logging: { ...validConfig.logging, colour: true } };
    expect(validateConfigSafe(withExtraKey).success).toBe(false);
  });
});
