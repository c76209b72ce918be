/**
 * Resolve environment variables in strings
 * Supports ${VAR_NAME} and ${VAR_NAME:-fallback} syntax
 *
 * @param value - String that may contain ${VAR_NAME} placeholders
 * @param env - Environment to read from
 * @returns String with environment variables resolved
 */
export function resolveEnv(value: string, env: NodeJS.ProcessEnv = process.env): string {
  const pattern = /\$\{([A-Za-z_][A-Za-z0-9_]*)(?::-([^}]*))?\}/g;
  return value.replace(pattern, (_match, varName: string, fallback?: string) => {
    const envValue = env[varName];
    if (envValue !== undefined && envValue !== '') {
      return envValue;
    }
    if (fallback !== undefined) {
      return fallback;
    }
    throw new Error(`Environment variable "${varName}" is not set`);
  });
}

/**
 * Recursively resolve environment variables in a parsed document
 *
 * @param obj - Value that may contain strings with ${VAR_NAME}
 * @returns Copy with all environment variables resolved
 */
export function resolveEnvRecursive(obj: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof obj === 'string') {
    return resolveEnv(obj, env);
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvRecursive(item, env));
  }

  if (obj !== null && typeof obj === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvRecursive(value, env);
    }
    return result;
  }

  return obj;
}
