/**
 * Recursive partial used for layered configuration
 */
export type DeepPartial<T> = T extends readonly unknown[]
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

/**
 * Merge `source` over `target`. Plain objects merge recursively; arrays and
 * primitives from `source` replace the target value; `undefined` is skipped.
 */
export function deepMerge<T extends object>(target: T, source?: DeepPartial<T>): T {
  if (!source) {
    return target;
  }

  const base: object = target;
  const result: Record<string, unknown> = { ...base };

  const entries: Array<[string, unknown]> = Object.entries(source);
  for (const [key, sourceValue] of entries) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  // keys of result are exactly the keys of T
  return result as T;
}

function isPlainObject(item: unknown): item is Record<string, unknown> {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}
