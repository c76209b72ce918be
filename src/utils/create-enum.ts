import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase, underscore-separated keys: 'first-success' -> FIRST_SUCCESS
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 *
 * @example
 * ```ts
 * const translationMode = createEnum(['sub', 'dub', 'raw'] as const);
 *
 * // translationMode.object.SUB === 'sub'
 * // translationMode.schema - Zod schema
 * // translationMode.is('dub') === true
 * // typeof translationMode.type === 'sub' | 'dub' | 'raw'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const obj = Object.fromEntries(values.map((v) => [toKey(v), v])) as Record<EnumKey<T[number]>, T[number]>;

  return {
    values,
    object: obj,
    schema: z.enum(values),
    is: (value: unknown): value is T[number] => values.some((v) => v === value),
    type: null as unknown as T[number],
  };
}

type EnumKey<S extends string> = Uppercase<S extends `${infer Head}-${infer Tail}` ? `${Head}_${EnumKey<Tail>}` : S>;

function toKey(value: string): string {
  return value.toUpperCase().replaceAll('-', '_');
}
