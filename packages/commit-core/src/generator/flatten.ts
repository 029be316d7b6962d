/**
 * Flatten a discovery document into dotted key paths
 */

export type FlatDocument = Map<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Nested objects become dotted keys. Arrays, primitives and empty objects
 * are leaves.
 *
 * @example
 * flattenDocument({ a: { b: 1, c: [2] } });
 * // Map { 'a.b' => 1, 'a.c' => [2] }
 */
export function flattenDocument(doc: unknown): FlatDocument {
  const flat: FlatDocument = new Map();

  const walk = (value: unknown, prefix: string): void => {
    if (isPlainObject(value) && (Object.keys(value).length > 0 || prefix === '')) {
      for (const [key, child] of Object.entries(value)) {
        walk(child, prefix ? `${prefix}.${key}` : key);
      }
      return;
    }
    flat.set(prefix, value);
  };

  if (isPlainObject(doc)) {
    walk(doc, '');
  }

  return flat;
}
