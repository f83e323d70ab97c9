import { createHash } from 'node:crypto';
import { CacheSerializationError } from './errors.js';

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function canonicalize(value: unknown, seen: WeakSet<object>): unknown {
  if (typeof value !== 'object' || value === null) return value;
  if (hasToJSON(value)) return canonicalize(value.toJSON(), seen);
  if (seen.has(value)) throw new CacheSerializationError('cannot derive a cache key from a circular structure');
  seen.add(value);
  let out: unknown;
  if (Array.isArray(value)) {
    out = value.map((item) => canonicalize(item, seen));
  } else {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key), seen);
    }
    out = sorted;
  }
  seen.delete(value);
  return out;
}

/**
 * JSON encoding with object keys sorted at every depth, so argument objects
 * that differ only in key order encode identically.
 */
export function stableStringify(value: unknown): string {
  try {
    return JSON.stringify(canonicalize(value, new WeakSet())) ?? 'null';
  } catch (err) {
    if (err instanceof CacheSerializationError) throw err;
    throw new CacheSerializationError(`cannot derive a cache key: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
}

/** `<prefix>:<namespace>:<first 12 hex chars of md5(canonical args)>` */
export function deriveCacheKey(prefix: string, namespace: string, args: readonly unknown[]): string {
  const digest = createHash('md5').update(stableStringify({ args })).digest('hex').slice(0, 12);
  return `${prefix}:${namespace}:${digest}`;
}
