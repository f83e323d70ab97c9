import { z } from 'zod';
import type { CacheConfig } from '../config/cache.js';
import { describeCacheTarget } from '../config/cache.js';
import type { Logger } from '../util/logging.js';
import { errorMessage } from '../util/logging.js';
import { incCacheRequest } from '../util/metrics.js';
import { deriveCacheKey } from './cache_key.js';
import { CacheSerializationError, ValidationError } from './errors.js';
import type { ToolResult, ToolSuccess } from './result.js';
import type { KeyValueClient } from './stores/redis.js';

const NAMESPACE = /^[A-Za-z0-9_-]+$/;

export type CacheStats =
  | {
      status: 'connected';
      target: string;
      itemCount: number;
      namespaces: Record<string, number>;
      hits: number;
      misses: number;
      memoryUsed: string;
      ttlSeconds: number;
    }
  | { status: 'disconnected'; message: string; ttlSeconds: number }
  | { status: 'error'; message: string; ttlSeconds: number };

const StoredEntry = z.object({ ok: z.literal(true), data: z.unknown() });

/**
 * Cache-aside layer for lookups that return a ToolResult. Successful results
 * are stored as JSON under a key derived from the call arguments; failures
 * are never stored. Any store outage or timeout degrades to calling the
 * lookup directly.
 */
export class CacheLayer {
  private hits = 0;
  private misses = 0;

  constructor(
    private readonly client: KeyValueClient | null,
    private readonly config: CacheConfig,
    private readonly log: Logger,
  ) {}

  get connected(): boolean {
    return this.available() !== null;
  }

  /**
   * Wraps `lookup` so repeated calls with equal arguments are served from the
   * store until `ttlSeconds` elapses. Hits are decoded through `schema`.
   */
  withCache<A extends unknown[], T>(
    namespace: string,
    ttlSeconds: number,
    lookup: (...args: A) => Promise<ToolResult<T>>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): (...args: A) => Promise<ToolResult<T>> {
    if (!NAMESPACE.test(namespace)) {
      throw new ValidationError(`invalid cache namespace "${namespace}"`);
    }
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new ValidationError(`cache TTL must be a positive integer, got ${ttlSeconds}`);
    }

    return async (...args: A): Promise<ToolResult<T>> => {
      const client = this.available();
      if (!client) {
        incCacheRequest(namespace, 'bypass');
        return lookup(...args);
      }

      const key = deriveCacheKey(this.config.prefix, namespace, args);
      const hit = await this.read(client, key, namespace, schema);
      if (hit) return hit;

      const result = await lookup(...args);
      if (result.ok) {
        await this.write(client, key, { ok: true, data: result.data }, ttlSeconds);
      }
      return result;
    };
  }

  private async read<T>(
    client: KeyValueClient,
    key: string,
    namespace: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<ToolSuccess<T> | undefined> {
    let raw: string | null;
    try {
      raw = await client.get(key);
    } catch (err) {
      incCacheRequest(namespace, 'error');
      this.log.warn({ err, key }, 'cache read failed, calling lookup directly');
      return undefined;
    }
    if (raw === null) {
      this.misses++;
      incCacheRequest(namespace, 'miss');
      this.log.debug({ key }, 'cache miss');
      return undefined;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch (err) {
      throw new CacheSerializationError(`cached value under ${key} is not valid JSON`, { cause: err });
    }
    const entry = StoredEntry.safeParse(decoded);
    if (!entry.success) {
      throw new CacheSerializationError(`cached value under ${key} is not a stored result`);
    }
    const data = schema.safeParse(entry.data.data);
    if (!data.success) {
      throw new CacheSerializationError(`cached value under ${key} does not match the expected shape`);
    }
    this.hits++;
    incCacheRequest(namespace, 'hit');
    this.log.debug({ key }, '🎯 cache hit');
    return { ok: true, data: data.data, cached: true };
  }

  private async write<T>(client: KeyValueClient, key: string, entry: { ok: true; data: T }, ttlSeconds: number) {
    let encoded: string;
    try {
      encoded = JSON.stringify(entry);
    } catch (err) {
      throw new CacheSerializationError(`result for ${key} cannot be encoded as JSON`, { cause: err });
    }
    try {
      await client.set(key, encoded, ttlSeconds);
      this.log.debug({ key, ttlSeconds }, 'cached result');
    } catch (err) {
      this.log.warn({ err, key }, 'cache write failed, result returned uncached');
    }
  }

  async getStats(): Promise<CacheStats> {
    const ttlSeconds = this.config.defaultTtlSec;
    const client = this.available();
    if (!client) {
      return {
        status: 'disconnected',
        message: this.client ? 'Redis connection lost' : 'Redis not connected',
        ttlSeconds,
      };
    }
    try {
      const prefix = `${this.config.prefix}:`;
      const keys = await client.scan(`${prefix}*`);
      const namespaces: Record<string, number> = {};
      for (const key of keys) {
        const namespace = key.slice(prefix.length).split(':')[0];
        namespaces[namespace] = (namespaces[namespace] ?? 0) + 1;
      }
      return {
        status: 'connected',
        target: describeCacheTarget(this.config),
        itemCount: keys.length,
        namespaces,
        hits: this.hits,
        misses: this.misses,
        memoryUsed: await client.memoryUsed(),
        ttlSeconds,
      };
    } catch (err) {
      this.log.warn({ err }, 'cache stats unavailable');
      return { status: 'error', message: errorMessage(err), ttlSeconds };
    }
  }

  /**
   * Deletes every entry under this cache's prefix, or only one namespace.
   * Returns the number of keys removed; 0 when the store is unavailable.
   */
  async clear(namespace?: string): Promise<number> {
    if (namespace !== undefined && !NAMESPACE.test(namespace)) {
      throw new ValidationError(`invalid cache namespace "${namespace}"`);
    }
    const client = this.available();
    if (!client) return 0;
    const pattern = namespace ? `${this.config.prefix}:${namespace}:*` : `${this.config.prefix}:*`;
    try {
      const keys = await client.scan(pattern);
      const removed = keys.length ? await client.del(keys) : 0;
      this.log.info({ pattern, removed }, '🧹 cache cleared');
      return removed;
    } catch (err) {
      this.log.warn({ err, pattern }, 'cache clear failed');
      return 0;
    }
  }

  async close(): Promise<void> {
    if (!this.client) return;
    try {
      await this.client.quit();
    } catch (err) {
      this.log.warn({ err }, 'cache close failed');
    }
  }

  private available(): KeyValueClient | null {
    return this.client && this.client.isReady() ? this.client : null;
  }
}
