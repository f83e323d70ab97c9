import { createClient } from 'redis';
import type { CacheConfig } from '../../config/cache.js';
import { describeCacheTarget } from '../../config/cache.js';
import type { Logger } from '../../util/logging.js';
import { withTimeout } from '../../util/timeout.js';

/**
 * The slice of a key-value store the cache layer needs. Every call is bounded
 * by the configured timeout.
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSec: number): Promise<void>;
  scan(pattern: string): Promise<string[]>;
  del(keys: string[]): Promise<number>;
  ping(): Promise<boolean>;
  memoryUsed(): Promise<string>;
  isReady(): boolean;
  quit(): Promise<void>;
}

export type RedisClient = ReturnType<typeof createClient>;

const DEL_BATCH = 500;

export function redisUrl(cfg: CacheConfig): string {
  if (cfg.url) return cfg.url;
  const auth = cfg.password ? `:${encodeURIComponent(cfg.password)}@` : '';
  return `redis://${auth}${cfg.host}:${cfg.port}/${cfg.db}`;
}

export function parseUsedMemory(info: string): string {
  const match = /^used_memory_human:(.+)$/m.exec(info);
  return match ? match[1].trim() : 'unknown';
}

export function createRedisClient(cfg: CacheConfig, log: Logger): RedisClient {
  const client = createClient({
    url: redisUrl(cfg),
    disableOfflineQueue: true,
    socket: {
      connectTimeout: cfg.timeoutMs,
      reconnectStrategy: (retries: number) => Math.min(100 * 2 ** Math.min(retries, 6), 5000),
    },
  });
  let lastError: string | undefined;
  client.on('error', (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    if (message === lastError) return;
    lastError = message;
    log.warn({ err, target: describeCacheTarget(cfg) }, 'redis client error');
  });
  client.on('ready', () => {
    lastError = undefined;
  });
  return client;
}

export function wrapRedisClient(client: RedisClient, timeoutMs: number): KeyValueClient {
  return {
    async get(key) {
      return withTimeout(() => client.get(key), timeoutMs, 'redis GET');
    },
    async set(key, value, ttlSec) {
      await withTimeout(() => client.set(key, value, { EX: ttlSec }), timeoutMs, 'redis SET');
    },
    async scan(pattern) {
      return withTimeout(
        async () => {
          const keys: string[] = [];
          for await (const key of client.scanIterator({ MATCH: pattern, COUNT: 200 })) {
            keys.push(key);
          }
          return keys;
        },
        timeoutMs,
        'redis SCAN',
      );
    },
    async del(keys) {
      let removed = 0;
      for (let i = 0; i < keys.length; i += DEL_BATCH) {
        const batch = keys.slice(i, i + DEL_BATCH);
        removed += await withTimeout(() => client.del(batch), timeoutMs, 'redis DEL');
      }
      return removed;
    },
    async ping() {
      return (await withTimeout(() => client.ping(), timeoutMs, 'redis PING')) === 'PONG';
    },
    async memoryUsed() {
      return parseUsedMemory(await withTimeout(() => client.info('memory'), timeoutMs, 'redis INFO'));
    },
    isReady() {
      return client.isReady;
    },
    async quit() {
      if (client.isOpen) await client.quit();
    },
  };
}

/**
 * Connects and pings once. An unreachable or disabled store yields null and
 * the cache runs in pass-through mode; a store that drops later is bypassed
 * while the client reconnects in the background.
 */
export async function connectKeyValueStore(cfg: CacheConfig, log: Logger): Promise<KeyValueClient | null> {
  const target = describeCacheTarget(cfg);
  if (!cfg.enabled) {
    log.info('cache disabled by configuration');
    return null;
  }
  const client = createRedisClient(cfg, log);
  try {
    await withTimeout(() => client.connect(), cfg.timeoutMs, 'redis connect');
    const store = wrapRedisClient(client, cfg.timeoutMs);
    if (!(await store.ping())) throw new Error('unexpected PING reply');
    log.info({ target }, '✅ connected to redis cache');
    return store;
  } catch (err) {
    log.warn({ err, target }, 'redis unavailable, caching disabled');
    if (client.isOpen) {
      await client.disconnect().catch((closeErr: unknown) => log.debug({ err: closeErr }, 'redis disconnect failed'));
    }
    return null;
  }
}
