import { z } from 'zod';
import { envFlag, envValue } from './env.js';

const ttl = z.coerce.number().int().positive();

export const CacheConfigSchema = z.object({
  enabled: envFlag(true),
  url: z.string().url().optional(),
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().min(1).max(65535).default(6379),
  password: z.string().optional(),
  db: z.coerce.number().int().min(0).default(0),
  prefix: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'cache prefix may only contain letters, digits, "-" and "_"')
    .default('wiki'),
  defaultTtlSec: ttl.default(3600),
  ttl: z.object({
    search: ttl.optional(),
    sections: ttl.default(86400),
    section: ttl.default(86400),
  }),
  timeoutMs: z.coerce.number().int().min(50).default(2000),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema> & { ttl: { search: number } };

export function loadCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const parsed = CacheConfigSchema.parse({
    enabled: env.CACHE_ENABLED,
    url: envValue(env.REDIS_URL),
    host: envValue(env.REDIS_HOST),
    port: envValue(env.REDIS_PORT),
    password: envValue(env.REDIS_PASSWORD),
    db: envValue(env.REDIS_DB),
    prefix: envValue(env.CACHE_PREFIX),
    defaultTtlSec: envValue(env.CACHE_TTL),
    ttl: {
      search: envValue(env.CACHE_TTL_SEARCH),
      sections: envValue(env.CACHE_TTL_SECTIONS),
      section: envValue(env.CACHE_TTL_SECTION),
    },
    timeoutMs: envValue(env.CACHE_TIMEOUT_MS),
  });
  return { ...parsed, ttl: { ...parsed.ttl, search: parsed.ttl.search ?? parsed.defaultTtlSec } };
}

/** Host description for logs and stats; never includes credentials. */
export function describeCacheTarget(cfg: CacheConfig): string {
  if (cfg.url) {
    const u = new URL(cfg.url);
    return `${u.hostname}:${u.port || '6379'}${u.pathname && u.pathname !== '/' ? u.pathname : `/${cfg.db}`}`;
  }
  return `${cfg.host}:${cfg.port}/${cfg.db}`;
}
