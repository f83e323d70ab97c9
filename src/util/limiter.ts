import Bottleneck from 'bottleneck';

const pools = new Map<string, Bottleneck>();

function getConfig(host: string): { minTime: number; maxConcurrent: number } {
  const defaultMinTime = Number(process.env.EXT_RATE_MIN_TIME_MS || 100);
  const defaultMaxConcurrency = Number(process.env.EXT_RATE_MAX_CONCURRENCY || 4);

  // Per-host overrides
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  const minTime = Number(process.env[`RATE_MIN_MS_${hostKey}`] || defaultMinTime);
  const maxConcurrent = Number(process.env[`RATE_MAX_CONC_${hostKey}`] || defaultMaxConcurrency);

  return { minTime, maxConcurrent };
}

export function getLimiter(host: string): Bottleneck {
  const existing = pools.get(host);
  if (existing) return existing;
  const limiter = new Bottleneck(getConfig(host));
  pools.set(host, limiter);
  return limiter;
}

export async function scheduleWithLimit<T>(host: string, fn: () => Promise<T>): Promise<T> {
  return getLimiter(host).schedule(() => fn());
}

export function getAllLimiterStats(): Record<string, { queued: number; running: number }> {
  const stats: Record<string, { queued: number; running: number }> = {};
  for (const [host, limiter] of pools.entries()) {
    const counts = limiter.counts();
    stats[host] = { queued: counts.QUEUED, running: counts.RUNNING + counts.EXECUTING };
  }
  return stats;
}
