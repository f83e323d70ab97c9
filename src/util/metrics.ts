import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import { getAllBreakerStats } from './circuit.js';
import { getAllLimiterStats } from './limiter.js';

/**
 * Process metrics backed by a dedicated prom-client registry.
 * - METRICS=prom exposes the Prometheus text format at /metrics
 * - METRICS=json exposes a JSON snapshot at /metrics
 */
const MODE = (process.env.METRICS ?? '').toLowerCase();
const IS_PROM = MODE === 'prom' || MODE === 'prometheus';
const IS_JSON = MODE === 'json';

export const metricsEnabled = IS_PROM || IS_JSON;
export const metricsMode: 'prom' | 'json' | 'off' = IS_PROM ? 'prom' : IS_JSON ? 'json' : 'off';

export const registry = new Registry();
if (IS_PROM) collectDefaultMetrics({ register: registry });

export type CacheOutcome = 'hit' | 'miss' | 'bypass' | 'error';

const cacheRequests = new Counter({
  name: 'cache_requests_total',
  help: 'Cache lookups by namespace and outcome',
  labelNames: ['namespace', 'result'] as const,
  registers: [registry],
});

const externalRequests = new Counter({
  name: 'external_requests_total',
  help: 'Outbound HTTP requests by target and status',
  labelNames: ['target', 'status'] as const,
  registers: [registry],
});

const externalDuration = new Histogram({
  name: 'external_request_duration_ms',
  help: 'Outbound HTTP request latency in milliseconds',
  labelNames: ['target'] as const,
  buckets: [50, 100, 250, 500, 1000, 2000, 4000, 8000],
  registers: [registry],
});

const persistenceFailures = new Counter({
  name: 'persistence_failures_total',
  help: 'Conversation store operations that failed',
  labelNames: ['operation'] as const,
  registers: [registry],
});

const chatTurns = new Counter({
  name: 'chat_turns_total',
  help: 'Chat turns by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

const llmRequests = new Counter({
  name: 'llm_requests_total',
  help: 'Chat completion requests by provider and status',
  labelNames: ['provider', 'status'] as const,
  registers: [registry],
});

const llmDuration = new Histogram({
  name: 'llm_request_duration_ms',
  help: 'Chat completion latency in milliseconds',
  labelNames: ['provider'] as const,
  buckets: [250, 500, 1000, 2000, 4000, 8000, 16000, 32000],
  registers: [registry],
});

export function incCacheRequest(namespace: string, result: CacheOutcome): void {
  cacheRequests.inc({ namespace, result });
}

export function observeExternal(labels: { target: string; status: string }, durationMs: number): void {
  externalRequests.inc(labels);
  externalDuration.observe({ target: labels.target }, durationMs);
}

export function incPersistenceFailure(operation: string): void {
  persistenceFailures.inc({ operation });
}

export function incChatTurn(outcome: 'ok' | 'error' | 'unavailable'): void {
  chatTurns.inc({ outcome });
}

export function observeLlmRequest(provider: string, status: string, durationMs: number): void {
  llmRequests.inc({ provider, status });
  llmDuration.observe({ provider }, durationMs);
}

export async function getPrometheusText(): Promise<string> {
  return registry.metrics();
}

/**
 * Flattened counter values keyed by `name{label=value,...}`, plus breaker and
 * limiter state per host.
 */
export async function snapshot(): Promise<Record<string, unknown>> {
  const counters: Record<string, number> = {};
  for (const metric of await registry.getMetricsAsJSON()) {
    if (String(metric.type) !== 'counter') continue;
    for (const value of metric.values) {
      const labels = Object.entries(value.labels)
        .map(([k, v]) => `${k}=${String(v)}`)
        .join(',');
      counters[labels ? `${metric.name}{${labels}}` : metric.name] = value.value;
    }
  }
  return { counters, breakers: getAllBreakerStats(), limiters: getAllLimiterStats() };
}
