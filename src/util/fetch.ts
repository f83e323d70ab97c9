import { setTimeout as delay } from 'node:timers/promises';
import { fetch as undiciFetch } from 'undici';
import { observeExternal } from './metrics.js';
import { createLogger } from './logging.js';
import { scheduleWithLimit } from './limiter.js';
import { CircuitOpenError, withBreaker } from './circuit.js';

const log = createLogger({ name: 'fetch' });

type FetchResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  text(): Promise<string>;
};
type FetchLike = (url: string, init: { signal: AbortSignal; headers: Record<string, string> }) => Promise<FetchResponse>;

// The global fetch is used under test so it can be spied on
function getFetch(): FetchLike {
  return process.env.NODE_ENV === 'test' ? globalThis.fetch : undiciFetch;
}

const WIKIPEDIA_HOST = /^[a-z][a-z-]*\.wikipedia\.org$/;

function isAllowedHost(hostname: string): boolean {
  if (WIKIPEDIA_HOST.test(hostname)) return true;
  const extra = (process.env.FETCH_ALLOWED_HOSTS ?? '')
    .split(',')
    .map((h) => h.trim())
    .filter(Boolean);
  return extra.includes(hostname);
}

export class ExternalFetchError extends Error {
  constructor(
    readonly kind: 'timeout' | 'http' | 'network',
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = 'ExternalFetchError';
  }
}

const BASE_DELAY = 200;
const MAX_DELAY = 5000;
const JITTER_FACTOR = 0.25;

async function backoff(attempt: number, retryAfterSec?: number): Promise<void> {
  if (retryAfterSec) {
    await delay(Math.min(Math.max(100, retryAfterSec * 1000), MAX_DELAY));
    return;
  }
  const expDelay = BASE_DELAY * Math.pow(1.5, attempt);
  const jitter = expDelay * JITTER_FACTOR * (Math.random() * 2 - 1);
  await delay(Math.min(expDelay + jitter, MAX_DELAY));
}

function statusLabel(err: ExternalFetchError): string {
  if (err.kind === 'timeout') return 'timeout';
  if (err.kind === 'http') return err.status && err.status >= 500 ? '5xx' : '4xx';
  return 'network';
}

function defaultHeaders(): Record<string, string> {
  return {
    accept: 'application/json',
    'user-agent': process.env.HTTP_USER_AGENT || 'wiki-chat-agent/1.0',
  };
}

/**
 * Fetches JSON with timeout, per-host rate limiting, a per-host circuit
 * breaker and exponential backoff with jitter. 4xx responses other than 429
 * are not retried. Only Wikipedia hosts and FETCH_ALLOWED_HOSTS are reachable.
 */
export async function fetchJSON(
  url: string,
  opts: { timeoutMs?: number; retries?: number; target?: string; headers?: Record<string, string> } = {},
): Promise<unknown> {
  const timeoutMs = opts.timeoutMs ?? 4000;
  const retries = opts.retries ?? 1;
  const target = opts.target ?? 'unknown';

  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    throw new ExternalFetchError('network', 'invalid_url');
  }
  if (!isAllowedHost(host)) {
    throw new ExternalFetchError('network', 'host_not_allowed');
  }

  let lastErr = new ExternalFetchError('network', 'network_error');
  let retryAfterSec: number | undefined;

  for (let i = 0; i <= retries; i++) {
    const start = Date.now();
    const exec = async (): Promise<unknown> => {
      const ac = new AbortController();
      const t = setTimeout(() => ac.abort(), timeoutMs);
      try {
        log.debug({ target, attempt: i + 1, maxAttempts: retries + 1 }, '🌐 API request attempt');
        const res = await getFetch()(url, { signal: ac.signal, headers: { ...defaultHeaders(), ...opts.headers } });
        if (!res.ok) {
          const retryAfter = res.headers.get('retry-after');
          retryAfterSec = retryAfter ? Number.parseInt(retryAfter, 10) || undefined : undefined;
          log.debug({ target, status: res.status, statusText: res.statusText }, '❌ HTTP error response');
          throw new ExternalFetchError('http', `HTTP_${res.status}`, res.status);
        }
        const text = await res.text();
        try {
          return JSON.parse(text);
        } catch {
          log.debug({ target, body: text.slice(0, 200) }, '❌ JSON parse error');
          throw new ExternalFetchError('network', 'json_parse_error');
        }
      } catch (err: unknown) {
        if (err instanceof ExternalFetchError) throw err;
        if (err instanceof Error && err.name === 'AbortError') {
          throw new ExternalFetchError('timeout', 'timeout');
        }
        log.debug({ target, err }, '🌐 Network error');
        throw new ExternalFetchError('network', 'network_error');
      } finally {
        clearTimeout(t);
      }
    };

    try {
      const result = await scheduleWithLimit(host, () => withBreaker(host, exec));
      observeExternal({ target, status: 'ok' }, Date.now() - start);
      return result;
    } catch (err: unknown) {
      const duration = Date.now() - start;
      if (err instanceof CircuitOpenError) {
        observeExternal({ target, status: 'breaker_open' }, duration);
        throw new ExternalFetchError('network', 'circuit_open');
      }
      if (!(err instanceof ExternalFetchError)) {
        observeExternal({ target, status: 'network' }, duration);
        lastErr = new ExternalFetchError('network', 'network_error');
      } else {
        observeExternal({ target, status: statusLabel(err) }, duration);
        lastErr = err;
        if (err.kind === 'http' && err.status !== undefined && err.status < 500 && err.status !== 429) {
          throw err;
        }
      }
      if (i < retries) {
        log.debug({ target, attempt: i + 1 }, '🔄 Retrying after error');
        await backoff(i, retryAfterSec);
      }
    }
  }

  log.warn({ target, totalAttempts: retries + 1, reason: lastErr.message }, '💥 All attempts failed');
  throw lastErr;
}
