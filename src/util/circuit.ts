import CircuitBreaker from 'opossum';

type Task = () => Promise<unknown>;

type BreakerStats = {
  state: 'closed' | 'open' | 'halfOpen';
  opens: number;
  timeouts: number;
  failures: number;
  rejects: number;
  successes: number;
};

const breakers = new Map<string, CircuitBreaker<[Task], unknown>>();
const stats = new Map<string, BreakerStats>();

function getConfig(host: string): CircuitBreaker.Options {
  const defaultTimeout = Number(process.env.EXT_BREAKER_TIMEOUT_MS || 35000);
  const defaultReset = Number(process.env.EXT_BREAKER_RESET_MS || 15000);
  const defaultErrorPct = Number(process.env.EXT_BREAKER_ERROR_PCT || 50);
  const defaultVolume = Number(process.env.EXT_BREAKER_VOLUME || 10);

  // Per-host overrides
  const hostKey = host.replace(/[.-]/g, '_').toUpperCase();
  return {
    timeout: Number(process.env[`BREAK_TIMEOUT_MS_${hostKey}`] || defaultTimeout),
    resetTimeout: Number(process.env[`BREAK_RESET_MS_${hostKey}`] || defaultReset),
    errorThresholdPercentage: Number(process.env[`BREAK_ERROR_PCT_${hostKey}`] || defaultErrorPct),
    volumeThreshold: Number(process.env[`BREAK_VOLUME_${hostKey}`] || defaultVolume),
    rollingCountTimeout: 10000,
  };
}

export class CircuitOpenError extends Error {
  constructor(readonly host: string) {
    super('Circuit breaker is open');
    this.name = 'CircuitBreakerOpenError';
  }
}

function createBreaker(host: string): CircuitBreaker<[Task], unknown> {
  const breaker = new CircuitBreaker<[Task], unknown>(async (task: Task) => task(), getConfig(host));
  const hostStats: BreakerStats = { state: 'closed', opens: 0, timeouts: 0, failures: 0, rejects: 0, successes: 0 };
  stats.set(host, hostStats);

  breaker.on('open', () => {
    hostStats.state = 'open';
    hostStats.opens++;
  });
  breaker.on('halfOpen', () => {
    hostStats.state = 'halfOpen';
  });
  breaker.on('close', () => {
    hostStats.state = 'closed';
  });
  breaker.on('reject', () => {
    hostStats.rejects++;
  });
  breaker.on('timeout', () => {
    hostStats.timeouts++;
  });
  breaker.on('failure', () => {
    hostStats.failures++;
  });
  breaker.on('success', () => {
    hostStats.successes++;
  });
  return breaker;
}

export function getBreaker(host: string): CircuitBreaker<[Task], unknown> {
  const existing = breakers.get(host);
  if (existing) return existing;
  const breaker = createBreaker(host);
  breakers.set(host, breaker);
  return breaker;
}

// opossum rejects short-circuited calls with code EOPENBREAKER
function isOpenCircuit(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EOPENBREAKER';
}

export async function withBreaker<T>(host: string, fn: () => Promise<T>): Promise<T> {
  const holder: { settled?: { value: T } } = {};
  try {
    await getBreaker(host).fire(async () => {
      holder.settled = { value: await fn() };
    });
  } catch (err) {
    if (isOpenCircuit(err)) throw new CircuitOpenError(host);
    throw err;
  }
  if (!holder.settled) throw new CircuitOpenError(host);
  return holder.settled.value;
}

export function getAllBreakerStats(): Record<string, BreakerStats> {
  const result: Record<string, BreakerStats> = {};
  for (const [host, hostStats] of stats.entries()) {
    result[host] = { ...hostStats };
  }
  return result;
}
