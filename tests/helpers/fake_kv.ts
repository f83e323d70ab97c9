import type { KeyValueClient } from '../../src/core/stores/redis.js';

type Op = 'get' | 'set' | 'scan' | 'del' | 'ping' | 'memoryUsed';

function globToRegExp(pattern: string): RegExp {
  const escaped = pattern.replace(/[.+^${}()|[\]\\?]/g, '\\$&').replace(/\*/g, '.*');
  return new RegExp(`^${escaped}$`);
}

/**
 * In-process stand-in for Redis with a manual clock, switchable readiness
 * and per-operation failure injection.
 */
export class FakeKeyValueStore implements KeyValueClient {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();
  private nowMs = 0;
  ready = true;
  readonly failures: Partial<Record<Op, Error>> = {};
  readonly calls: Record<Op, number> = { get: 0, set: 0, scan: 0, del: 0, ping: 0, memoryUsed: 0 };
  quitCalls = 0;

  advance(seconds: number): void {
    this.nowMs += seconds * 1000;
  }

  /** Raw access for assertions and for planting corrupt values. */
  peek(key: string): string | undefined {
    const entry = this.entries.get(key);
    return entry && entry.expiresAt > this.nowMs ? entry.value : undefined;
  }

  plant(key: string, value: string, ttlSec = 60): void {
    this.entries.set(key, { value, expiresAt: this.nowMs + ttlSec * 1000 });
  }

  liveKeys(): string[] {
    return [...this.entries.keys()].filter((k) => this.peek(k) !== undefined);
  }

  private track(op: Op): void {
    this.calls[op]++;
    const failure = this.failures[op];
    if (failure) throw failure;
  }

  async get(key: string): Promise<string | null> {
    this.track('get');
    return this.peek(key) ?? null;
  }

  async set(key: string, value: string, ttlSec: number): Promise<void> {
    this.track('set');
    this.plant(key, value, ttlSec);
  }

  async scan(pattern: string): Promise<string[]> {
    this.track('scan');
    const re = globToRegExp(pattern);
    return this.liveKeys().filter((k) => re.test(k));
  }

  async del(keys: string[]): Promise<number> {
    this.track('del');
    let removed = 0;
    for (const key of keys) if (this.entries.delete(key)) removed++;
    return removed;
  }

  async ping(): Promise<boolean> {
    this.track('ping');
    return true;
  }

  async memoryUsed(): Promise<string> {
    this.track('memoryUsed');
    return '1.00M';
  }

  isReady(): boolean {
    return this.ready;
  }

  async quit(): Promise<void> {
    this.quitCalls++;
  }
}
