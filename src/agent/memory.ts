export type Turn = { role: 'user'; content: string } | { role: 'assistant'; content: string };

interface Entry {
  turns: Turn[];
  expiresAt: number;
}

/** Short-term per-thread context for the model; durable history lives in the conversation store. */
export interface ThreadMemory {
  get(threadId: string): Turn[];
  append(threadId: string, ...turns: Turn[]): void;
  clear(threadId: string): void;
  close(): void;
}

export function createThreadMemory(opts: { ttlSec: number; maxMessages: number; now?: () => number }): ThreadMemory {
  const now = opts.now ?? Date.now;
  const ttlMs = opts.ttlSec * 1000;
  const threads = new Map<string, Entry>();

  const sweepInterval = setInterval(() => {
    const at = now();
    for (const [id, entry] of threads.entries()) {
      if (entry.expiresAt <= at) threads.delete(id);
    }
  }, 60_000);
  sweepInterval.unref();

  return {
    get(threadId) {
      const entry = threads.get(threadId);
      if (!entry || entry.expiresAt <= now()) return [];
      entry.expiresAt = now() + ttlMs;
      return [...entry.turns];
    },

    append(threadId, ...turns) {
      if (opts.maxMessages === 0) return;
      const current = threads.get(threadId);
      const entry: Entry = current && current.expiresAt > now() ? current : { turns: [], expiresAt: 0 };
      entry.turns.push(...turns);
      if (entry.turns.length > opts.maxMessages) entry.turns.splice(0, entry.turns.length - opts.maxMessages);
      entry.expiresAt = now() + ttlMs;
      threads.set(threadId, entry);
    },

    clear(threadId) {
      threads.delete(threadId);
    },

    close() {
      clearInterval(sweepInterval);
      threads.clear();
    },
  };
}
