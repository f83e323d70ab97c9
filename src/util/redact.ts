/**
 * Redaction utilities for logs. Masks credentials embedded in connection
 * strings, key/value pairs, bearer tokens and provider API keys.
 * Redaction is disabled when LOG_LEVEL=debug to aid local debugging.
 */

const SECRET_KEYS = /^(password|passwd|apikey|api_key|secret|authorization|accesstoken|access_token|token)$/i;

function scrubString(input: string): string {
  let out = input;
  // user:password@ inside connection URLs (redis://, postgres://)
  out = out.replace(/\b([a-z][a-z0-9+.-]*:\/\/)([^:@/\s]*):([^@/\s]+)@/gi, '$1$2:[REDACTED]@');
  out = out.replace(
    /\b(password|passwd|pwd|api[_-]?key|secret|token)(["']?\s*[=:]\s*["']?)([^\s"'&,;]+)/gi,
    '$1$2[REDACTED]',
  );
  out = out.replace(/\bBearer\s+[A-Za-z0-9._~+/-]+=*/g, 'Bearer [REDACTED]');
  out = out.replace(/\b(sk|gsk)-[A-Za-z0-9_-]{8,}/g, '[REDACTED_KEY]');
  return out;
}

function scrubDeep(value: unknown, seen = new WeakSet<object>()): unknown {
  if (typeof value === 'string') return scrubString(value);
  if (typeof value !== 'object' || value === null) return value;
  if (value instanceof Error) return value;
  if (seen.has(value)) return value;
  seen.add(value);
  if (Array.isArray(value)) {
    return value.map((v) => scrubDeep(v, seen));
  }
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value)) {
    out[k] = SECRET_KEYS.test(k) && v !== undefined && v !== null ? '[REDACTED]' : scrubDeep(v, seen);
  }
  return out;
}

/**
 * Scrub credential-like values from a log argument.
 */
export function scrubSecrets(arg: unknown, enabled: boolean): unknown {
  if (!enabled) return arg;
  return scrubDeep(arg);
}

/**
 * Convenience for messages.
 */
export function scrubMessage(msg: string, enabled: boolean): string {
  return enabled ? scrubString(msg) : msg;
}
