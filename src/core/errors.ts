import { ExternalFetchError } from '../util/fetch.js';
import { LlmError } from './llm.js';

export class ValidationError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** A conversation store operation failed at the database level. */
export class PersistenceError extends Error {
  constructor(
    readonly operation: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

/** A cache value could not be encoded for storage or decoded on read. */
export class CacheSerializationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CacheSerializationError';
  }
}

export class AgentUnavailableError extends Error {
  constructor(message = 'Chat agent is not configured') {
    super(message);
    this.name = 'AgentUnavailableError';
  }
}

export type StandardError = { code: string; message: string; details?: string[] };

/**
 * Maps an error to an HTTP status and a body that is safe to return to
 * clients. Unknown errors never expose their message.
 */
export function toStdError(err: unknown): { status: number; body: StandardError } {
  if (err instanceof ValidationError) {
    return { status: 400, body: { code: 'invalid_request', message: err.message, details: err.issues } };
  }
  if (err instanceof AgentUnavailableError) {
    return { status: 503, body: { code: 'agent_unavailable', message: err.message } };
  }
  if (err instanceof PersistenceError) {
    return { status: 503, body: { code: 'persistence_unavailable', message: 'Conversation storage is unavailable' } };
  }
  if (err instanceof ExternalFetchError || err instanceof LlmError) {
    return err.kind === 'timeout'
      ? { status: 504, body: { code: 'upstream_timeout', message: 'Upstream service timed out' } }
      : { status: 502, body: { code: 'upstream_error', message: 'Upstream service failed' } };
  }
  return { status: 500, body: { code: 'internal_error', message: 'Internal server error' } };
}
