/**
 * Outcome of a cacheable lookup. Failures carry a human-readable reason and
 * are never cached; successes served from the cache carry `cached: true`.
 */
export type ToolSuccess<T> = { ok: true; data: T; cached?: true };
export type ToolFailure = { ok: false; reason: string };
export type ToolResult<T> = ToolSuccess<T> | ToolFailure;

export const success = <T>(data: T): ToolSuccess<T> => ({ ok: true, data });
export const failure = (reason: string): ToolFailure => ({ ok: false, reason });
