import pino from 'pino';
import { scrubMessage, scrubSecrets } from './redact.js';

export type Logger = pino.Logger;

/**
 * Creates a pino logger with credential redaction unless LOG_LEVEL=debug.
 */
export function createLogger(
  opts: { name?: string; level?: string; destination?: pino.DestinationStream } = {},
): Logger {
  const level = opts.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug';
  const options: pino.LoggerOptions = {
    level,
    name: opts.name,
    hooks: {
      logMethod(args, method) {
        const scrubbed = args.map((a: unknown) =>
          typeof a === 'string' ? scrubMessage(a, redactEnabled) : scrubSecrets(a, redactEnabled),
        );
        method.apply(this, scrubbed as typeof args);
      },
    },
  };
  return opts.destination ? pino(options, opts.destination) : pino(options);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
