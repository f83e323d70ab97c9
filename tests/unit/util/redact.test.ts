import { Writable } from 'node:stream';
import { scrubMessage, scrubSecrets } from '../../../src/util/redact.js';
import { createLogger } from '../../../src/util/logging.js';

describe('redaction', () => {
  it('masks passwords inside connection URLs', () => {
    expect(scrubMessage('connecting to redis://:test-secret@cache:6379/0', true)).toBe(
      'connecting to redis://:[REDACTED]@cache:6379/0',
    );
    expect(scrubMessage('postgres://app:test-secret@db:5432/wiki', true)).toBe('postgres://app:[REDACTED]@db:5432/wiki');
  });

  it('masks key=value secrets and bearer tokens', () => {
    expect(scrubMessage('password=test-secret host=db', true)).toBe('password=[REDACTED] host=db');
    expect(scrubMessage('Authorization: Bearer abc.def', true)).toBe('Authorization: Bearer [REDACTED]');
    expect(scrubMessage('key gsk-placeholder123 used', true)).toBe('key [REDACTED_KEY] used');
  });

  it('leaves messages alone when disabled', () => {
    expect(scrubMessage('password=test-secret', false)).toBe('password=test-secret');
  });

  it('masks secret-named fields in nested objects', () => {
    const input = { cfg: { host: 'db', password: 'test-secret', apiKey: undefined }, items: ['token=abc'] };
    expect(scrubSecrets(input, true)).toEqual({
      cfg: { host: 'db', password: '[REDACTED]', apiKey: undefined },
      items: ['token=[REDACTED]'],
    });
    expect(input.cfg.password).toBe('test-secret');
  });

  it('passes errors through untouched', () => {
    const err = new Error('boom');
    expect(scrubSecrets({ err }, true)).toEqual({ err });
  });
});

describe('createLogger', () => {
  function capture(level: string): { lines: Array<Record<string, unknown>>; sink: Writable } {
    const lines: Array<Record<string, unknown>> = [];
    const sink = new Writable({
      write(chunk: Buffer, _enc, done) {
        lines.push(JSON.parse(chunk.toString()));
        done();
      },
    });
    return { lines, sink };
  }

  it('scrubs messages and fields before they are written', () => {
    const { lines, sink } = capture('info');
    const log = createLogger({ name: 'test', level: 'info', destination: sink });
    log.info({ url: 'redis://:test-secret@cache:6379', password: 'test-secret' }, 'token=abc connected');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      name: 'test',
      msg: 'token=[REDACTED] connected',
      url: 'redis://:[REDACTED]@cache:6379',
      password: '[REDACTED]',
    });
  });

  it('keeps values readable at debug level', () => {
    const { lines, sink } = capture('debug');
    const log = createLogger({ level: 'debug', destination: sink });
    log.debug('password=test-secret');
    expect(lines[0]?.msg).toBe('password=test-secret');
  });
});
