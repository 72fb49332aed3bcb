import { Writable } from 'node:stream';

import winston from 'winston';
import { describe, it, expect } from 'vitest';

import { logger } from '../../../../src/shared/logger/logger';

async function capture(write: () => void): Promise<Record<string, unknown>> {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _enc, cb) {
      lines.push(chunk.toString());
      cb();
    },
  });
  const transport = new winston.transports.Stream({ stream });
  const logged = new Promise((resolve) => transport.once('logged', resolve));

  logger.add(transport);
  try {
    write();
    await logged;
  } finally {
    logger.remove(transport);
  }

  const parsed: unknown = JSON.parse(lines[0] ?? '{}');
  if (typeof parsed !== 'object' || parsed === null) throw new Error('log line is not an object');
  return Object.fromEntries(Object.entries(parsed));
}

describe('logger', () => {
  it('redacts secrets at the top level and inside nested meta', async () => {
    const entry = await capture(() =>
      logger.error('identity.test', {
        flow: 'account.login',
        password: 'test-secret',
        meta: { code: '123456', userId: 'u-1' },
      }),
    );

    expect(entry.message).toBe('identity.test');
    expect(entry.flow).toBe('account.login');
    expect(entry.password).toBe('[REDACTED]');
    expect(entry.meta).toEqual({ code: '[REDACTED]', userId: 'u-1' });
    expect(entry.service).toBe('identity-starter');
  });

  it('writes errors passed as { err } with their message, code and cause', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 10.0.0.5:5432'), { code: 'ECONNREFUSED' });
    const err = new Error('Database migration failed: connect ECONNREFUSED 10.0.0.5:5432', { cause });

    const entry = await capture(() => logger.error('startup.failed', { phase: 'Migrating', err }));

    expect(entry.phase).toBe('Migrating');
    expect(entry.err).toMatchObject({
      name: 'Error',
      message: 'Database migration failed: connect ECONNREFUSED 10.0.0.5:5432',
      cause: { name: 'Error', message: 'connect ECONNREFUSED 10.0.0.5:5432', code: 'ECONNREFUSED' },
    });
    expect(entry.err).toHaveProperty('stack', expect.stringContaining('Database migration failed'));
  });

  it('keeps child logger context', async () => {
    const entry = await capture(() => logger.child({ requestId: 'req-1' }).error('identity.test', { sessionId: 's-1' }));

    expect(entry.requestId).toBe('req-1');
    expect(entry.sessionId).toBe('[REDACTED]');
  });
});
