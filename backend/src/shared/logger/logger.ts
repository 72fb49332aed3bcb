/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - One structured JSON logger for startup, the pipeline and the identity flows.
 * - Every entry carries `service` and `env` for log search.
 *
 * RULES:
 * - Pass errors as `{ err }`; Error values (top level or one object deep) are
 *   written as `{ name, message, stack, code?, cause? }`.
 * - Secrets are redacted by key at the format level, top level and one nested
 *   object deep (error `meta` lands there).
 */

import winston from 'winston';

export const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = new Set([
  'token',
  'code',
  'sessionId',
  'password',
  'passwordHash',
  'securityStamp',
  'secret',
  'authenticatorKey',
  'recoveryCode',
  'recoveryCodes',
  'connectionString',
]);

const isPlainObject = (v: unknown): v is Record<string, unknown> =>
  typeof v === 'object' && v !== null && !Array.isArray(v) && !(v instanceof Error);

type SerializedError = { name: string; message: string; stack?: string; code?: string; cause?: unknown };

// Error fields are not enumerable, so json() would write `{}`.
function serializeError(err: Error): SerializedError {
  const out: SerializedError = { name: err.name, message: err.message, stack: err.stack };
  if ('code' in err && typeof err.code === 'string') out.code = err.code;
  if (err.cause !== undefined) out.cause = err.cause instanceof Error ? serializeError(err.cause) : err.cause;
  return out;
}

function redactMeta(meta: unknown, depth: number): unknown {
  if (meta instanceof Error) return serializeError(meta);
  if (!isPlainObject(meta) || depth < 0) return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_KEYS.has(k) ? REDACTED : redactMeta(v, depth - 1);
  }
  return out;
}

const redact = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (SENSITIVE_KEYS.has(key)) info[key] = REDACTED;
    else info[key] = redactMeta(info[key], 0);
  }
  return info;
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(
    redact(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service: process.env.SERVICE_NAME ?? 'identity-starter',
    env: process.env.NODE_ENV ?? 'production',
  },
  transports: [new winston.transports.Console()],
});

export type Logger = winston.Logger;
