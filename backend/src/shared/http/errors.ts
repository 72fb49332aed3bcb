/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - One error type for everything the client is allowed to see: the error
 *   handler turns it into `{ error: { code, message } }` with the code's status.
 *
 * RULES:
 * - A code always maps to the same status (APP_ERROR_STATUS).
 * - `meta` is logged (redacted), never sent.
 * - Identity-specific messages live in modules/identity/identity.errors.ts.
 */

export const APP_ERROR_STATUS = {
  BAD_REQUEST: 400,
  VALIDATION_ERROR: 400,
  IDENTITY_ERROR: 400,
  ANTIFORGERY_INVALID: 400,
  UNAUTHORIZED: 401,
  LOCKED_OUT: 403,
  NOT_FOUND: 404,
  INTERNAL: 500,
} as const satisfies Record<string, number>;

export type AppErrorCode = keyof typeof APP_ERROR_STATUS;
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = APP_ERROR_STATUS[opts.code];
    this.meta = opts.meta;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', message, meta });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta) {
    return new AppError({ code: 'NOT_FOUND', message, meta });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta) {
    return new AppError({ code: 'INTERNAL', message, meta });
  }
}
