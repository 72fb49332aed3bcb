/**
 * backend/src/shared/logger/with-context.ts
 *
 * WHY:
 * - Request logs carry requestId, host and the signed-in user id so one
 *   request can be followed across the pipeline and the identity flows.
 *
 * HOW TO USE:
 * - `withRequestContext(req).info('identity.login.succeeded', { flow: 'account.login' })`
 * - userId is read when this is called: call it after authentication state
 *   is resolved to get the user.
 */

import type { FastifyRequest } from 'fastify';

import { type Logger, logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  const auth = req.authState;

  return logger.child({
    requestId: req.requestContext?.requestId,
    host: req.requestContext?.host,
    userId: auth?.isAuthenticated ? auth.user.id : null,
  });
}
