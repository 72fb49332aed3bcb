/**
 * backend/src/shared/http/hsts.ts
 *
 * WHY:
 * - Browsers that reached us over HTTPS once should never downgrade again.
 *
 * RULES:
 * - Header only on HTTPS responses (sending it over plain HTTP is ignored by browsers).
 * - Loopback hosts are excluded so local development over HTTPS does not pin localhost.
 * - max-age = 30 days, no includeSubDomains, no preload.
 */

import type { FastifyInstance } from 'fastify';

import { isLoopbackHost } from './request-context';

export const HSTS_HEADER_VALUE = 'max-age=2592000';

export function registerHsts(app: FastifyInstance): void {
  app.addHook('onSend', (req, reply, payload, done) => {
    if (req.protocol === 'https' && !isLoopbackHost(req.requestContext.host)) {
      reply.header('Strict-Transport-Security', HSTS_HEADER_VALUE);
    }
    done(null, payload);
  });
}
