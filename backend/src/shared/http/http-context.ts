/**
 * backend/src/shared/http/http-context.ts
 *
 * WHY:
 * - Cookie sign-in/out needs both sides of the exchange (read request cookies,
 *   write Set-Cookie on the reply). One type carries the pair; it is also the
 *   context every request-scoped service is created with.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

export type HttpContext = {
  request: FastifyRequest;
  reply: FastifyReply;
};
