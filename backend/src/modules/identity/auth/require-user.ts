/**
 * src/modules/identity/auth/require-user.ts
 *
 * WHY:
 * - Route guard for pages and endpoints that need a signed-in user.
 *
 * HOW TO USE:
 * - app.get('/auth', { preHandler: requireUser }, handler)
 *
 * RULES:
 * - Browser navigations (GET accepting HTML) are redirected to the login page
 *   with ReturnUrl; everything else gets 401 JSON.
 * - Runs after the authentication hook (needs req.authState).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../../shared/http/errors';
import { LOGIN_PATH } from './identity-constants';

export function wantsHtml(req: FastifyRequest): boolean {
  return req.method === 'GET' && (req.headers.accept ?? '').includes('text/html');
}

export async function requireUser(req: FastifyRequest, reply: FastifyReply) {
  if (req.authState.isAuthenticated) return;

  if (wantsHtml(req)) {
    const returnUrl = new URLSearchParams({ ReturnUrl: req.url }).toString();
    return reply.redirect(`${LOGIN_PATH}?${returnUrl}`);
  }

  throw AppError.unauthorized();
}
