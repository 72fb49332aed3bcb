/**
 * src/modules/identity/account/account-http.ts
 *
 * WHY:
 * - Every /Account endpoint answers two kinds of clients: browsers posting
 *   forms (redirect + status message) and scripts sending JSON (JSON body).
 * - Links sent by email are built from the request's own origin.
 */

import type { FastifyRequest } from 'fastify';
import type { z } from 'zod';

import { NoOpEmailSender } from '../../../shared/email/noop-email-sender';
import type { EmailSender } from '../../../shared/email/email-sender';
import { AppError } from '../../../shared/http/errors';
import { isFormPost } from '../../../shared/http/form-body';
import { wantsHtml } from '../auth/require-user';

export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  what: 'body' | 'query' = 'body',
): z.output<T> {
  const parsed = schema.safeParse(input ?? {});
  if (!parsed.success) {
    throw AppError.validationError(what === 'body' ? 'Invalid request body' : 'Invalid query string', {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

/** Form post or browser navigation: answer with a redirect. */
export function isBrowserRequest(req: FastifyRequest): boolean {
  return isFormPost(req.headers['content-type']) || wantsHtml(req);
}

/**
 * There is no other way to receive the link while the no-op sender is
 * registered, so responses carry it.
 */
export function exposesLinks(sender: EmailSender): boolean {
  return sender instanceof NoOpEmailSender;
}

function link(req: FastifyRequest, path: string, query: Record<string, string | undefined>): string {
  const url = new URL(path, `${req.protocol}://${req.headers.host ?? 'localhost'}`);
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined) url.searchParams.set(k, v);
  }
  return url.toString();
}

export function confirmEmailLink(req: FastifyRequest, userId: string, code: string, returnUrl?: string): string {
  return link(req, '/Account/ConfirmEmail', { userId, code, returnUrl });
}

export function confirmEmailChangeLink(req: FastifyRequest, userId: string, email: string, code: string): string {
  return link(req, '/Account/ConfirmEmailChange', { userId, email, code });
}

export function resetPasswordLink(req: FastifyRequest, code: string): string {
  return link(req, '/Account/ResetPassword', { code });
}
