/**
 * backend/src/shared/http/form-body.ts
 *
 * WHY:
 * - Pages post classic HTML forms (application/x-www-form-urlencoded).
 *   Fastify only parses JSON out of the box.
 *
 * RULES:
 * - Repeated keys keep the last value (forms here never repeat fields).
 * - Checkbox "on"/"true" handling is the schema's job, not the parser's.
 */

import type { FastifyInstance } from 'fastify';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded';

export function registerFormBodyParser(app: FastifyInstance): void {
  app.addContentTypeParser(FORM_CONTENT_TYPE, { parseAs: 'string' }, (_req, body, done) => {
    const text = typeof body === 'string' ? body : body.toString('utf8');
    done(null, Object.fromEntries(new URLSearchParams(text)));
  });
}

export function isFormPost(contentType: string | undefined): boolean {
  return (contentType ?? '').toLowerCase().startsWith(FORM_CONTENT_TYPE);
}
