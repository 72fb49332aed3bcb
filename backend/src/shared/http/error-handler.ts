/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints.
 * - Development shows the failure in the browser; everywhere else internals
 *   (meta, stack traces) never reach the client.
 *
 * RESPONSIBILITIES:
 * - AppError -> map .status and .code to structured JSON (every environment).
 * - Fastify client errors (bad JSON, unsupported content type) -> 4xx JSON.
 * - Unexpected errors:
 *   - mode 'redirect'  -> 302 to /Error (the Error page shows the request id).
 *   - mode 'developer' -> 500 HTML from renderDeveloperPage (exception or database page).
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta in responses.
 * - Log full error details; the logger redacts secrets inside meta.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from './errors';
import { withRequestContext } from '../logger/with-context';

export const ERROR_PATH = '/Error';

type ErrorResponseBody = {
  error: {
    code: string;
    message: string;
  };
};

export type ErrorHandlerOptions =
  | { mode: 'redirect' }
  | {
      mode: 'developer';
      renderDeveloperPage: (err: Error, req: FastifyRequest) => Promise<string>;
    };

function buildResponse(code: string, message: string): ErrorResponseBody {
  return { error: { code, message } };
}

function clientErrorStatus(err: FastifyError): number | null {
  const status = err.statusCode;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function registerErrorHandler(app: FastifyInstance, opts: ErrorHandlerOptions): void {
  app.setErrorHandler(async (err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: err.meta,
      });

      return reply.status(err.status).send(buildResponse(err.code, err.message));
    }

    // 2) Framework-level client errors (malformed body, unsupported media type, ...)
    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      log.warn('client_error', { flow: 'http.error', status: clientStatus, code: err.code });
      return reply.status(clientStatus).send(buildResponse('BAD_REQUEST', err.message));
    }

    // 3) Unexpected errors
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    if (opts.mode === 'developer') {
      const html = await opts.renderDeveloperPage(err, req);
      return reply.status(500).type('text/html; charset=utf-8').send(html);
    }

    // The error page itself failed: do not redirect in a loop.
    if (req.url.split('?')[0] === ERROR_PATH) {
      return reply.status(500).send(buildResponse('INTERNAL', 'Internal server error'));
    }

    return reply.redirect(ERROR_PATH);
  });
}
