/**
 * backend/src/shared/http/https-redirection.ts
 *
 * WHY:
 * - Plain-HTTP requests are sent to the HTTPS endpoint when one is known.
 *
 * RULES:
 * - 307 keeps the method and body (a redirected POST stays a POST).
 * - Without an HTTPS port there is nowhere to redirect: log one warning, pass through.
 *   Behind a TLS-terminating proxy, set TRUST_PROXY so req.protocol reflects X-Forwarded-Proto.
 */

import type { FastifyInstance } from 'fastify';

import type { Logger } from '../logger/logger';

export function registerHttpsRedirection(
  app: FastifyInstance,
  opts: { httpsPort: number | undefined; logger: Logger },
): void {
  const { httpsPort, logger } = opts;
  let warned = false;

  app.addHook('onRequest', async (req, reply) => {
    if (req.protocol === 'https') return;

    if (httpsPort === undefined) {
      if (!warned) {
        warned = true;
        logger.warn('https_redirection.no_port', {
          flow: 'http.https_redirection',
          message: 'Failed to determine the https port for redirect.',
        });
      }
      return;
    }

    const host = req.requestContext.host;
    if (!host) return;

    const port = httpsPort === 443 ? '' : `:${httpsPort}`;
    return reply.redirect(307, `https://${host}${port}${req.url}`);
  });
}
