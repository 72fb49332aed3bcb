/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/startup.ts during the AssemblingPipeline phase.
 * - Request context (requestId + host) and the form body parser are global;
 *   everything else is a pipeline stage (app/pipeline.ts).
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import { logger } from '../shared/logger/logger';
import { registerFormBodyParser } from '../shared/http/form-body';
import { registerRequestContext } from '../shared/http/request-context';

export async function buildServer(opts: { config: AppConfig }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    // Behind the platform's TLS-terminating proxy, X-Forwarded-Proto decides req.protocol.
    trustProxy: opts.config.trustProxy,
  });

  registerRequestContext(app);
  registerFormBodyParser(app);

  // Basic request logging (includes requestId + host)
  app.addHook('onRequest', (req, _reply, done) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      host: req.requestContext.host,
    });
    done();
  });

  return app;
}
