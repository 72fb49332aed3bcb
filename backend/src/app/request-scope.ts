/**
 * src/app/request-scope.ts
 *
 * WHY:
 * - Scoped services (authentication state, user accessor, redirect manager)
 *   belong to one request. Each request gets its own scope on `req.services`.
 *
 * RULES:
 * - The scope is created in onRequest (before any other app hook needs it)
 *   and disposed in onResponse.
 * - Singletons resolved through the scope still live on the root provider.
 */

import type { FastifyInstance } from 'fastify';

import type { AppServiceProvider } from './services';
import { withRequestContext } from '../shared/logger/with-context';

declare module 'fastify' {
  interface FastifyRequest {
    services: AppServiceProvider;
  }
}

export function registerRequestScope(app: FastifyInstance, provider: AppServiceProvider): void {
  app.decorateRequest('services', null);

  app.addHook('onRequest', async (req, reply) => {
    req.services = provider.createScope({ request: req, reply });
  });

  app.addHook('onResponse', async (req) => {
    try {
      await req.services.dispose();
    } catch (err) {
      // The response is already sent; nothing left to fail.
      withRequestContext(req).error('request_scope.dispose_failed', { flow: 'http.scope', err });
    }
  });
}
