/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, error pages and tracing.
 * - HSTS and HTTPS redirection need the request host without its port.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 *
 * RULES:
 * - host can be null (missing/invalid Host header).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export type RequestContext = {
  requestId: string;
  /** Host header without port, lower-cased. IPv6 literals keep their brackets. */
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

export function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim().toLowerCase();
  if (!trimmed) return null;

  // "[::1]:8080" -> "[::1]"
  if (trimmed.startsWith('[')) {
    const end = trimmed.indexOf(']');
    return end === -1 ? null : trimmed.slice(0, end + 1);
  }

  // strip port if present (e.g., "localhost:8080")
  return trimmed.split(':')[0] ?? null;
}

export function isLoopbackHost(host: string | null): boolean {
  return host === 'localhost' || host === '127.0.0.1' || host === '[::1]';
}

export function registerRequestContext(app: FastifyInstance) {
  // We decorate the request so TypeScript + Fastify know the property exists.
  // The real value is assigned on each request in the onRequest hook.
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.requestContext = {
      requestId: randomUUID(),
      host: parseHost(req.headers.host),
    };

    done();
  });
}
