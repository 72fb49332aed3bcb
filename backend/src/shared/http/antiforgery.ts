/**
 * backend/src/shared/http/antiforgery.ts
 *
 * WHY:
 * - Cookie authentication means the browser attaches credentials to any
 *   cross-site POST. Unsafe requests must prove they came from our own pages.
 *
 * HOW IT WORKS (double submit, signed):
 * - Cookie token: random, HttpOnly cookie `antiforgery`.
 * - Request token: HMAC(cookie token), embedded in forms as __RequestVerificationToken
 *   or sent by scripts in the RequestVerificationToken header.
 * - A request is valid when the request token verifies against the cookie token.
 *
 * HOW TO USE:
 * - registerAntiforgery(app, antiforgery) adds the validating preHandler and
 *   GET /antiforgery/token.
 * - Pages call antiforgery.getAndStoreTokens(ctx) to render the hidden field.
 * - A route opts out with `config: { antiforgery: false }`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import { AppError } from './errors';
import { parseCookies, serializeCookie } from './cookies';
import type { HttpContext } from './http-context';
import type { KeyedHasher } from '../security/keyed-hasher';
import { generateSecureToken } from '../security/token';
import { withRequestContext } from '../logger/with-context';

declare module 'fastify' {
  interface FastifyContextConfig {
    /** false disables antiforgery validation for the route. */
    antiforgery?: boolean;
  }
}

export const ANTIFORGERY_COOKIE = 'antiforgery';
export const ANTIFORGERY_FORM_FIELD = '__RequestVerificationToken';
export const ANTIFORGERY_HEADER = 'requestverificationtoken';

const UNSAFE_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export type AntiforgeryTokenSet = {
  cookieToken: string;
  requestToken: string;
  formFieldName: string;
  headerName: string;
};

export class Antiforgery {
  constructor(
    private readonly hasher: KeyedHasher,
    private readonly secureCookie: boolean,
  ) {}

  private requestTokenFor(cookieToken: string): string {
    return this.hasher.hash(`antiforgery:${cookieToken}`);
  }

  /** Reuses the request's cookie token when present; otherwise issues one. */
  getAndStoreTokens(ctx: HttpContext): AntiforgeryTokenSet {
    let cookieToken = parseCookies(ctx.request.headers.cookie)[ANTIFORGERY_COOKIE];

    if (!cookieToken) {
      cookieToken = generateSecureToken();
      ctx.reply.header(
        'Set-Cookie',
        serializeCookie(ANTIFORGERY_COOKIE, cookieToken, {
          httpOnly: true,
          sameSite: 'Strict',
          secure: this.secureCookie,
        }),
      );
    }

    return {
      cookieToken,
      requestToken: this.requestTokenFor(cookieToken),
      formFieldName: ANTIFORGERY_FORM_FIELD,
      headerName: 'RequestVerificationToken',
    };
  }

  /** Returns the reason when invalid, null when valid. */
  validate(request: FastifyRequest): string | null {
    const cookieToken = parseCookies(request.headers.cookie)[ANTIFORGERY_COOKIE];
    if (!cookieToken) return 'missing_cookie_token';

    const requestToken = readRequestToken(request);
    if (!requestToken) return 'missing_request_token';

    return this.hasher.verify(`antiforgery:${cookieToken}`, requestToken) ? null : 'token_mismatch';
  }
}

function readRequestToken(request: FastifyRequest): string | null {
  const header = request.headers[ANTIFORGERY_HEADER];
  if (typeof header === 'string' && header) return header;

  const body = request.body;
  if (body && typeof body === 'object' && ANTIFORGERY_FORM_FIELD in body) {
    const field: unknown = Reflect.get(body, ANTIFORGERY_FORM_FIELD);
    if (typeof field === 'string' && field) return field;
  }
  return null;
}

export function registerAntiforgery(app: FastifyInstance, antiforgery: Antiforgery): void {
  // preHandler: the body is parsed, so the form field is readable.
  app.addHook('preHandler', async (req) => {
    if (!UNSAFE_METHODS.has(req.method)) return;
    if (req.routeOptions.config.antiforgery === false) return;

    const reason = antiforgery.validate(req);
    if (reason) {
      withRequestContext(req).warn('antiforgery.rejected', { flow: 'http.antiforgery', reason });
      throw new AppError({
        code: 'ANTIFORGERY_INVALID',
        message: 'The antiforgery token could not be validated.',
      });
    }
  });

  app.get('/antiforgery/token', (req, reply) => {
    const tokens = antiforgery.getAndStoreTokens({ request: req, reply });
    return reply.header('Cache-Control', 'no-store').send({
      requestToken: tokens.requestToken,
      formFieldName: tokens.formFieldName,
      headerName: tokens.headerName,
    });
  });
}
