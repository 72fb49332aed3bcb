/**
 * src/modules/identity/auth/authentication.ts
 *
 * WHY:
 * - Authentication is configured in two steps: options first (which scheme
 *   authenticates requests, which one receives sign-ins), then the cookie
 *   handlers for the identity schemes.
 * - AuthenticationService is what the rest of the app talks to; it dispatches
 *   to the handler of a scheme.
 *
 * RULES:
 * - addIdentityCookies() requires the default scheme to be configured first.
 * - build() fails if a default scheme names a handler that was never added.
 * - Registering the same scheme twice throws.
 */

import type { FastifyRequest } from 'fastify';

import type { SameSite } from '../../../shared/http/cookies';
import type { HttpContext } from '../../../shared/http/http-context';
import type { SessionStore } from '../../../shared/session/session.store';
import {
  type AuthenticationTicket,
  CookieAuthenticationHandler,
  type CookieSchemeOptions,
  type SignInPrincipal,
} from './cookie-authentication-handler';
import { IdentityCookieNames, IdentitySchemes } from './identity-constants';

export type AuthenticationOptions = {
  defaultScheme: string | null;
  defaultSignInScheme: string | null;
};

export class AuthenticationConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationConfigurationError';
  }
}

export type IdentityCookieSettings = {
  secure: boolean;
  sameSite?: SameSite;
  /** Application cookie lifetime. */
  applicationExpireSeconds?: number;
};

const FOURTEEN_DAYS_SECONDS = 14 * 24 * 60 * 60;
const FIVE_MINUTES_SECONDS = 5 * 60;

export class AuthenticationBuilder {
  private readonly schemes = new Map<string, CookieSchemeOptions>();

  constructor(readonly options: AuthenticationOptions) {}

  addCookie(scheme: string, options: CookieSchemeOptions): this {
    if (this.schemes.has(scheme)) {
      throw new AuthenticationConfigurationError(`Scheme already exists: ${scheme}`);
    }
    this.schemes.set(scheme, options);
    return this;
  }

  /** Application (14 days), External (5 min) and TwoFactorUserId (5 min) cookies. */
  addIdentityCookies(settings: IdentityCookieSettings): this {
    if (!this.options.defaultScheme) {
      throw new AuthenticationConfigurationError(
        'A default authentication scheme must be configured before adding identity cookies.',
      );
    }

    const sameSite = settings.sameSite ?? 'Lax';
    const cookie = (cookieName: string, expireTimeSpanSeconds: number): CookieSchemeOptions => ({
      cookieName,
      expireTimeSpanSeconds,
      secure: settings.secure,
      sameSite,
    });

    return this.addCookie(
      IdentitySchemes.application,
      cookie(
        IdentityCookieNames[IdentitySchemes.application],
        settings.applicationExpireSeconds ?? FOURTEEN_DAYS_SECONDS,
      ),
    )
      .addCookie(
        IdentitySchemes.external,
        cookie(IdentityCookieNames[IdentitySchemes.external], FIVE_MINUTES_SECONDS),
      )
      .addCookie(
        IdentitySchemes.twoFactorUserId,
        cookie(IdentityCookieNames[IdentitySchemes.twoFactorUserId], FIVE_MINUTES_SECONDS),
      );
  }

  build(sessions: SessionStore, now: () => number = Date.now): AuthenticationService {
    const { defaultScheme, defaultSignInScheme } = this.options;

    for (const [label, scheme] of [
      ['default scheme', defaultScheme],
      ['default sign-in scheme', defaultSignInScheme],
    ] as const) {
      if (scheme && !this.schemes.has(scheme)) {
        throw new AuthenticationConfigurationError(`The ${label} '${scheme}' has no registered handler.`);
      }
    }
    if (!defaultScheme) {
      throw new AuthenticationConfigurationError('No default authentication scheme was configured.');
    }

    const handlers = new Map<string, CookieAuthenticationHandler>();
    for (const [scheme, opts] of this.schemes) {
      handlers.set(scheme, new CookieAuthenticationHandler(scheme, opts, sessions, now));
    }

    return new AuthenticationService(defaultScheme, defaultSignInScheme ?? defaultScheme, handlers);
  }
}

export class AuthenticationService {
  constructor(
    readonly defaultScheme: string,
    readonly defaultSignInScheme: string,
    private readonly handlers: ReadonlyMap<string, CookieAuthenticationHandler>,
  ) {}

  get schemes(): string[] {
    return [...this.handlers.keys()];
  }

  private handler(scheme: string): CookieAuthenticationHandler {
    const handler = this.handlers.get(scheme);
    if (!handler) {
      throw new AuthenticationConfigurationError(`No authentication handler is registered for '${scheme}'.`);
    }
    return handler;
  }

  authenticate(request: FastifyRequest, scheme: string = this.defaultScheme): Promise<AuthenticationTicket | null> {
    return this.handler(scheme).authenticate(request);
  }

  signIn(
    ctx: HttpContext,
    principal: SignInPrincipal,
    props: { isPersistent: boolean },
    scheme: string = this.defaultSignInScheme,
  ): Promise<AuthenticationTicket> {
    return this.handler(scheme).signIn(ctx, principal, props);
  }

  signOut(ctx: HttpContext, scheme: string = this.defaultScheme): Promise<void> {
    return this.handler(scheme).signOut(ctx);
  }
}
