/**
 * src/modules/identity/auth/cookie-authentication-handler.ts
 *
 * WHY:
 * - One handler per cookie scheme: reads the scheme's cookie, loads the
 *   server-side session, and writes/clears the cookie on sign-in/out.
 *
 * RULES:
 * - The cookie only carries the session id.
 * - Sign-in always replaces the scheme's current session (no session fixation).
 * - Persistent sign-ins get Max-Age; others are browser-session cookies.
 *   The server-side TTL is expireTimeSpanSeconds either way.
 * - A session stored under a different scheme is ignored.
 */

import type { FastifyRequest } from 'fastify';

import { parseCookies, serializeCookie, type SameSite } from '../../../shared/http/cookies';
import type { HttpContext } from '../../../shared/http/http-context';
import type { SessionData } from '../../../shared/session/session.types';
import type { SessionStore } from '../../../shared/session/session.store';

export type CookieSchemeOptions = {
  cookieName: string;
  expireTimeSpanSeconds: number;
  secure: boolean;
  sameSite: SameSite;
};

export type AuthenticationTicket = {
  scheme: string;
  sessionId: string;
  session: SessionData;
};

export type SignInPrincipal = Pick<SessionData, 'userId' | 'userName' | 'securityStamp'>;

export class CookieAuthenticationHandler {
  constructor(
    readonly scheme: string,
    private readonly options: CookieSchemeOptions,
    private readonly sessions: SessionStore,
    private readonly now: () => number = Date.now,
  ) {}

  private sessionId(request: FastifyRequest): string | null {
    return parseCookies(request.headers.cookie)[this.options.cookieName] || null;
  }

  async authenticate(request: FastifyRequest): Promise<AuthenticationTicket | null> {
    const sessionId = this.sessionId(request);
    if (!sessionId) return null;

    const session = await this.sessions.get(sessionId);
    if (!session || session.scheme !== this.scheme) return null;

    return { scheme: this.scheme, sessionId, session };
  }

  async signIn(
    ctx: HttpContext,
    principal: SignInPrincipal,
    props: { isPersistent: boolean },
  ): Promise<AuthenticationTicket> {
    const previous = this.sessionId(ctx.request);
    if (previous) await this.sessions.destroy(previous);

    const nowIso = new Date(this.now()).toISOString();
    const session: SessionData = {
      scheme: this.scheme,
      userId: principal.userId,
      userName: principal.userName,
      securityStamp: principal.securityStamp,
      isPersistent: props.isPersistent,
      issuedAt: nowIso,
      validatedAt: nowIso,
    };

    const sessionId = await this.sessions.create(session, this.options.expireTimeSpanSeconds);

    ctx.reply.header(
      'Set-Cookie',
      serializeCookie(this.options.cookieName, sessionId, {
        httpOnly: true,
        sameSite: this.options.sameSite,
        secure: this.options.secure,
        maxAgeSeconds: props.isPersistent ? this.options.expireTimeSpanSeconds : undefined,
      }),
    );

    return { scheme: this.scheme, sessionId, session };
  }

  /** Destroys the session (if any) and always clears the cookie. */
  async signOut(ctx: HttpContext): Promise<void> {
    const sessionId = this.sessionId(ctx.request);
    if (sessionId) await this.sessions.destroy(sessionId);

    ctx.reply.header(
      'Set-Cookie',
      serializeCookie(this.options.cookieName, '', {
        httpOnly: true,
        sameSite: this.options.sameSite,
        secure: this.options.secure,
        maxAgeSeconds: 0,
      }),
    );
  }
}
