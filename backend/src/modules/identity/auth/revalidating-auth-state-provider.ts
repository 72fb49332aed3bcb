/**
 * src/modules/identity/auth/revalidating-auth-state-provider.ts
 *
 * WHY:
 * - A session cookie stays valid after the user changes their password or is
 *   deleted elsewhere. Once the session's last validation is older than the
 *   interval, the user is reloaded and the security stamp compared again.
 *
 * RULES:
 * - Within the interval no store lookup happens.
 * - Missing user or changed stamp: the Application session is signed out and the
 *   request continues anonymous.
 * - Valid: validatedAt is bumped (session lifetime is not extended).
 */

import type { HttpContext } from '../../../shared/http/http-context';
import type { Logger } from '../../../shared/logger/logger';
import type { SessionStore } from '../../../shared/session/session.store';
import type { UserManager } from '../user-manager';
import { ANONYMOUS, type AuthenticationState } from './auth-state';
import type { AuthenticationService } from './authentication';
import { IdentitySchemes } from './identity-constants';

export type RevalidationDeps = {
  authentication: AuthenticationService;
  userManager: UserManager;
  sessions: SessionStore;
  logger: Logger;
  revalidationIntervalMs: number;
  now?: () => number;
};

export class RevalidatingAuthenticationStateProvider {
  private readonly now: () => number;

  constructor(
    private readonly ctx: HttpContext,
    private readonly deps: RevalidationDeps,
  ) {
    this.now = deps.now ?? Date.now;
  }

  async getAuthenticationState(): Promise<AuthenticationState> {
    const ticket = await this.deps.authentication.authenticate(this.ctx.request, IdentitySchemes.application);
    if (!ticket) return ANONYMOUS;

    const { session, sessionId } = ticket;
    const authenticated: AuthenticationState = {
      isAuthenticated: true,
      user: { id: session.userId, userName: session.userName },
      sessionId,
    };

    const validatedAt = Date.parse(session.validatedAt);
    const now = this.now();
    if (Number.isFinite(validatedAt) && now - validatedAt < this.deps.revalidationIntervalMs) {
      return authenticated;
    }

    if (!(await this.validateSecurityStamp(session.userId, session.securityStamp))) {
      await this.deps.authentication.signOut(this.ctx, IdentitySchemes.application);
      this.deps.logger.info('identity.session.revalidation_failed', {
        userId: session.userId,
        requestId: this.ctx.request.requestContext.requestId,
      });
      return ANONYMOUS;
    }

    await this.deps.sessions.update(sessionId, { validatedAt: new Date(now).toISOString() });
    return authenticated;
  }

  private async validateSecurityStamp(userId: string, stamp: string): Promise<boolean> {
    const user = await this.deps.userManager.findById(userId);
    return user !== null && user.securityStamp === stamp;
  }
}
