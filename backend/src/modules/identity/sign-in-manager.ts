/**
 * src/modules/identity/sign-in-manager.ts
 *
 * WHY:
 * - Turns credential checks into cookie sessions: password sign-in, the
 *   two-factor step, sign-out and refresh after security-sensitive changes.
 *
 * FLOW (password):
 * 1) unknown user -> Failed
 * 2) unconfirmed (requireConfirmedAccount) -> NotAllowed; locked -> LockedOut
 * 3) wrong password -> count failure (when lockoutOnFailure) -> LockedOut | Failed
 * 4) two-factor enabled with an authenticator -> TwoFactorUserId cookie -> RequiresTwoFactor
 * 5) otherwise -> Application cookie -> Succeeded
 *
 * RULES:
 * - Results are values; controllers map them to HTTP.
 * - Never log passwords or codes.
 */

import type { HttpContext } from '../../shared/http/http-context';
import type { Logger } from '../../shared/logger/logger';
import type { AuthenticationService } from './auth/authentication';
import { IdentitySchemes } from './auth/identity-constants';
import type { IdentityUser, SignInResult } from './identity.types';
import { canSignIn, decidePreSignIn } from './policies/sign-in.policy';
import type { UserManager } from './user-manager';

export type SignInManagerDeps = {
  userManager: UserManager;
  authentication: AuthenticationService;
  logger: Logger;
  now?: () => number;
};

export class SignInManager {
  private readonly userManager: UserManager;
  private readonly authentication: AuthenticationService;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(deps: SignInManagerDeps) {
    this.userManager = deps.userManager;
    this.authentication = deps.authentication;
    this.logger = deps.logger;
    this.now = deps.now ?? Date.now;
  }

  canSignIn(user: IdentityUser): boolean {
    return canSignIn(user, this.userManager.options.signIn);
  }

  async isSignedIn(ctx: HttpContext): Promise<boolean> {
    return (await this.authentication.authenticate(ctx.request, IdentitySchemes.application)) !== null;
  }

  async signIn(ctx: HttpContext, user: IdentityUser, isPersistent: boolean): Promise<void> {
    await this.authentication.signIn(
      ctx,
      { userId: user.id, userName: user.userName, securityStamp: user.securityStamp },
      { isPersistent },
      IdentitySchemes.application,
    );
  }

  async signOut(ctx: HttpContext): Promise<void> {
    await this.authentication.signOut(ctx, IdentitySchemes.application);
    await this.authentication.signOut(ctx, IdentitySchemes.external);
    await this.authentication.signOut(ctx, IdentitySchemes.twoFactorUserId);
  }

  /**
   * Re-issues the Application cookie with the user's current security stamp,
   * keeping the persistence of the current session. No-op when the request is
   * not signed in as this user.
   */
  async refreshSignIn(ctx: HttpContext, user: IdentityUser): Promise<void> {
    const ticket = await this.authentication.authenticate(ctx.request, IdentitySchemes.application);
    if (!ticket || ticket.session.userId !== user.id) return;

    await this.signIn(ctx, user, ticket.session.isPersistent);
  }

  async passwordSignIn(
    ctx: HttpContext,
    userName: string,
    password: string,
    opts: { isPersistent: boolean; lockoutOnFailure: boolean },
  ): Promise<SignInResult> {
    const user = await this.userManager.findByName(userName);
    if (!user) {
      this.logger.info('identity.login.failed', { reason: 'unknown_user' });
      return 'Failed';
    }

    const result = await this.checkPasswordSignIn(user, password, opts.lockoutOnFailure);
    if (result !== 'Succeeded') return result;

    return this.signInOrTwoFactor(ctx, user, opts.isPersistent);
  }

  /** Password check with lockout bookkeeping; does not sign in. */
  async checkPasswordSignIn(
    user: IdentityUser,
    password: string,
    lockoutOnFailure: boolean,
  ): Promise<SignInResult> {
    const gate = decidePreSignIn(user, this.userManager.options.signIn, this.now());
    if (gate !== 'Allowed') {
      this.logger.info('identity.login.blocked', { userId: user.id, reason: gate });
      return gate;
    }

    if (await this.userManager.checkPassword(user, password)) {
      // With 2FA the counter is reset only once the second factor succeeds.
      if (!user.twoFactorEnabled) await this.userManager.resetAccessFailedCount(user);
      return 'Succeeded';
    }

    this.logger.info('identity.login.failed', { userId: user.id, reason: 'bad_password' });

    if (lockoutOnFailure) {
      await this.userManager.accessFailed(user);
      if (this.userManager.isLockedOut(user)) return 'LockedOut';
    }
    return 'Failed';
  }

  private async signInOrTwoFactor(
    ctx: HttpContext,
    user: IdentityUser,
    isPersistent: boolean,
  ): Promise<SignInResult> {
    if (user.twoFactorEnabled && (await this.userManager.hasAuthenticator(user))) {
      await this.authentication.signIn(
        ctx,
        { userId: user.id, userName: user.userName, securityStamp: user.securityStamp },
        { isPersistent },
        IdentitySchemes.twoFactorUserId,
      );
      this.logger.info('identity.login.requires_2fa', { userId: user.id });
      return 'RequiresTwoFactor';
    }

    await this.signIn(ctx, user, isPersistent);
    this.logger.info('identity.login.success', { userId: user.id });
    return 'Succeeded';
  }

  /** User whose password was verified and who still owes a second factor. */
  async getTwoFactorAuthenticationUser(ctx: HttpContext): Promise<IdentityUser | null> {
    const ticket = await this.authentication.authenticate(ctx.request, IdentitySchemes.twoFactorUserId);
    if (!ticket) return null;
    return this.userManager.findById(ticket.session.userId);
  }

  async twoFactorAuthenticatorSignIn(
    ctx: HttpContext,
    code: string,
    isPersistent: boolean,
  ): Promise<SignInResult> {
    const pending = await this.authentication.authenticate(ctx.request, IdentitySchemes.twoFactorUserId);
    const user = pending ? await this.userManager.findById(pending.session.userId) : null;
    if (!user) return 'Failed';

    if (this.userManager.isLockedOut(user)) return 'LockedOut';

    if (await this.userManager.verifyAuthenticatorCode(user, code)) {
      return this.completeTwoFactorSignIn(ctx, user, isPersistent || (pending?.session.isPersistent ?? false));
    }

    this.logger.info('identity.login.2fa_failed', { userId: user.id });
    await this.userManager.accessFailed(user);
    return this.userManager.isLockedOut(user) ? 'LockedOut' : 'Failed';
  }

  /** Recovery codes are random enough that failures are not counted toward lockout. */
  async twoFactorRecoveryCodeSignIn(ctx: HttpContext, recoveryCode: string): Promise<SignInResult> {
    const pending = await this.authentication.authenticate(ctx.request, IdentitySchemes.twoFactorUserId);
    const user = pending ? await this.userManager.findById(pending.session.userId) : null;
    if (!user) return 'Failed';

    const result = await this.userManager.redeemTwoFactorRecoveryCode(user, recoveryCode);
    if (!result.succeeded) {
      this.logger.info('identity.login.recovery_code_failed', { userId: user.id });
      return 'Failed';
    }

    this.logger.info('identity.login.recovery_code_used', { userId: user.id });
    return this.completeTwoFactorSignIn(ctx, user, pending?.session.isPersistent ?? false);
  }

  private async completeTwoFactorSignIn(
    ctx: HttpContext,
    user: IdentityUser,
    isPersistent: boolean,
  ): Promise<SignInResult> {
    await this.userManager.resetAccessFailedCount(user);
    await this.authentication.signOut(ctx, IdentitySchemes.twoFactorUserId);
    await this.signIn(ctx, user, isPersistent);
    this.logger.info('identity.login.success', { userId: user.id, twoFactor: true });
    return 'Succeeded';
  }
}
