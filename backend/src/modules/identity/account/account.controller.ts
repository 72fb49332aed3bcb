/**
 * src/modules/identity/account/account.controller.ts
 *
 * WHY:
 * - Maps HTTP -> UserManager / SignInManager for the anonymous /Account endpoints:
 *   register, email confirmation, login (password, 2FA, recovery code), logout,
 *   password reset.
 *
 * RESPONSES:
 * - JSON clients get JSON; expected failures are thrown as AppError.
 * - Form posts and browser navigations get redirects. Expected failures come
 *   back to the form with an "Error: ..." status message.
 *
 * RULES:
 * - No DB access here.
 * - Login and password-reset responses never reveal whether an email exists.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { withRequestContext } from '../../../shared/logger/with-context';
import { LOGIN_PATH } from '../auth/identity-constants';
import { toLocalUrl } from '../auth/redirect-manager';
import { IdentityErrors } from '../identity.errors';
import type { IdentityUser, SignInResult } from '../identity.types';
import type { IdentityRequestServices } from '../identity.module';
import {
  confirmEmailLink,
  confirmEmailChangeLink,
  exposesLinks,
  isBrowserRequest,
  parseInput,
  resetPasswordLink,
} from './account-http';
import {
  confirmEmailChangeQuerySchema,
  confirmEmailQuerySchema,
  emailOnlySchema,
  loginSchema,
  loginWith2faSchema,
  loginWithRecoveryCodeSchema,
  logoutSchema,
  registerSchema,
  resetPasswordSchema,
} from './account.schemas';

const RESEND_CONFIRMATION_MESSAGE = 'Verification email sent. Please check your email.';
const FORGOT_PASSWORD_MESSAGE = 'Please check your email to reset your password.';
const RESET_PASSWORD_MESSAGE = 'Your password has been reset.';

function withQuery(path: string, query: Record<string, string>): string {
  return `${path}?${new URLSearchParams(query).toString()}`;
}

export class AccountController {
  constructor(private readonly services: (req: FastifyRequest) => IdentityRequestServices) {}

  // ── registration ───────────────────────────────────────────

  async register(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(registerSchema, req.body);
    const { userManager, signInManager, emailSender, redirectManager } = this.services(req);
    const browser = isBrowserRequest(req);
    const returnUrl = toLocalUrl(input.returnUrl);

    // The email doubles as the user name.
    const user = userManager.newUser({ userName: input.email, email: input.email });
    const result = await userManager.create(user, input.password);
    if (!result.succeeded) {
      if (browser) {
        return redirectManager.redirectToCurrentPageWithStatus(
          `Error: ${result.errors.map((e) => e.description).join(' ')}`,
        );
      }
      throw IdentityErrors.failed(result.errors);
    }

    withRequestContext(req).info('identity.account.registered', { flow: 'identity.register', userId: user.id });

    const link = await this.sendConfirmationLink(req, user, input.returnUrl);

    if (userManager.options.signIn.requireConfirmedAccount) {
      if (browser) {
        return redirectManager.redirectTo('/Account/RegisterConfirmation', { email: user.email, returnUrl });
      }
      return reply.status(201).send({
        userId: user.id,
        requiresConfirmation: true,
        ...(exposesLinks(emailSender) ? { confirmationLink: link } : {}),
      });
    }

    await signInManager.signIn({ request: req, reply }, user, false);
    if (browser) return redirectManager.redirectTo(returnUrl);
    return reply.status(201).send({ userId: user.id, requiresConfirmation: false });
  }

  async confirmEmail(req: FastifyRequest, reply: FastifyReply) {
    const query = parseInput(confirmEmailQuerySchema, req.query, 'query');
    const { userManager, redirectManager } = this.services(req);

    const user = await userManager.findById(query.userId);
    if (!user) throw IdentityErrors.userNotLoaded(query.userId);

    const result = await userManager.confirmEmail(user, query.code);
    const log = withRequestContext(req);

    if (!result.succeeded) {
      log.info('identity.account.email_confirmation_failed', { flow: 'identity.confirm_email', userId: user.id });
      if (isBrowserRequest(req)) {
        return redirectManager.redirectToWithStatus(LOGIN_PATH, 'Error confirming your email.');
      }
      throw IdentityErrors.emailConfirmationFailed({ userId: user.id });
    }

    log.info('identity.account.email_confirmed', { flow: 'identity.confirm_email', userId: user.id });
    const message = 'Thank you for confirming your email.';
    if (isBrowserRequest(req)) return redirectManager.redirectToWithStatus(LOGIN_PATH, message);
    return reply.status(200).send({ message });
  }

  async resendEmailConfirmation(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(emailOnlySchema, req.body);
    const { userManager, emailSender, redirectManager } = this.services(req);

    const user = await userManager.findByEmail(input.email);
    const link = user ? await this.sendConfirmationLink(req, user) : null;

    if (isBrowserRequest(req)) {
      return redirectManager.redirectToCurrentPageWithStatus(RESEND_CONFIRMATION_MESSAGE);
    }
    return reply.status(200).send({
      message: RESEND_CONFIRMATION_MESSAGE,
      ...(link && exposesLinks(emailSender) ? { confirmationLink: link } : {}),
    });
  }

  /** Public so the RegisterConfirmation page can build the same link. */
  async sendConfirmationLink(req: FastifyRequest, user: IdentityUser, returnUrl?: string): Promise<string> {
    const { userManager, emailSender } = this.services(req);
    const code = userManager.generateEmailConfirmationToken(user);
    const link = confirmEmailLink(req, user.id, code, returnUrl);
    await emailSender.sendConfirmationLink({ userId: user.id, email: user.email }, link);
    return link;
  }

  // ── login / logout ─────────────────────────────────────────

  async login(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(loginSchema, req.body);
    const { signInManager, redirectManager } = this.services(req);
    const browser = isBrowserRequest(req);
    const returnUrl = toLocalUrl(input.returnUrl);

    const result = await signInManager.passwordSignIn({ request: req, reply }, input.email, input.password, {
      isPersistent: input.rememberMe,
      lockoutOnFailure: true,
    });

    if (result === 'RequiresTwoFactor') {
      if (browser) {
        return redirectManager.redirectTo('/Account/LoginWith2fa', {
          returnUrl,
          rememberMe: String(input.rememberMe),
        });
      }
      return reply.status(200).send({ result, returnUrl });
    }

    return this.finishSignIn(req, reply, result, {
      returnUrl,
      failedPage: withQuery(LOGIN_PATH, { ReturnUrl: returnUrl }),
      failedMessage: 'Error: Invalid login attempt.',
      failedError: () => IdentityErrors.invalidLoginAttempt(),
    });
  }

  async loginWith2fa(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(loginWith2faSchema, req.body);
    const ctx = { request: req, reply };
    const { signInManager } = this.services(req);
    const returnUrl = toLocalUrl(input.returnUrl);

    if (!(await signInManager.getTwoFactorAuthenticationUser(ctx))) {
      throw IdentityErrors.twoFactorUserNotFound();
    }

    const result = await signInManager.twoFactorAuthenticatorSignIn(ctx, input.twoFactorCode, input.rememberMe);

    return this.finishSignIn(req, reply, result, {
      returnUrl,
      failedPage: withQuery('/Account/LoginWith2fa', { returnUrl, rememberMe: String(input.rememberMe) }),
      failedMessage: 'Error: Invalid authenticator code.',
      failedError: () => IdentityErrors.invalidAuthenticatorCode(),
    });
  }

  async loginWithRecoveryCode(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(loginWithRecoveryCodeSchema, req.body);
    const ctx = { request: req, reply };
    const { signInManager } = this.services(req);
    const returnUrl = toLocalUrl(input.returnUrl);

    if (!(await signInManager.getTwoFactorAuthenticationUser(ctx))) {
      throw IdentityErrors.twoFactorUserNotFound();
    }

    const result = await signInManager.twoFactorRecoveryCodeSignIn(ctx, input.recoveryCode);

    return this.finishSignIn(req, reply, result, {
      returnUrl,
      failedPage: withQuery('/Account/LoginWithRecoveryCode', { returnUrl }),
      failedMessage: 'Error: Invalid recovery code entered.',
      failedError: () => IdentityErrors.invalidRecoveryCode(),
    });
  }

  private finishSignIn(
    req: FastifyRequest,
    reply: FastifyReply,
    result: SignInResult,
    opts: {
      returnUrl: string;
      failedPage: string;
      failedMessage: string;
      failedError: () => Error;
    },
  ) {
    const { redirectManager } = this.services(req);
    const browser = isBrowserRequest(req);

    if (result === 'Succeeded') {
      if (browser) return redirectManager.redirectTo(opts.returnUrl);
      return reply.status(200).send({ result, returnUrl: opts.returnUrl });
    }

    if (result === 'LockedOut') {
      if (browser) return redirectManager.redirectTo('/Account/Lockout');
      throw IdentityErrors.lockedOut();
    }

    if (browser) return redirectManager.redirectToWithStatus(opts.failedPage, opts.failedMessage);
    throw opts.failedError();
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(logoutSchema, req.body);
    const { signInManager, redirectManager } = this.services(req);

    await signInManager.signOut({ request: req, reply });
    withRequestContext(req).info('identity.account.logged_out', { flow: 'identity.logout' });

    if (isBrowserRequest(req)) return redirectManager.redirectTo(input.returnUrl);
    return reply.status(204).send();
  }

  // ── password reset ─────────────────────────────────────────

  async forgotPassword(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(emailOnlySchema, req.body);
    const { userManager, emailSender, redirectManager } = this.services(req);

    const user = await userManager.findByEmail(input.email);
    // Unknown or unconfirmed: same response, nothing sent.
    if (user?.emailConfirmed) {
      const code = userManager.generatePasswordResetToken(user);
      await emailSender.sendPasswordResetLink({ userId: user.id, email: user.email }, resetPasswordLink(req, code));
      withRequestContext(req).info('identity.account.password_reset_requested', {
        flow: 'identity.forgot_password',
        userId: user.id,
      });
    }

    if (isBrowserRequest(req)) return redirectManager.redirectTo('/Account/ForgotPasswordConfirmation');
    return reply.status(200).send({ message: FORGOT_PASSWORD_MESSAGE });
  }

  async resetPassword(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(resetPasswordSchema, req.body);
    const { userManager, redirectManager } = this.services(req);
    const browser = isBrowserRequest(req);

    const user = await userManager.findByEmail(input.email);
    if (user) {
      const result = await userManager.resetPassword(user, input.code, input.password);
      if (!result.succeeded) {
        if (browser) {
          return redirectManager.redirectToWithStatus(
            withQuery('/Account/ResetPassword', { code: input.code }),
            `Error: ${result.errors.map((e) => e.description).join(' ')}`,
          );
        }
        throw IdentityErrors.failed(result.errors);
      }
      withRequestContext(req).info('identity.account.password_reset', { flow: 'identity.reset_password', userId: user.id });
    }

    if (browser) return redirectManager.redirectTo('/Account/ResetPasswordConfirmation');
    return reply.status(200).send({ message: RESET_PASSWORD_MESSAGE });
  }

  // ── email change (link from Manage/Email) ──────────────────

  async confirmEmailChange(req: FastifyRequest, reply: FastifyReply) {
    const query = parseInput(confirmEmailChangeQuerySchema, req.query, 'query');
    const { userManager, signInManager, redirectManager } = this.services(req);
    const browser = isBrowserRequest(req);

    const user = await userManager.findById(query.userId);
    if (!user) throw IdentityErrors.userNotLoaded(query.userId);

    const changed = await userManager.changeEmail(user, query.email, query.code);
    if (!changed.succeeded) {
      if (browser) return redirectManager.redirectToWithStatus('/', 'Error changing email.');
      throw IdentityErrors.emailChangeFailed({ userId: user.id });
    }

    // The user name follows the email.
    const renamed = await userManager.setUserName(user, query.email);
    if (!renamed.succeeded) {
      if (browser) return redirectManager.redirectToWithStatus('/', 'Error changing user name.');
      throw IdentityErrors.failed(renamed.errors);
    }

    await signInManager.refreshSignIn({ request: req, reply }, user);
    withRequestContext(req).info('identity.account.email_changed', { flow: 'identity.change_email', userId: user.id });

    const message = 'Thank you for confirming your email change.';
    if (browser) return redirectManager.redirectToWithStatus('/', message);
    return reply.status(200).send({ message });
  }
}
