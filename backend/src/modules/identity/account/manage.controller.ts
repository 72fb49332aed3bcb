/**
 * src/modules/identity/account/manage.controller.ts
 *
 * WHY:
 * - Self-service for the signed-in user: profile, email, password, two-factor
 *   setup, recovery codes, personal data.
 *
 * RULES:
 * - JSON only. Every route runs behind requireUser.
 * - After any change that rotates the security stamp the session is refreshed,
 *   otherwise revalidation would sign the user out.
 * - Recovery codes are returned once, at generation time.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../../shared/http/errors';
import { withRequestContext } from '../../../shared/logger/with-context';
import { IdentityErrors } from '../identity.errors';
import type { IdentityUser } from '../identity.types';
import type { IdentityRequestServices } from '../identity.module';
import { confirmEmailChangeLink, confirmEmailLink, exposesLinks, parseInput } from './account-http';
import {
  changeEmailSchema,
  changePasswordSchema,
  deletePersonalDataSchema,
  enableAuthenticatorSchema,
  updateProfileSchema,
} from './account.schemas';

export class ManageController {
  constructor(private readonly services: (req: FastifyRequest) => IdentityRequestServices) {}

  private async load(req: FastifyRequest): Promise<{ user: IdentityUser; services: IdentityRequestServices }> {
    const services = this.services(req);
    const user = await services.userAccessor.getRequiredUser();
    return { user, services };
  }

  // ── profile ────────────────────────────────────────────────

  async getProfile(req: FastifyRequest, reply: FastifyReply) {
    const { user } = await this.load(req);
    return reply.status(200).send({ userName: user.userName, phoneNumber: user.phoneNumber });
  }

  async updateProfile(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(updateProfileSchema, req.body);
    const { user, services } = await this.load(req);

    const phoneNumber = input.phoneNumber ?? null;
    if (phoneNumber !== user.phoneNumber) {
      const result = await services.userManager.setPhoneNumber(user, phoneNumber);
      if (!result.succeeded) throw IdentityErrors.failed(result.errors);
    }

    await services.signInManager.refreshSignIn({ request: req, reply }, user);
    return reply.status(200).send({ message: 'Your profile has been updated' });
  }

  // ── email ──────────────────────────────────────────────────

  async getEmail(req: FastifyRequest, reply: FastifyReply) {
    const { user } = await this.load(req);
    return reply.status(200).send({ email: user.email, isEmailConfirmed: user.emailConfirmed });
  }

  async changeEmail(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(changeEmailSchema, req.body);
    const { user, services } = await this.load(req);

    if (input.newEmail === user.email) {
      return reply.status(200).send({ message: 'Your email is unchanged.' });
    }

    const code = services.userManager.generateChangeEmailToken(user, input.newEmail);
    const link = confirmEmailChangeLink(req, user.id, input.newEmail, code);
    await services.emailSender.sendConfirmationLink({ userId: user.id, email: input.newEmail }, link);

    withRequestContext(req).info('identity.manage.email_change_requested', { flow: 'identity.manage', userId: user.id });

    return reply.status(200).send({
      message: 'Confirmation link to change email sent. Please check your email.',
      ...(exposesLinks(services.emailSender) ? { confirmationLink: link } : {}),
    });
  }

  async sendVerificationEmail(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);

    const code = services.userManager.generateEmailConfirmationToken(user);
    const link = confirmEmailLink(req, user.id, code);
    await services.emailSender.sendConfirmationLink({ userId: user.id, email: user.email }, link);

    return reply.status(200).send({
      message: 'Verification email sent. Please check your email.',
      ...(exposesLinks(services.emailSender) ? { confirmationLink: link } : {}),
    });
  }

  // ── password ───────────────────────────────────────────────

  async changePassword(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(changePasswordSchema, req.body);
    const { user, services } = await this.load(req);

    const result = await services.userManager.changePassword(user, input.oldPassword, input.newPassword);
    if (!result.succeeded) throw IdentityErrors.failed(result.errors);

    await services.signInManager.refreshSignIn({ request: req, reply }, user);
    withRequestContext(req).info('identity.manage.password_changed', { flow: 'identity.manage', userId: user.id });

    return reply.status(200).send({ message: 'Your password has been changed' });
  }

  // ── two-factor ─────────────────────────────────────────────

  async twoFactorStatus(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);
    const { userManager } = services;

    return reply.status(200).send({
      hasAuthenticator: await userManager.hasAuthenticator(user),
      is2faEnabled: user.twoFactorEnabled,
      recoveryCodesLeft: await userManager.countRecoveryCodes(user),
    });
  }

  /** Shared key and otpauth URI; a key is created on first visit. */
  async getAuthenticatorSetup(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);
    const { userManager, authenticatorTokenProvider } = services;

    let key = await userManager.getAuthenticatorKey(user);
    if (!key) {
      const reset = await userManager.resetAuthenticatorKey(user);
      if (!reset.succeeded) throw IdentityErrors.failed(reset.errors);
      await services.signInManager.refreshSignIn({ request: req, reply }, user);
      key = await userManager.getAuthenticatorKey(user);
    }
    if (!key) throw AppError.internal('Authenticator key could not be created.');

    return reply.status(200).send({
      sharedKey: authenticatorTokenProvider.formatKey(key),
      authenticatorUri: authenticatorTokenProvider.authenticatorUri(key, user.email),
    });
  }

  async enableAuthenticator(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(enableAuthenticatorSchema, req.body);
    const { user, services } = await this.load(req);
    const { userManager } = services;

    if (!(await userManager.verifyAuthenticatorCode(user, input.code))) {
      throw IdentityErrors.invalidVerificationCode({ userId: user.id });
    }

    const result = await userManager.setTwoFactorEnabled(user, true);
    if (!result.succeeded) throw IdentityErrors.failed(result.errors);

    withRequestContext(req).info('identity.manage.2fa_enabled', { flow: 'identity.manage', userId: user.id });

    const recoveryCodes =
      (await userManager.countRecoveryCodes(user)) === 0
        ? await userManager.generateNewTwoFactorRecoveryCodes(user)
        : null;

    await services.signInManager.refreshSignIn({ request: req, reply }, user);

    return reply.status(200).send({
      message: 'Your authenticator app has been verified.',
      recoveryCodes,
    });
  }

  async disable2fa(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);

    if (!user.twoFactorEnabled) {
      throw AppError.validationError("Cannot disable 2FA for user as it's not currently enabled.");
    }

    const result = await services.userManager.setTwoFactorEnabled(user, false);
    if (!result.succeeded) throw IdentityErrors.failed(result.errors);

    await services.signInManager.refreshSignIn({ request: req, reply }, user);
    withRequestContext(req).info('identity.manage.2fa_disabled', { flow: 'identity.manage', userId: user.id });

    return reply.status(200).send({
      message: '2fa has been disabled. You can reenable 2fa when you setup an authenticator app',
    });
  }

  async resetAuthenticator(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);
    const { userManager } = services;

    const disabled = await userManager.setTwoFactorEnabled(user, false);
    if (!disabled.succeeded) throw IdentityErrors.failed(disabled.errors);

    const reset = await userManager.resetAuthenticatorKey(user);
    if (!reset.succeeded) throw IdentityErrors.failed(reset.errors);

    await services.signInManager.refreshSignIn({ request: req, reply }, user);
    withRequestContext(req).info('identity.manage.authenticator_reset', { flow: 'identity.manage', userId: user.id });

    return reply.status(200).send({
      message:
        'Your authenticator app key has been reset, you will need to configure your authenticator app using the new key.',
    });
  }

  async generateRecoveryCodes(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);

    if (!user.twoFactorEnabled) {
      throw IdentityErrors.twoFactorNotEnabled({ userId: user.id });
    }

    const recoveryCodes = await services.userManager.generateNewTwoFactorRecoveryCodes(user);
    return reply.status(200).send({ message: 'You have generated new recovery codes.', recoveryCodes });
  }

  // ── personal data ──────────────────────────────────────────

  async downloadPersonalData(req: FastifyRequest, reply: FastifyReply) {
    const { user, services } = await this.load(req);

    const data = await services.userManager.getPersonalData(user);
    withRequestContext(req).info('identity.manage.personal_data_downloaded', { flow: 'identity.manage', userId: user.id });

    return reply
      .status(200)
      .header('Content-Disposition', 'attachment; filename=PersonalData.json')
      .type('application/json')
      .send(JSON.stringify(data));
  }

  async deletePersonalData(req: FastifyRequest, reply: FastifyReply) {
    const input = parseInput(deletePersonalDataSchema, req.body);
    const { user, services } = await this.load(req);
    const { userManager } = services;

    if (userManager.hasPassword(user)) {
      if (!input.password || !(await userManager.checkPassword(user, input.password))) {
        throw IdentityErrors.incorrectPassword({ userId: user.id });
      }
    }

    await userManager.delete(user);
    await services.signInManager.signOut({ request: req, reply });
    withRequestContext(req).info('identity.manage.account_deleted', { flow: 'identity.manage', userId: user.id });

    return reply.status(204).send();
  }
}
