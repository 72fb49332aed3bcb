/**
 * src/modules/identity/account/account.routes.ts
 *
 * WHY:
 * - Declares the /Account endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 * - Manage endpoints run behind requireUser.
 * - GET pages for these paths are registered by the page layer (components/routes.ts).
 */

import type { FastifyInstance } from 'fastify';

import { requireUser } from '../auth/require-user';
import type { AccountController } from './account.controller';
import type { ManageController } from './manage.controller';

export function registerAccountRoutes(
  app: FastifyInstance,
  account: AccountController,
  manage: ManageController,
) {
  app.post('/Account/Register', account.register.bind(account));
  app.get('/Account/ConfirmEmail', account.confirmEmail.bind(account));
  app.post('/Account/ResendEmailConfirmation', account.resendEmailConfirmation.bind(account));

  app.post('/Account/Login', account.login.bind(account));
  app.post('/Account/LoginWith2fa', account.loginWith2fa.bind(account));
  app.post('/Account/LoginWithRecoveryCode', account.loginWithRecoveryCode.bind(account));
  app.post('/Account/Logout', account.logout.bind(account));

  app.post('/Account/ForgotPassword', account.forgotPassword.bind(account));
  app.post('/Account/ResetPassword', account.resetPassword.bind(account));
  app.get('/Account/ConfirmEmailChange', account.confirmEmailChange.bind(account));

  const guarded = { preHandler: requireUser };

  app.get('/Account/Manage', guarded, manage.getProfile.bind(manage));
  app.post('/Account/Manage', guarded, manage.updateProfile.bind(manage));
  app.get('/Account/Manage/Email', guarded, manage.getEmail.bind(manage));
  app.post('/Account/Manage/Email', guarded, manage.changeEmail.bind(manage));
  app.post('/Account/Manage/Email/SendVerification', guarded, manage.sendVerificationEmail.bind(manage));
  app.post('/Account/Manage/ChangePassword', guarded, manage.changePassword.bind(manage));
  app.get('/Account/Manage/TwoFactorAuthentication', guarded, manage.twoFactorStatus.bind(manage));
  app.get('/Account/Manage/EnableAuthenticator', guarded, manage.getAuthenticatorSetup.bind(manage));
  app.post('/Account/Manage/EnableAuthenticator', guarded, manage.enableAuthenticator.bind(manage));
  app.post('/Account/Manage/Disable2fa', guarded, manage.disable2fa.bind(manage));
  app.post('/Account/Manage/ResetAuthenticator', guarded, manage.resetAuthenticator.bind(manage));
  app.post('/Account/Manage/GenerateRecoveryCodes', guarded, manage.generateRecoveryCodes.bind(manage));
  app.post('/Account/Manage/DownloadPersonalData', guarded, manage.downloadPersonalData.bind(manage));
  app.post('/Account/Manage/DeletePersonalData', guarded, manage.deletePersonalData.bind(manage));
}
