/**
 * src/modules/identity/identity.module.ts
 *
 * WHY:
 * - Encapsulates the /Account endpoints' wiring.
 * - The app owns the service container; the module only receives a function
 *   that hands it the request's services (no import of app/ from here).
 *
 * RULES:
 * - No infra creation here.
 * - No globals/singletons here.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { EmailSender } from '../../shared/email/email-sender';
import type { RedirectManager } from './auth/redirect-manager';
import type { UserAccessor } from './auth/user-accessor';
import { AccountController } from './account/account.controller';
import { registerAccountRoutes } from './account/account.routes';
import { ManageController } from './account/manage.controller';
import type { SignInManager } from './sign-in-manager';
import type { AuthenticatorTokenProvider } from './tokens/authenticator-token-provider';
import type { UserManager } from './user-manager';

export type IdentityRequestServices = {
  userManager: UserManager;
  signInManager: SignInManager;
  userAccessor: UserAccessor;
  redirectManager: RedirectManager;
  emailSender: EmailSender;
  authenticatorTokenProvider: AuthenticatorTokenProvider;
};

export type IdentityModule = ReturnType<typeof createIdentityModule>;

export function createIdentityModule(deps: { services: (req: FastifyRequest) => IdentityRequestServices }) {
  const account = new AccountController(deps.services);
  const manage = new ManageController(deps.services);

  return {
    account,
    registerRoutes(app: FastifyInstance) {
      registerAccountRoutes(app, account, manage);
    },
  };
}
