/**
 * backend/src/components/routes.ts
 *
 * WHY:
 * - Server-rendered pages: Home, the sign-in-required sample, Error, the
 *   /Account forms and the 404 page.
 * - Resolves each request's authentication state once, before any page or
 *   endpoint runs, and stores it on req.authState.
 *
 * RULES:
 * - Pages only render. Form posts go to the identity endpoints.
 * - The status message left by the previous redirect is consumed here.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { ANONYMOUS } from '../modules/identity/auth/auth-state';
import { requireUser, wantsHtml } from '../modules/identity/auth/require-user';
import { toLocalUrl } from '../modules/identity/auth/redirect-manager';
import { IdentityErrors } from '../modules/identity/identity.errors';
import type { AccountController } from '../modules/identity/account/account.controller';
import { exposesLinks } from '../modules/identity/account/account-http';
import { ERROR_PATH } from '../shared/http/error-handler';
import type { PageView } from './page-renderer';
import {
  forgotPasswordConfirmationPage,
  forgotPasswordPage,
  lockoutPage,
  loginPage,
  loginWith2faPage,
  loginWithRecoveryCodePage,
  registerConfirmationPage,
  registerPage,
  resendEmailConfirmationPage,
  resetPasswordConfirmationPage,
  resetPasswordPage,
} from './pages/account-pages';
import { authPage, errorPage, homePage, notFoundPage } from './pages/site-pages';

const ReturnUrlQuery = z.object({
  returnUrl: z.string().optional(),
  ReturnUrl: z.string().optional(),
  rememberMe: z.string().optional(),
  email: z.string().optional(),
  code: z.string().optional(),
});

type PageQuery = z.infer<typeof ReturnUrlQuery>;

function readQuery(req: FastifyRequest): PageQuery {
  const parsed = ReturnUrlQuery.safeParse(req.query);
  return parsed.success ? parsed.data : {};
}

function returnUrlOf(q: PageQuery): string | undefined {
  const raw = q.returnUrl ?? q.ReturnUrl;
  return raw ? toLocalUrl(raw) : undefined;
}

function render(req: FastifyRequest, reply: FastifyReply, view: PageView) {
  const statusMessage = req.services.get('redirectManager').consumeStatusMessage();
  return req.services.get('pageRenderer').render({ request: req, reply }, view, statusMessage);
}

/** Resolves authentication state for the request (revalidating the session when due). */
export function registerAuthenticationState(app: FastifyInstance): void {
  app.decorateRequest('authState', null);

  app.addHook('onRequest', async (req) => {
    // Anonymous until resolved, so a failing lookup still leaves a readable state for logs.
    req.authState = ANONYMOUS;
    if (req.routeOptions.config.authenticationState === false) return;
    req.authState = await req.services.get('authenticationState').get();
  });
}

export function registerPageRoutes(app: FastifyInstance, opts: { account: AccountController }): void {
  app.get('/', (req, reply) => render(req, reply, homePage()));

  app.get('/auth', { preHandler: requireUser }, (req, reply) => {
    const state = req.authState;
    return render(req, reply, authPage(state.isAuthenticated ? state.user.userName : ''));
  });

  app.get(ERROR_PATH, (req, reply) => render(req, reply, errorPage(req.requestContext.requestId)));

  // ── /Account forms ─────────────────────────────────────────

  app.get('/Account/Login', (req, reply) => render(req, reply, loginPage({ returnUrl: returnUrlOf(readQuery(req)) })));
  app.get('/Account/Register', (req, reply) =>
    render(req, reply, registerPage({ returnUrl: returnUrlOf(readQuery(req)) })),
  );

  app.get('/Account/RegisterConfirmation', async (req, reply) => {
    const q = readQuery(req);
    if (!q.email) return reply.redirect('/');

    const userManager = req.services.get('userManager');
    const user = await userManager.findByEmail(q.email);
    if (!user) throw IdentityErrors.userNotLoaded(q.email);

    const confirmationLink = exposesLinks(req.services.get('emailSender'))
      ? await opts.account.sendConfirmationLink(req, user, returnUrlOf(q))
      : null;

    return render(req, reply, registerConfirmationPage({ email: user.email, confirmationLink }));
  });

  app.get('/Account/LoginWith2fa', (req, reply) => {
    const q = readQuery(req);
    return render(req, reply, loginWith2faPage({ returnUrl: returnUrlOf(q), rememberMe: q.rememberMe === 'true' }));
  });
  app.get('/Account/LoginWithRecoveryCode', (req, reply) =>
    render(req, reply, loginWithRecoveryCodePage({ returnUrl: returnUrlOf(readQuery(req)) })),
  );
  app.get('/Account/Lockout', (req, reply) => render(req, reply, lockoutPage()));

  app.get('/Account/ForgotPassword', (req, reply) => render(req, reply, forgotPasswordPage()));
  app.get('/Account/ForgotPasswordConfirmation', (req, reply) =>
    render(req, reply, forgotPasswordConfirmationPage()),
  );
  app.get('/Account/ResetPassword', (req, reply) => {
    const { code } = readQuery(req);
    if (!code) return reply.redirect('/');
    return render(req, reply, resetPasswordPage({ code }));
  });
  app.get('/Account/ResetPasswordConfirmation', (req, reply) => render(req, reply, resetPasswordConfirmationPage()));
  app.get('/Account/ResendEmailConfirmation', (req, reply) => render(req, reply, resendEmailConfirmationPage()));

  // ── 404 ────────────────────────────────────────────────────

  app.setNotFoundHandler((req, reply) => {
    if (wantsHtml(req)) return render(req, reply, notFoundPage());
    return reply.status(404).send({ error: { code: 'NOT_FOUND', message: 'Not found' } });
  });
}
