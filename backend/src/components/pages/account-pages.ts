/**
 * backend/src/components/pages/account-pages.ts
 *
 * Forms for the /Account endpoints. Field names match the JSON bodies the
 * identity controllers accept, so the same endpoint serves both.
 */

import { escapeHtml, hrefWithQuery } from '../html';
import type { PageView } from '../page-renderer';

function hidden(name: string, value: string | undefined): string {
  return value ? `<input type="hidden" name="${name}" value="${escapeHtml(value)}">` : '';
}

export function loginPage(input: { returnUrl?: string }): PageView {
  return {
    title: 'Log in',
    body: (af) => `<h1>Log in</h1>
<form method="post" action="/Account/Login">
  ${af}
  ${hidden('returnUrl', input.returnUrl)}
  <label>Email <input type="email" name="email" autocomplete="username" required></label>
  <label>Password <input type="password" name="password" autocomplete="current-password" required></label>
  <label class="checkbox"><input type="checkbox" name="rememberMe" value="true"> Remember me?</label>
  <button type="submit">Log in</button>
</form>
<p><a href="/Account/ForgotPassword">Forgot your password?</a></p>
<p><a href="${hrefWithQuery('/Account/Register', { returnUrl: input.returnUrl })}">Register as a new user</a></p>
<p><a href="/Account/ResendEmailConfirmation">Resend email confirmation</a></p>`,
  };
}

export function registerPage(input: { returnUrl?: string }): PageView {
  return {
    title: 'Register',
    body: (af) => `<h1>Register</h1>
<h2>Create a new account.</h2>
<form method="post" action="/Account/Register">
  ${af}
  ${hidden('returnUrl', input.returnUrl)}
  <label>Email <input type="email" name="email" autocomplete="username" required></label>
  <label>Password <input type="password" name="password" autocomplete="new-password" required></label>
  <label>Confirm Password <input type="password" name="confirmPassword" autocomplete="new-password" required></label>
  <button type="submit">Register</button>
</form>`,
  };
}

export function registerConfirmationPage(input: { email: string; confirmationLink: string | null }): PageView {
  const body = input.confirmationLink
    ? `<p>This app does not currently have a real email sender registered.
  Normally this would be emailed: <a id="confirm-link" href="${escapeHtml(input.confirmationLink)}">Click here to confirm your account</a></p>`
    : `<p>Please check your email (${escapeHtml(input.email)}) to confirm your account.</p>`;

  return {
    title: 'Register confirmation',
    body: () => `<h1>Register confirmation</h1>
${body}`,
  };
}

export function loginWith2faPage(input: { returnUrl?: string; rememberMe: boolean }): PageView {
  return {
    title: 'Two-factor authentication',
    body: (af) => `<h1>Two-factor authentication</h1>
<p>Your login is protected with an authenticator app. Enter your authenticator code below.</p>
<form method="post" action="/Account/LoginWith2fa">
  ${af}
  ${hidden('returnUrl', input.returnUrl)}
  ${hidden('rememberMe', input.rememberMe ? 'true' : undefined)}
  <label>Authenticator code <input name="twoFactorCode" inputmode="numeric" autocomplete="one-time-code" required></label>
  <button type="submit">Log in</button>
</form>
<p>Don't have access to your authenticator device? You can
  <a href="${hrefWithQuery('/Account/LoginWithRecoveryCode', { returnUrl: input.returnUrl })}">log in with a recovery code</a>.</p>`,
  };
}

export function loginWithRecoveryCodePage(input: { returnUrl?: string }): PageView {
  return {
    title: 'Recovery code verification',
    body: (af) => `<h1>Recovery code verification</h1>
<p>You have requested to log in with a recovery code. This login will not be remembered until you provide
  an authenticator app code at log in or disable 2FA and log in again.</p>
<form method="post" action="/Account/LoginWithRecoveryCode">
  ${af}
  ${hidden('returnUrl', input.returnUrl)}
  <label>Recovery Code <input name="recoveryCode" autocomplete="off" required></label>
  <button type="submit">Log in</button>
</form>`,
  };
}

export function lockoutPage(): PageView {
  return {
    title: 'Locked out',
    body: () => `<h1 class="text-danger">Locked out</h1>
<p class="text-danger">This account has been locked out, please try again later.</p>`,
  };
}

export function forgotPasswordPage(): PageView {
  return {
    title: 'Forgot your password?',
    body: (af) => `<h1>Forgot your password?</h1>
<h2>Enter your email.</h2>
<form method="post" action="/Account/ForgotPassword">
  ${af}
  <label>Email <input type="email" name="email" autocomplete="username" required></label>
  <button type="submit">Reset password</button>
</form>`,
  };
}

export function forgotPasswordConfirmationPage(): PageView {
  return {
    title: 'Forgot password confirmation',
    body: () => `<h1>Forgot password confirmation</h1>
<p>Please check your email to reset your password.</p>`,
  };
}

export function resetPasswordPage(input: { code: string }): PageView {
  return {
    title: 'Reset password',
    body: (af) => `<h1>Reset password</h1>
<h2>Reset your password.</h2>
<form method="post" action="/Account/ResetPassword">
  ${af}
  ${hidden('code', input.code)}
  <label>Email <input type="email" name="email" autocomplete="username" required></label>
  <label>Password <input type="password" name="password" autocomplete="new-password" required></label>
  <label>Confirm password <input type="password" name="confirmPassword" autocomplete="new-password" required></label>
  <button type="submit">Reset</button>
</form>`,
  };
}

export function resetPasswordConfirmationPage(): PageView {
  return {
    title: 'Reset password confirmation',
    body: () => `<h1>Reset password confirmation</h1>
<p>Your password has been reset. Please <a href="/Account/Login">click here to log in</a>.</p>`,
  };
}

export function resendEmailConfirmationPage(): PageView {
  return {
    title: 'Resend email confirmation',
    body: (af) => `<h1>Resend email confirmation</h1>
<h2>Enter your email.</h2>
<form method="post" action="/Account/ResendEmailConfirmation">
  ${af}
  <label>Email <input type="email" name="email" autocomplete="username" required></label>
  <button type="submit">Resend</button>
</form>`,
  };
}
