/**
 * backend/src/components/layout.ts
 *
 * WHY:
 * - Shared document shell: head, navigation, status message, body.
 *
 * RULES:
 * - The logout button is a form post, so it carries the antiforgery field.
 * - Status messages starting with "Error" render as errors.
 */

import { escapeHtml } from './html';

export const APP_TITLE = 'Identity Starter';

export type LayoutInput = {
  title: string;
  body: string;
  userName: string | null;
  statusMessage: string | null;
  antiforgeryField: string;
};

function statusMessage(message: string | null): string {
  if (!message) return '';
  const kind = message.startsWith('Error') ? 'error' : 'success';
  return `<div class="status status-${kind}" role="alert">${escapeHtml(message)}</div>`;
}

function nav(userName: string | null, antiforgeryField: string): string {
  const account = userName
    ? `<span class="nav-user">${escapeHtml(userName)}</span>
       <form method="post" action="/Account/Logout" class="inline">
         ${antiforgeryField}
         <input type="hidden" name="returnUrl" value="/">
         <button type="submit" class="link">Logout</button>
       </form>`
    : `<a href="/Account/Register">Register</a>
       <a href="/Account/Login">Login</a>`;

  return `<nav>
    <a class="brand" href="/">${APP_TITLE}</a>
    <a href="/">Home</a>
    <a href="/auth">Auth Required</a>
    <span class="spacer"></span>
    ${account}
  </nav>`;
}

export function renderLayout(input: LayoutInput): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(input.title)} - ${APP_TITLE}</title>
  <link rel="stylesheet" href="/app.css">
</head>
<body>
  ${nav(input.userName, input.antiforgeryField)}
  <main>
    ${statusMessage(input.statusMessage)}
    ${input.body}
  </main>
</body>
</html>`;
}
