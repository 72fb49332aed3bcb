/**
 * backend/src/components/pages/site-pages.ts
 *
 * Home, the sign-in-required sample page, the error page and the 404 page.
 */

import { escapeHtml } from '../html';
import type { PageView } from '../page-renderer';

export function homePage(): PageView {
  return {
    title: 'Home',
    body: () => `<h1>Hello, world!</h1>
<p>Welcome to your new app.</p>`,
  };
}

export function authPage(userName: string): PageView {
  return {
    title: 'Auth',
    body: () => `<h1>You are authenticated</h1>
<p>Hello ${escapeHtml(userName)}!</p>`,
  };
}

export function errorPage(requestId: string): PageView {
  return {
    title: 'Error',
    body: () => `<h1 class="text-danger">Error.</h1>
<h2 class="text-danger">An error occurred while processing your request.</h2>
<p><strong>Request ID:</strong> <code>${escapeHtml(requestId)}</code></p>
<h3>Development Mode</h3>
<p>
  Swapping to the <strong>Development</strong> environment displays detailed information about the error that occurred.
</p>
<p>
  <strong>The Development environment shouldn't be enabled for deployed applications.</strong>
  For local debugging, set <code>NODE_ENV=development</code> and restart the app.
</p>`,
  };
}

export function notFoundPage(): PageView {
  return {
    title: 'Not found',
    status: 404,
    body: () => `<h1>Not Found</h1>
<p>Sorry, there's nothing at this address.</p>`,
  };
}
