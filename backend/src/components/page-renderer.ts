/**
 * backend/src/components/page-renderer.ts
 *
 * WHY:
 * - Pages describe their title and body; the renderer wraps them in the layout
 *   with the signed-in user, the status message and a fresh antiforgery field.
 *
 * HOW TO USE:
 * - renderer.render({ request, reply }, loginPage({ returnUrl }), statusMessage)
 */

import type { FastifyReply } from 'fastify';

import type { Antiforgery } from '../shared/http/antiforgery';
import type { HttpContext } from '../shared/http/http-context';
import { escapeHtml } from './html';
import { renderLayout } from './layout';

export type PageView = {
  title: string;
  status?: number;
  /** Receives the hidden antiforgery input for the page's forms. */
  body: (antiforgeryField: string) => string;
};

export class PageRenderer {
  constructor(private readonly antiforgery: Antiforgery) {}

  render(ctx: HttpContext, view: PageView, statusMessage: string | null = null): FastifyReply {
    const tokens = this.antiforgery.getAndStoreTokens(ctx);
    const antiforgeryField = `<input type="hidden" name="${tokens.formFieldName}" value="${escapeHtml(tokens.requestToken)}">`;

    const state = ctx.request.authState;
    const html = renderLayout({
      title: view.title,
      body: view.body(antiforgeryField),
      userName: state?.isAuthenticated ? state.user.userName : null,
      statusMessage,
      antiforgeryField,
    });

    return ctx.reply
      .status(view.status ?? 200)
      .header('Cache-Control', 'no-store')
      .type('text/html; charset=utf-8')
      .send(html);
  }
}
