/**
 * src/modules/identity/auth/redirect-manager.ts
 *
 * WHY:
 * - Form posts end in a redirect, often with a one-shot status message
 *   ("Your password has been changed.") for the next page to display.
 *
 * RULES:
 * - Only local paths are redirect targets; anything else becomes "/" (no open redirects).
 * - The status message cookie lives 5 seconds and is cleared when read.
 */

import { parseCookies, serializeCookie } from '../../../shared/http/cookies';
import type { HttpContext } from '../../../shared/http/http-context';
import { STATUS_MESSAGE_COOKIE } from './identity-constants';

const STATUS_MESSAGE_MAX_AGE_SECONDS = 5;

export function isLocalUrl(url: string | undefined | null): url is string {
  if (!url || !url.startsWith('/')) return false;
  // "//evil.example" and "/\evil.example" are protocol-relative in browsers
  return url.length === 1 || (url[1] !== '/' && url[1] !== '\\');
}

export function toLocalUrl(url: string | undefined | null): string {
  return isLocalUrl(url) ? url : '/';
}

export class RedirectManager {
  constructor(
    private readonly ctx: HttpContext,
    private readonly secure: boolean,
  ) {}

  redirectTo(url: string | undefined | null, query: Record<string, string> = {}) {
    const target = toLocalUrl(url);
    const qs = new URLSearchParams(query).toString();
    const location = qs ? `${target}${target.includes('?') ? '&' : '?'}${qs}` : target;
    return this.ctx.reply.redirect(location);
  }

  redirectToWithStatus(url: string | undefined | null, message: string) {
    this.ctx.reply.header(
      'Set-Cookie',
      serializeCookie(STATUS_MESSAGE_COOKIE, message, {
        httpOnly: true,
        sameSite: 'Strict',
        secure: this.secure,
        maxAgeSeconds: STATUS_MESSAGE_MAX_AGE_SECONDS,
      }),
    );
    return this.redirectTo(url);
  }

  redirectToCurrentPageWithStatus(message: string) {
    return this.redirectToWithStatus(this.ctx.request.url.split('?')[0], message);
  }

  /** Reads and clears the status message left by the previous redirect. */
  consumeStatusMessage(): string | null {
    const message = parseCookies(this.ctx.request.headers.cookie)[STATUS_MESSAGE_COOKIE];
    if (!message) return null;

    this.ctx.reply.header(
      'Set-Cookie',
      serializeCookie(STATUS_MESSAGE_COOKIE, '', {
        httpOnly: true,
        sameSite: 'Strict',
        secure: this.secure,
        maxAgeSeconds: 0,
      }),
    );
    return message;
  }
}
