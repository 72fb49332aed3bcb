/**
 * backend/src/shared/http/cookies.ts
 *
 * WHY:
 * - Identity cookies, the antiforgery cookie and the status-message cookie all
 *   need the same parsing and the same Set-Cookie construction.
 *
 * RULES:
 * - No business logic here.
 * - Values are URI-encoded on write and decoded on read.
 */

export type SameSite = 'Strict' | 'Lax';

export type CookieOptions = {
  httpOnly: boolean;
  sameSite: SameSite;
  secure: boolean;
  path?: string;
  /** Omit for a browser-session cookie. 0 deletes the cookie. */
  maxAgeSeconds?: number;
};

/**
 * Parses a raw Cookie header into key-value pairs.
 * Handles the standard format: "key1=value1; key2=value2"
 */
export function parseCookies(raw: string | undefined): Record<string, string> {
  if (!raw) return {};

  const cookies: Record<string, string> = {};
  for (const pair of raw.split(';')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) continue;

    const key = pair.substring(0, eqIdx).trim();
    const value = pair.substring(eqIdx + 1).trim();
    if (key) cookies[key] = safeDecode(value);
  }
  return cookies;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Not URI-encoded by us; hand back the raw value.
    return value;
  }
}

export function serializeCookie(name: string, value: string, opts: CookieOptions): string {
  const parts = [`${name}=${encodeURIComponent(value)}`, `Path=${opts.path ?? '/'}`];

  if (opts.maxAgeSeconds !== undefined) parts.push(`Max-Age=${opts.maxAgeSeconds}`);
  if (opts.httpOnly) parts.push('HttpOnly');
  parts.push(`SameSite=${opts.sameSite}`);
  if (opts.secure) parts.push('Secure');

  return parts.join('; ');
}
