/**
 * backend/src/components/html.ts
 *
 * Pages are plain template strings. Every value that did not come from this
 * codebase goes through escapeHtml() before it is interpolated.
 */

export function escapeHtml(str: string | number | undefined | null): string {
  if (str === undefined || str === null) return '';
  return String(str)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/** Same-page query string, escaped for an href attribute. */
export function hrefWithQuery(path: string, query: Record<string, string | undefined>): string {
  const params = new URLSearchParams();
  for (const [k, v] of Object.entries(query)) {
    if (v !== undefined && v !== '') params.set(k, v);
  }
  const qs = params.toString();
  return escapeHtml(qs ? `${path}?${qs}` : path);
}
