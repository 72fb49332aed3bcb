/**
 * backend/src/components/diagnostics/developer-exception-page.ts
 *
 * WHY:
 * - In Development an unexpected error is shown in the browser (message, stack,
 *   request line) instead of the /Error redirect.
 *
 * RULES:
 * - Development only. Never registered for Test or Production.
 * - Standalone document: it must render even when the layout's dependencies are broken.
 */

import type { FastifyRequest } from 'fastify';

import { escapeHtml } from '../html';

export function renderDeveloperExceptionPage(err: Error, req: FastifyRequest): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Internal Server Error</title>
  <link rel="stylesheet" href="/app.css">
</head>
<body class="diagnostics">
  <h1>An unhandled exception occurred while processing the request.</h1>
  <h2>${escapeHtml(err.name)}: ${escapeHtml(err.message)}</h2>
  <p><code>${escapeHtml(req.method)} ${escapeHtml(req.url)}</code></p>
  <p><strong>Request ID:</strong> <code>${escapeHtml(req.requestContext?.requestId)}</code></p>
  <pre class="stack">${escapeHtml(err.stack)}</pre>
</body>
</html>`;
}
