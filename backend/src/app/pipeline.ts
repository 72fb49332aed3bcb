/**
 * src/app/pipeline.ts
 *
 * WHY:
 * - The HTTP pipeline is assembled in one place, in a fixed order, so the
 *   environment split (Development vs everything else) is visible at a glance.
 *
 * STAGES:
 * 1) Development: POST /ApplyDatabaseMigrations + developer error pages
 *    Otherwise: unexpected errors -> 302 /Error, HSTS
 * 2) HTTPS redirection
 * 3) Antiforgery
 * 4) Static assets (wwwroot/)
 * 5) Authentication state + pages
 * 6) Identity endpoints (/Account)
 * 7) GET /health
 *
 * RULES:
 * - Only routes and hooks here; services come from the provider.
 * - Returns the stage names it applied (logged as pipeline.assembled).
 */

import { fileURLToPath } from 'node:url';

import fastifyStatic from '@fastify/static';
import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import { type Environment, isDevelopment } from './environment';
import { registerRequestScope } from './request-scope';
import type { AppServiceProvider } from './services';
import { APPLY_MIGRATIONS_PATH } from '../components/diagnostics/database-error-page';
import { renderDeveloperExceptionPage } from '../components/diagnostics/developer-exception-page';
import { registerAuthenticationState, registerPageRoutes } from '../components/routes';
import { createIdentityModule } from '../modules/identity/identity.module';
import { applyMigrations } from '../shared/db/migrator';
import { registerAntiforgery } from '../shared/http/antiforgery';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerHsts } from '../shared/http/hsts';
import { registerHttpsRedirection } from '../shared/http/https-redirection';
import { withRequestContext } from '../shared/logger/with-context';

/** backend/wwwroot (this file lives in backend/src/app). */
export const WWWROOT_DIR = fileURLToPath(new URL('../../wwwroot/', import.meta.url));

export type PipelineStage =
  | 'migrations-endpoint'
  | 'developer-error-pages'
  | 'exception-handler'
  | 'hsts'
  | 'https-redirection'
  | 'antiforgery'
  | 'static-files'
  | 'authentication-state'
  | 'pages'
  | 'identity-endpoints'
  | 'health';

export async function assemblePipeline(
  app: FastifyInstance,
  opts: { provider: AppServiceProvider; config: AppConfig; environment: Environment },
): Promise<PipelineStage[]> {
  const { provider, config, environment } = opts;
  const logger = provider.get('logger');
  const stages: PipelineStage[] = [];

  registerRequestScope(app, provider);

  // 1) environment split
  if (isDevelopment(environment)) {
    registerMigrationsEndpoint(app, provider);
    stages.push('migrations-endpoint');

    registerErrorHandler(app, {
      mode: 'developer',
      renderDeveloperPage: async (err, req) => {
        const databasePage = provider.get('databaseErrorPage');
        return databasePage.matches(err)
          ? databasePage.render(err, req)
          : renderDeveloperExceptionPage(err, req);
      },
    });
    stages.push('developer-error-pages');
  } else {
    registerErrorHandler(app, { mode: 'redirect' });
    stages.push('exception-handler');

    registerHsts(app);
    stages.push('hsts');
  }

  // 2) HTTPS redirection
  registerHttpsRedirection(app, { httpsPort: config.httpsPort, logger });
  stages.push('https-redirection');

  // 3) antiforgery
  registerAntiforgery(app, provider.get('antiforgery'));
  stages.push('antiforgery');

  // 4) static assets
  await app.register(fastifyStatic, {
    root: WWWROOT_DIR,
    wildcard: false,
    index: false,
  });
  stages.push('static-files');

  // 5) authentication state + pages
  registerAuthenticationState(app);
  stages.push('authentication-state');

  const identity = createIdentityModule({
    services: (req) => ({
      userManager: req.services.get('userManager'),
      signInManager: req.services.get('signInManager'),
      userAccessor: req.services.get('userAccessor'),
      redirectManager: req.services.get('redirectManager'),
      emailSender: req.services.get('emailSender'),
      authenticatorTokenProvider: req.services.get('authenticatorTokenProvider'),
    }),
  });

  registerPageRoutes(app, { account: identity.account });
  stages.push('pages');

  // 6) identity endpoints
  identity.registerRoutes(app);
  stages.push('identity-endpoints');

  // 7) health (platform checks): no session or database lookups
  app.get('/health', { config: { antiforgery: false, authenticationState: false } }, (_req, reply) =>
    reply.status(200).type('application/json').send(JSON.stringify('Healthy')),
  );
  stages.push('health');

  logger.info('pipeline.assembled', { environment, stages });
  return stages;
}

function registerMigrationsEndpoint(app: FastifyInstance, provider: AppServiceProvider): void {
  // Posted by the database error page, which has no antiforgery token.
  app.post(APPLY_MIGRATIONS_PATH, { config: { antiforgery: false } }, async (req, reply) => {
    const log = withRequestContext(req);
    try {
      const applied = await applyMigrations(provider.get('migrator'), provider.get('logger'));
      log.info('migrations.endpoint_applied', { flow: 'dev.migrations', applied });
      return reply.status(204).send();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn('migrations.endpoint_failed', { flow: 'dev.migrations', message });
      return reply.status(400).send({ error: { code: 'BAD_REQUEST', message } });
    }
  });
}
