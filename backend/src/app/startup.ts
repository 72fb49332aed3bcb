/**
 * src/app/startup.ts
 *
 * WHY:
 * - Process startup is a short state machine; every phase is logged and any
 *   failure ends in Terminated with the original error rethrown.
 *
 *   Starting -> ResolvingConfig -> RegisteringServices -> AssemblingPipeline
 *            -> Migrating -> Serving
 *
 * RULES:
 * - The connection string is resolved before any service is registered.
 * - The listener is bound only after migrations succeed; Serving is entered
 *   once it is bound, so a bind failure is reported from Migrating.
 * - Tests inject `listen` and `configure` (replace infrastructure registrations).
 */

import type { FastifyInstance } from 'fastify';

import { DEFAULT_APP_SETTINGS_DIR, loadAppSettings } from './app-settings';
import { type AppConfig, buildConfig } from './config';
import { parseConnectionString, describeConnection, resolveConnectionString } from './connection-string';
import { assemblePipeline, type PipelineStage } from './pipeline';
import { buildServer } from './server';
import {
  type AppServiceCollection,
  type AppServiceProvider,
  type AppServices,
  registerServices,
} from './services';
import { ServiceCollection } from '../shared/di/service-collection';
import type { HttpContext } from '../shared/http/http-context';
import { applyMigrations } from '../shared/db/migrator';
import { logger } from '../shared/logger/logger';

export const StartupPhase = {
  Starting: 'Starting',
  ResolvingConfig: 'ResolvingConfig',
  RegisteringServices: 'RegisteringServices',
  AssemblingPipeline: 'AssemblingPipeline',
  Migrating: 'Migrating',
  Serving: 'Serving',
  Terminated: 'Terminated',
} as const;

export type StartupPhase = (typeof StartupPhase)[keyof typeof StartupPhase];

export type ListenAddress = { host: string; port: number };

export type StartupOptions = {
  env?: NodeJS.ProcessEnv;
  appSettingsDir?: string;
  /** Runs after registerServices() and before the provider is built. */
  configure?: (services: AppServiceCollection) => void;
  onPhase?: (phase: StartupPhase) => void;
  listen?: (app: FastifyInstance, address: ListenAddress) => Promise<unknown>;
};

export type RunningApplication = {
  app: FastifyInstance;
  provider: AppServiceProvider;
  config: AppConfig;
  stages: PipelineStage[];
  close: () => Promise<void>;
};

export const LISTEN_HOST = '0.0.0.0';

/**
 * Applies pending migrations before the listener is bound.
 * The migrator is a singleton, so it is resolved from the root provider.
 * Skipped (logged) when MIGRATE_ON_STARTUP=false. Any failure is a MigrationError.
 */
export async function runStartupMigrations(provider: AppServiceProvider, config: AppConfig): Promise<string[]> {
  if (!config.migrateOnStartup) {
    logger.info('migrations.skipped', { reason: 'MIGRATE_ON_STARTUP=false' });
    return [];
  }

  const applied = await applyMigrations(provider.get('migrator'), provider.get('logger'));
  logger.info('migrations.up_to_date', { applied: applied.length });
  return applied;
}

export async function startApplication(opts: StartupOptions = {}): Promise<RunningApplication> {
  let phase: StartupPhase = StartupPhase.Starting;
  const enter = (next: StartupPhase) => {
    phase = next;
    logger.info('startup.phase', { phase });
    opts.onPhase?.(phase);
  };

  let app: FastifyInstance | null = null;
  let provider: AppServiceProvider | null = null;

  const close = async () => {
    if (app) await app.close();
    if (provider) await provider.dispose();
  };

  enter(StartupPhase.Starting);
  try {
    enter(StartupPhase.ResolvingConfig);
    const config = buildConfig(opts.env ?? process.env);
    const appSettings = loadAppSettings(config.environment, opts.appSettingsDir ?? DEFAULT_APP_SETTINGS_DIR);
    const { connectionString, source } = resolveConnectionString({ databaseUrl: config.databaseUrl, appSettings });
    logger.info('startup.connection_resolved', {
      source,
      ...describeConnection(parseConnectionString(connectionString)),
    });

    enter(StartupPhase.RegisteringServices);
    const services = new ServiceCollection<AppServices, HttpContext>();
    registerServices(services, { config, connectionString, environment: config.environment });
    opts.configure?.(services);
    provider = services.build();

    enter(StartupPhase.AssemblingPipeline);
    app = await buildServer({ config });
    const stages = await assemblePipeline(app, { provider, config, environment: config.environment });
    await app.ready();

    enter(StartupPhase.Migrating);
    await runStartupMigrations(provider, config);

    const address: ListenAddress = { host: LISTEN_HOST, port: Number(config.port) };
    const listen = opts.listen ?? ((server: FastifyInstance, addr: ListenAddress) => server.listen(addr));
    await listen(app, address);
    enter(StartupPhase.Serving);
    logger.info('server.listening', { ...address, environment: config.environment, service: config.serviceName });

    return { app, provider, config, stages, close };
  } catch (err) {
    const failedIn = phase;
    enter(StartupPhase.Terminated);
    logger.error('startup.failed', { phase: failedIn, err });
    try {
      await close();
    } catch (cleanupErr) {
      logger.error('startup.cleanup_failed', { err: cleanupErr });
    }
    throw err;
  }
}
