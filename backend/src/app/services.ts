/**
 * src/app/services.ts
 *
 * WHY:
 * - Single dependency graph for the whole app, registered in a fixed order.
 * - Infra clients (db pool, redis) are created once, lazily, and disposed on shutdown.
 * - Tests replace() registrations (user store, cache, email sender, migrator)
 *   before the provider is built.
 *
 * ORDER:
 *   infrastructure (logger, config, cache, session store, antiforgery)
 *   1) page renderer
 *   2) cascading authentication state (scoped)
 *   3) user accessor, redirect manager (scoped)
 *   4) revalidating authentication state provider (scoped)
 *   5) authentication options, then identity cookie handlers
 *   6) database + migrator
 *   7) Development only: database error page
 *   8) identity core (hashers, token providers, store, UserManager, SignInManager)
 *   9) email sender (no-op)
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { type Environment, isDevelopment } from './environment';
import { parseConnectionString, toPoolConfig } from './connection-string';

import { DatabaseErrorPage } from '../components/diagnostics/database-error-page';
import { PageRenderer } from '../components/page-renderer';

import type { Cache } from '../shared/cache/cache';
import { InMemCache } from '../shared/cache/inmem-cache';
import { RedisCache } from '../shared/cache/redis-cache';
import { createDb, type Db } from '../shared/db/db';
import { createMigrator, type MigrationRunner } from '../shared/db/migrator';
import type { ServiceCollection, ServiceProvider } from '../shared/di/service-collection';
import type { EmailSender } from '../shared/email/email-sender';
import { NoOpEmailSender } from '../shared/email/noop-email-sender';
import { Antiforgery } from '../shared/http/antiforgery';
import type { HttpContext } from '../shared/http/http-context';
import { logger, type Logger } from '../shared/logger/logger';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { HmacSha256KeyedHasher, type KeyedHasher } from '../shared/security/keyed-hasher';
import type { PasswordHasher } from '../shared/security/password-hasher';
import { TotpService } from '../shared/security/totp';
import { SessionStore } from '../shared/session/session.store';

import {
  AuthenticationBuilder,
  type AuthenticationOptions,
  type AuthenticationService,
} from '../modules/identity/auth/authentication';
import { CascadingAuthenticationState } from '../modules/identity/auth/cascading-auth-state';
import { IdentitySchemes } from '../modules/identity/auth/identity-constants';
import { RedirectManager } from '../modules/identity/auth/redirect-manager';
import { RevalidatingAuthenticationStateProvider } from '../modules/identity/auth/revalidating-auth-state-provider';
import { UserAccessor } from '../modules/identity/auth/user-accessor';
import { KyselyUserStore } from '../modules/identity/dal/kysely-user-store';
import type { UserStore } from '../modules/identity/dal/user-store';
import { createIdentityOptions, type IdentityOptions } from '../modules/identity/identity.options';
import { SignInManager } from '../modules/identity/sign-in-manager';
import { AuthenticatorTokenProvider } from '../modules/identity/tokens/authenticator-token-provider';
import { DataProtectorTokenProvider } from '../modules/identity/tokens/data-protector-token-provider';
import { UserManager } from '../modules/identity/user-manager';

export type AppServices = {
  // infrastructure
  logger: Logger;
  config: AppConfig;
  cache: Cache;
  sessionStore: SessionStore;
  antiforgery: Antiforgery;

  // 1
  pageRenderer: PageRenderer;
  // 2-4 (scoped)
  authenticationState: CascadingAuthenticationState;
  userAccessor: UserAccessor;
  redirectManager: RedirectManager;
  authenticationStateProvider: RevalidatingAuthenticationStateProvider;
  // 5
  authenticationOptions: AuthenticationOptions;
  authentication: AuthenticationService;
  // 6
  db: Db;
  migrator: MigrationRunner;
  // 7
  databaseErrorPage: DatabaseErrorPage;
  // 8
  passwordHasher: PasswordHasher;
  keyedHasher: KeyedHasher;
  tokenProvider: DataProtectorTokenProvider;
  authenticatorTokenProvider: AuthenticatorTokenProvider;
  identityOptions: IdentityOptions;
  userStore: UserStore;
  userManager: UserManager;
  signInManager: SignInManager;
  // 9
  emailSender: EmailSender;
};

export type AppServiceCollection = ServiceCollection<AppServices, HttpContext>;
export type AppServiceProvider = ServiceProvider<AppServices, HttpContext>;

export function registerServices(
  services: AppServiceCollection,
  opts: { config: AppConfig; connectionString: string; environment: Environment },
): AppServiceCollection {
  const { config, connectionString, environment } = opts;

  // ── infrastructure ─────────────────────────────────────────
  services
    .addSingleton('logger', () => logger)
    .addSingleton('config', () => config)
    .addSingleton('cache', () => (config.redisUrl ? new RedisCache(config.redisUrl) : new InMemCache()), {
      dispose: (cache) => cache.close(),
    })
    .addSingleton('sessionStore', (sp) => new SessionStore(sp.get('cache')))
    .addSingleton('antiforgery', (sp) => new Antiforgery(sp.get('keyedHasher'), config.isProduction));

  // 1) pages
  services.addSingleton('pageRenderer', (sp) => new PageRenderer(sp.get('antiforgery')));

  // 2-4) per-request authentication state
  services
    .addScoped('authenticationState', (sp) => new CascadingAuthenticationState(sp.get('authenticationStateProvider')))
    .addScoped('userAccessor', (sp) => new UserAccessor(sp.get('authenticationState'), sp.get('userManager')))
    .addScoped('redirectManager', (_sp, ctx) => new RedirectManager(ctx, config.isProduction))
    .addScoped(
      'authenticationStateProvider',
      (sp, ctx) =>
        new RevalidatingAuthenticationStateProvider(ctx, {
          authentication: sp.get('authentication'),
          userManager: sp.get('userManager'),
          sessions: sp.get('sessionStore'),
          logger: sp.get('logger'),
          revalidationIntervalMs: config.securityStampRevalidationMinutes * 60_000,
        }),
    );

  // 5) authentication: options first, then the identity cookies
  services
    .addSingleton('authenticationOptions', () => ({
      defaultScheme: IdentitySchemes.application,
      defaultSignInScheme: IdentitySchemes.external,
    }))
    .addSingleton('authentication', (sp) =>
      new AuthenticationBuilder(sp.get('authenticationOptions'))
        .addIdentityCookies({ secure: config.isProduction })
        .build(sp.get('sessionStore')),
    );

  // 6) database (pg.Pool connects lazily)
  services
    .addSingleton('db', () => createDb(toPoolConfig(parseConnectionString(connectionString))), {
      dispose: (db) => db.destroy(),
    })
    .addSingleton('migrator', (sp) => createMigrator(sp.get('db')));

  // 7) Development only
  if (isDevelopment(environment)) {
    services.addSingleton('databaseErrorPage', (sp) => new DatabaseErrorPage(sp.get('migrator'), sp.get('logger')));
  }

  // 8) identity core
  services
    .addSingleton('passwordHasher', () => new BcryptPasswordHasher({ cost: config.bcryptCost }))
    .addSingleton('keyedHasher', () => new HmacSha256KeyedHasher(config.tokenSigningKey))
    .addSingleton('identityOptions', () => createIdentityOptions({ signIn: { requireConfirmedAccount: true } }))
    .addSingleton(
      'tokenProvider',
      (sp) =>
        new DataProtectorTokenProvider(
          sp.get('keyedHasher'),
          sp.get('identityOptions').tokens.dataProtectionTokenLifespanMs,
        ),
    )
    .addSingleton(
      'authenticatorTokenProvider',
      () => new AuthenticatorTokenProvider(new TotpService(config.authenticatorIssuer)),
    )
    .addSingleton('userStore', (sp) => new KyselyUserStore(sp.get('db')))
    .addSingleton(
      'userManager',
      (sp) =>
        new UserManager({
          store: sp.get('userStore'),
          passwordHasher: sp.get('passwordHasher'),
          keyedHasher: sp.get('keyedHasher'),
          tokenProvider: sp.get('tokenProvider'),
          authenticatorTokenProvider: sp.get('authenticatorTokenProvider'),
          options: sp.get('identityOptions'),
          logger: sp.get('logger'),
        }),
    )
    .addSingleton(
      'signInManager',
      (sp) =>
        new SignInManager({
          userManager: sp.get('userManager'),
          authentication: sp.get('authentication'),
          logger: sp.get('logger'),
        }),
    );

  // 9) email: nothing is sent until a real sender replaces this one
  services.addSingleton('emailSender', (sp) => new NoOpEmailSender(sp.get('logger')));

  return services;
}
