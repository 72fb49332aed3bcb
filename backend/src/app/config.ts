/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv (it sets NODE_ENV=development).
 * - On the hosting platform, DATABASE_URL_POSTGRESQL and PORT are injected (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Invalid values ('prod', 'staging') are caught at startup by Zod rather than
 *   silently falling through to the wrong branch.
 * - Boolean flags accept true/false/1/0 only. z.coerce.boolean() would read
 *   "false" as true.
 */

import 'dotenv/config';
import { z } from 'zod';

import { type Environment, environmentFromNodeEnv } from './environment';

// Unset NODE_ENV is production; development must be asked for.
const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('production');

const BooleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const OptionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const DEV_TOKEN_SIGNING_KEY = 'dev-only-token-signing-key-change-me-0000';

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,

    // Platform contract: PORT is a string; the listener binds 0.0.0.0:PORT.
    PORT: z
      .string()
      .regex(/^\d+$/, 'PORT must be a number')
      .default('8080'),
    DATABASE_URL_POSTGRESQL: OptionalString,

    // Sessions live in memory when REDIS_URL is absent (single instance only).
    REDIS_URL: OptionalString,

    // Logging / service identity
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    SERVICE_NAME: z.string().default('identity-starter'),

    BCRYPT_COST: z.coerce.number().int().min(4).max(15).default(12),

    // Signs data-protection tokens, antiforgery tokens and recovery code hashes.
    TOKEN_SIGNING_KEY: z.string().min(32).optional(),

    // HTTPS redirection target; unset means "no known HTTPS port".
    HTTPS_PORT: z.coerce.number().int().min(1).max(65535).optional(),
    TRUST_PROXY: BooleanFlag.default('false'),

    MIGRATE_ON_STARTUP: BooleanFlag.default('true'),
    SECURITY_STAMP_REVALIDATION_MINUTES: z.coerce.number().positive().default(30),

    AUTHENTICATOR_ISSUER: z.string().min(1).default('IdentityStarter'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV === 'production' && !env.TOKEN_SIGNING_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TOKEN_SIGNING_KEY'],
        message: 'TOKEN_SIGNING_KEY is required in production',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  environment: Environment;
  isProduction: boolean;

  port: string;
  databaseUrl: string | undefined;
  redisUrl: string | undefined;

  logLevel: string;
  serviceName: string;

  bcryptCost: number;
  tokenSigningKey: string;

  httpsPort: number | undefined;
  trustProxy: boolean;

  migrateOnStartup: boolean;
  securityStampRevalidationMinutes: number;

  authenticatorIssuer: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    environment: environmentFromNodeEnv(parsed.NODE_ENV),
    isProduction: parsed.NODE_ENV === 'production',

    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL_POSTGRESQL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    bcryptCost: parsed.BCRYPT_COST,
    tokenSigningKey: parsed.TOKEN_SIGNING_KEY ?? DEV_TOKEN_SIGNING_KEY,

    httpsPort: parsed.HTTPS_PORT,
    trustProxy: parsed.TRUST_PROXY,

    migrateOnStartup: parsed.MIGRATE_ON_STARTUP,
    securityStampRevalidationMinutes: parsed.SECURITY_STAMP_REVALIDATION_MINUTES,

    authenticatorIssuer: parsed.AUTHENTICATOR_ISSUER,
  };
}
