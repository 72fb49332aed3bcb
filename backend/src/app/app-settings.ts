/**
 * backend/src/app/app-settings.ts
 *
 * WHY:
 * - Static configuration that belongs to the repo, not to the platform:
 *   the local DefaultConnection and a few hosting switches.
 * - appsettings.json holds the defaults, appsettings.{Environment}.json overrides them.
 *
 * HOW TO USE:
 * - const settings = loadAppSettings(Environment.Development)
 * - Tests pass their own directory (test/fixtures/...).
 *
 * RULES:
 * - Read once at startup (synchronous fs); never per request.
 * - A missing file is fine. An unreadable or invalid one is a ConfigurationError.
 */

import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import type { Environment } from './environment';
import { ConfigurationError } from './startup-errors';

/** backend/ (this file lives in backend/src/app). */
export const DEFAULT_APP_SETTINGS_DIR = fileURLToPath(new URL('../../', import.meta.url));

const AppSettingsFileSchema = z.object({
  ConnectionStrings: z.record(z.string()).optional(),
  AllowedHosts: z.string().optional(),
  Logging: z
    .object({
      LogLevel: z.record(z.string()).optional(),
    })
    .optional(),
});

type AppSettingsFile = z.infer<typeof AppSettingsFileSchema>;

export type AppSettings = {
  ConnectionStrings: Record<string, string>;
  AllowedHosts: string;
};

function readSettingsFile(filePath: string): AppSettingsFile {
  if (!existsSync(filePath)) return {};

  let json: unknown;
  try {
    json = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Settings file '${path.basename(filePath)}' is not valid JSON.`, {
      cause: err,
    });
  }

  const parsed = AppSettingsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Settings file '${path.basename(filePath)}' is invalid.`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

export function loadAppSettings(
  environment: Environment,
  dir: string = DEFAULT_APP_SETTINGS_DIR,
): AppSettings {
  const base = readSettingsFile(path.join(dir, 'appsettings.json'));
  const overrides = readSettingsFile(path.join(dir, `appsettings.${environment}.json`));

  return {
    ConnectionStrings: { ...base.ConnectionStrings, ...overrides.ConnectionStrings },
    AllowedHosts: overrides.AllowedHosts ?? base.AllowedHosts ?? '*',
  };
}
