import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';

import { loadAppSettings } from '../../../src/app/app-settings';
import { Environment } from '../../../src/app/environment';
import { ConfigurationError } from '../../../src/app/startup-errors';

const fixture = (name: string) => fileURLToPath(new URL(`../../fixtures/${name}/`, import.meta.url));

describe('loadAppSettings', () => {
  it('lets appsettings.{Environment}.json override the base file', () => {
    expect(loadAppSettings(Environment.Development, fixture('env-override'))).toEqual({
      ConnectionStrings: {
        DefaultConnection: 'Host=dev-host;Database=dev_db;Username=dev;Password=dev-secret',
      },
      AllowedHosts: 'localhost',
    });
  });

  it('uses the base file when there is no environment file', () => {
    expect(loadAppSettings(Environment.Production, fixture('env-override'))).toEqual({
      ConnectionStrings: {
        DefaultConnection: 'Host=base-host;Database=base_db;Username=base;Password=base-secret',
      },
      AllowedHosts: '*',
    });
  });

  it('treats missing files as empty settings', () => {
    expect(loadAppSettings(Environment.Test, fixture('does-not-exist'))).toEqual({
      ConnectionStrings: {},
      AllowedHosts: '*',
    });
  });

  it('returns no connection strings when the file has none', () => {
    expect(loadAppSettings(Environment.Test, fixture('no-connection')).ConnectionStrings).toEqual({});
  });

  it('fails on a file that is not JSON', () => {
    expect(() => loadAppSettings(Environment.Test, fixture('invalid-json'))).toThrow(
      new ConfigurationError("Settings file 'appsettings.json' is not valid JSON."),
    );
  });
});
