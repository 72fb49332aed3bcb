/**
 * backend/src/app/environment.ts
 *
 * WHY:
 * - Service registration and pipeline assembly branch on the hosting environment.
 *   Passing an explicit value keeps those branches testable without touching process.env.
 *
 * RULES:
 * - Only Development selects the development branch. Test behaves like Production
 *   in the pipeline (error redirect, HSTS) so e2e tests see production behavior.
 */

import type { NodeEnv } from './config';

export const Environment = {
  Development: 'Development',
  Test: 'Test',
  Production: 'Production',
} as const;

export type Environment = (typeof Environment)[keyof typeof Environment];

export function environmentFromNodeEnv(nodeEnv: NodeEnv): Environment {
  switch (nodeEnv) {
    case 'development':
      return Environment.Development;
    case 'test':
      return Environment.Test;
    case 'production':
      return Environment.Production;
  }
}

export function isDevelopment(env: Environment): boolean {
  return env === Environment.Development;
}
