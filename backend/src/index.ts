/**
 * backend/src/index.ts
 *
 * WHY:
 * - Single entrypoint for the backend application.
 * - Keeps startup logic small: startApplication() runs the phases; this file
 *   only owns process concerns (exit codes, signals).
 */

import { startApplication } from './app/startup';
import { logger } from './shared/logger/logger';

async function main(): Promise<void> {
  const running = await startApplication();

  const shutdown = async (signal: string) => {
    logger.info('server.shutdown', { signal });
    await running.close();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

void main().catch((err: unknown) => {
  logger.error('server.fatal_startup_error', { err });
  process.exit(1);
});
