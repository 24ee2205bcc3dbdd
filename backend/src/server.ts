/**
 * Indicators backend entry point
 */

import { env } from './config/env.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const app = buildApp();

  const shutdown = async (signal: string): Promise<void> => {
    app.log.info({ signal }, 'Shutting down');
    await app.close();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info({ dataDir: env.DATA_DIR }, `Indicators backend listening on ${env.HOST}:${env.PORT}`);
}

main().catch((err: unknown) => {
  console.error('[Indicators] Fatal error:', err);
  process.exit(1);
});
