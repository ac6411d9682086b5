/**
 * Server entrypoint
 *
 * Run: npx tsx backend/src/server.ts
 */

import 'dotenv/config';
import { loadEnv } from './config/env.js';
import { buildApp } from './app.js';

async function main(): Promise<void> {
  const env = loadEnv();
  const app = buildApp({ env });

  const shutdown = async (signal: string) => {
    app.log.info(`[Server] Received ${signal}, shutting down...`);
    await app.close();
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      });
    });
  }

  await app.listen({ port: env.PORT, host: env.HOST });
  app.log.info(
    { outputsDir: env.outputsDir, dataDir: env.dataDir },
    `[Server] Sales insights API listening on ${env.HOST}:${env.PORT}`
  );
}

main().catch((err) => {
  console.error('[Server] Fatal error:', err);
  process.exit(1);
});
