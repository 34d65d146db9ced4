import 'dotenv/config';
import { serve } from '@hono/node-server';
import { app } from './app';
import { validateConfig } from './config/validate';
import { closeDb } from './db';
import { initializeReleaseSyncJobs, shutdownReleaseSyncJobs } from './jobs/releaseSyncWorker';
import { closeRedisConnections } from './services/redis';

const config = validateConfig();

const port = config.API_PORT;

console.log(`svn-buddy-updater API starting on port ${port}...`);

const server = serve({
  fetch: app.fetch,
  port
});

console.log(`svn-buddy-updater API running at http://localhost:${port}`);

initializeReleaseSyncJobs().catch((err) => {
  console.error('[CRITICAL] Release sync worker failed to initialize:', err);
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  console.log(`${signal} received, shutting down...`);

  server.close();

  try {
    await shutdownReleaseSyncJobs();
    await closeRedisConnections();
    await closeDb();
    process.exit(0);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    void shutdown(signal);
  });
}
