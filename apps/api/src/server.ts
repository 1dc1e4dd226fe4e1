import { buildApp, createDeps } from './app.js';
import { closePool, getPool } from '@trackfold/adapters';

async function main() {
  const deps = createDeps();

  if (deps.config.trackStore === 'postgres') {
    await getPool(deps.config.database).query('SELECT 1');
    console.log('[server] database connected');
  } else {
    console.log('[server] using in-memory track store');
  }

  const app = buildApp(deps);
  const httpServer = app.listen(deps.config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${deps.config.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
