import 'dotenv/config';
import { createServer } from 'http';
import { PgReadingConnectionFactory } from '@weather-station/adapters';
import { buildApp } from './app.js';
import { loadStationConfig } from './config/station.config.js';
import { initStationContext, shutdownStationContext } from './context.js';

async function main() {
  const config = loadStationConfig();
  const factory = new PgReadingConnectionFactory({
    connectionTimeoutMillis: config.acquireTimeoutMs,
    ...(config.databaseUrl ? { connectionString: config.databaseUrl } : {}),
  });

  const ctx = await initStationContext(config, factory);
  console.log('[server] database connected');

  const httpServer = createServer(buildApp(ctx));
  httpServer.listen(config.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${config.port}`);
  });

  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    console.log('[server] shutting down...');
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
    await shutdownStationContext(ctx);
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] error during shutdown', err);
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
