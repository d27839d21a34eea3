import { buildApp } from './app';
import { config } from './config/env';
import { initSentry } from './config/sentry';
import { closeDatabase } from './infrastructure/database';

// Initialize Sentry before anything else
initSentry();

const start = async () => {
  const app = buildApp();

  let isShuttingDown = false;

  const handleShutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;

    app.log.info(`Received ${signal}, starting graceful shutdown...`);

    const timeout = setTimeout(() => {
      app.log.error('Force shutdown due to timeout');
      process.exit(1);
    }, 10000);

    try {
      await app.close();
      closeDatabase();
      clearTimeout(timeout);
      app.log.info('Graceful shutdown complete');
      process.exit(0);
    } catch (err) {
      app.log.error(err, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void handleShutdown('SIGINT'));
  process.on('SIGTERM', () => void handleShutdown('SIGTERM'));

  try {
    await app.listen({ port: config.PORT, host: '0.0.0.0' });
    app.log.info(
      { databasePath: config.DATABASE_PATH, portalHost: config.PORTAL_HOST, fetchTimeoutMs: config.FETCH_TIMEOUT_MS },
      'Invoice pipeline ready'
    );
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
};

void start();
