// This is the process entrypoint that loads configuration, starts the HTTP server, and handles graceful shutdown.

import pino from 'pino';
import { loadConfig, type AppConfig } from './config/config.js';
import { createServer } from './server.js';
import { errorForLog, sanitizeForLog } from './utils/logger.js';
import { AppError } from './utils/errors.js';

let config: AppConfig;
try {
  config = loadConfig();
} catch (error) {
  // The Fastify logger does not exist yet, so startup failures go through a bare pino instance.
  pino().fatal(
    {
      event: 'config_load_failed',
      details: error instanceof AppError ? sanitizeForLog(error.details) : undefined,
      error: errorForLog(error)
    },
    'config_load_failed'
  );
  process.exit(1);
}

const { app } = createServer(config);

async function shutdown(signal: string): Promise<void> {
  app.log.info({ event: 'shutdown_started', signal }, 'shutdown_started');

  try {
    await app.close();
  } catch (error) {
    app.log.error({ event: 'shutdown_failed', signal, error: errorForLog(error) }, 'shutdown_failed');
    process.exit(1);
  }

  app.log.info({ event: 'shutdown_completed', signal }, 'shutdown_completed');
  process.exit(0);
}

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

app
  .listen({ host: config.host, port: config.port })
  .then(() => {
    app.log.info(
      {
        event: 'server_started',
        host: config.host,
        port: config.port,
        odooUrl: config.odoo.url,
        odooDatabase: config.odoo.database,
        responseDelivery: config.responseDelivery
      },
      'server_started'
    );
  })
  .catch((error: unknown) => {
    app.log.error({ event: 'server_start_failed', error: errorForLog(error) }, 'server_start_failed');
    process.exit(1);
  });
