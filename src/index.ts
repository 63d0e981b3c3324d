import 'reflect-metadata';
import { serve } from '@hono/node-server';
import { config, logger, validateConfig } from './config';
import { createApp } from './app';
import { createContainer } from './container';
import { AppDataSource, closeDatabase, initializeDatabase } from './database';

async function main() {
  try {
    validateConfig();

    logger.info('Initializing database connection...');
    await initializeDatabase();

    const container = createContainer(AppDataSource, config);
    const app = createApp(container);
    const port = config.port;

    const server = serve({ fetch: app.fetch, port });

    logger.info({ port, env: config.nodeEnv }, `Agent team server running at http://localhost:${port}`);

    const shutdown = async () => {
      logger.info('Shutting down gracefully...');
      container.teams.clear();
      server.close();
      await closeDatabase();
      process.exit(0);
    };

    const onSignal = () => {
      shutdown().catch((error: unknown) => {
        logger.error(error, 'Error during shutdown');
        process.exit(1);
      });
    };
    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
  } catch (error) {
    logger.error(error, 'Fatal error starting server');
    process.exit(1);
  }
}

void main();
