/**
 * Server Startup
 *
 * - Database connection test
 * - Schema migrations
 * - Concept catalog preload
 * - Server startup
 * - Graceful shutdown
 */

import app from './app';
import { config } from './config/environment';
import { db } from './config/database';
import { logger } from './config/logger';
import { runStartupMigrations } from './config/migrations';
import { fetchBiomedicalConcepts } from './services/concepts/concept-catalog.service';

const PORT = config.server.port || 3000;
const HOST = '0.0.0.0';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

async function testDatabaseConnection(): Promise<boolean> {
  try {
    const result = await db.query<{ current_time: Date }>('SELECT NOW() as current_time');
    logger.info('Database connection successful', { time: result.rows[0].current_time });
    return true;
  } catch (error) {
    logger.error('Database connection failed', {
      error: errorMessage(error),
      host: config.database.host,
      database: config.database.database
    });
    return false;
  }
}

/**
 * Warm the concept catalog cache. A failure only means the first lookup
 * fetches again.
 */
async function preloadConcepts(): Promise<void> {
  try {
    const concepts = await fetchBiomedicalConcepts();
    logger.info('Concept catalog preloaded', { count: concepts.length });
  } catch (error) {
    logger.warn('Concept catalog preload failed', { error: errorMessage(error) });
  }
}

async function startServer(): Promise<void> {
  logger.info('Starting SoA versioning server...');

  const dbConnected = await testDatabaseConnection();
  if (!dbConnected) {
    logger.error('Cannot start server: Database connection failed');
    process.exit(1);
  }

  await runStartupMigrations(db);
  await preloadConcepts();

  const server = app.listen(PORT, HOST, () => {
    logger.info('SoA versioning API started', {
      port: PORT,
      host: HOST,
      environment: config.server.env,
      nodeVersion: process.version
    });
  });

  const gracefulShutdown = (signal: string) => {
    logger.info(`${signal} received, starting graceful shutdown...`);

    server.close(() => {
      logger.info('HTTP server closed');
      db.close()
        .then(() => {
          logger.info('Graceful shutdown completed');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error: errorMessage(error) });
          process.exit(1);
        });
    });

    // Force shutdown after 30 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 30000).unref();
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled rejection', { reason: errorMessage(reason) });
    process.exit(1);
  });
}

startServer().catch((error: unknown) => {
  logger.error('Server startup failed', {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined
  });
  process.exit(1);
});
