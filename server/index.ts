import { createApp } from "./app";
import { config, validateConfig } from "./config";
import { checkDatabaseConnection, closeDatabase } from "./db";
import { logger } from "./services/logger";

async function main(): Promise<void> {
  if (!validateConfig()) {
    logger.error('startup', 'Configuration validation failed. Exiting...');
    process.exit(1);
  }

  // The summary works without a database; only persistence is skipped
  if (config.database.url) {
    const dbConnected = await checkDatabaseConnection();
    if (dbConnected) {
      logger.info('startup', 'Database connection verified');
    } else {
      logger.warn('startup', 'Database connection failed; summaries will not be persisted');
    }
  }

  const { server } = createApp();
  const port = config.PORT;

  server.listen(port, "0.0.0.0", () => {
    logger.info('startup', `🚀 Serving on port ${port}`, { env: config.NODE_ENV });
  });

  server.on('error', (error: Error) => {
    logger.error('startup', `Failed to bind to port ${port}`, {}, error);
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    logger.info('shutdown', `📴 ${signal} received, shutting down gracefully...`);
    server.close(() => {
      closeDatabase()
        .catch((error: unknown) => {
          logger.error('shutdown', 'Closing the database failed', {}, error instanceof Error ? error : undefined);
        })
        .finally(() => {
          logger.info('shutdown', 'Server closed');
          process.exit(0);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('startup', 'Server failed to start', {}, error instanceof Error ? error : undefined);
  process.exit(1);
});
