import env from './config/env.js';
import logger from './config/logger.js';
import { connectDatabase } from './config/database.js';
import createExpressApp from './loaders/express.js';
import createDefaultServices from './loaders/services.js';

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection:', {
    error: {
      message: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
      name: reason instanceof Error ? reason.name : 'UnhandledRejection',
    },
    timestamp: new Date().toISOString(),
  });
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', {
    error: {
      message: error.message,
      stack: error.stack,
      name: error.name,
    },
    timestamp: new Date().toISOString(),
  });
  // Give time for logs to be written before exiting
  setTimeout(() => {
    process.exit(1);
  }, 1000);
});

(async (): Promise<void> => {
  try {
    await connectDatabase();
    logger.info('Database connection established');

    const app = createExpressApp(createDefaultServices());
    app.listen(env.port, () => {
      logger.info(`Server listening on http://localhost:${env.port}`);
    });
  } catch (error) {
    logger.error('Failed to start application', {
      error: {
        message: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      },
      timestamp: new Date().toISOString(),
    });
    process.exit(1);
  }
})();
