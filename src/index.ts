import env from './config/env.js';
import logger from './config/logger.js';
import { connectDatabase, sequelize } from './config/database.js';
import createExpressApp from './loaders/express.js';
import negotiationRepo from './modules/negotiation/negotiation.repo.js';
import {
  createNegotiationService,
  startSessionTimeoutScheduler,
  stopSessionTimeoutScheduler,
} from './modules/negotiation/index.js';

const describeError = (error: unknown) =>
  error instanceof Error
    ? { message: error.message, stack: error.stack, name: error.name }
    : { message: String(error), name: 'UnknownError' };

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Promise Rejection:', {
    error: { ...describeError(reason), name: reason instanceof Error ? reason.name : 'UnhandledRejection' },
    timestamp: new Date().toISOString(),
  });
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', {
    error: describeError(error),
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

    const negotiationService = createNegotiationService({
      store: negotiationRepo.roundStore,
      loads: negotiationRepo.loadPricingSource,
      carriers: negotiationRepo.carrierHistorySource,
      maxRounds: env.negotiation.maxRounds,
    });

    if (env.negotiation.timeoutSweepEnabled) {
      startSessionTimeoutScheduler(
        negotiationService,
        env.negotiation.sessionTimeoutMinutes,
        env.negotiation.timeoutSweepCron
      );
    }

    const app = createExpressApp({ negotiationService });
    const server = app.listen(env.port, () => {
      logger.info(`Server listening on http://localhost:${env.port}`);
    });

    const shutdown = (signal: string): void => {
      logger.info(`${signal} received, shutting down`);
      stopSessionTimeoutScheduler();
      server.close(() => {
        sequelize
          .close()
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Failed to close database connection', { error: describeError(error) });
            process.exit(1);
          });
      });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error('Failed to start application', {
      error: describeError(error),
      timestamp: new Date().toISOString(),
    });
    process.exit(1);
  }
})();
