import app from './app';
import logger from './config/logger';
import appConfig, { validateAppConfig } from './config/env';
import updateDispatcher from './handlers/update.dispatcher';
import telegramService from './services/telegram.service';
import { TelegramPoller } from './services/telegram.poller';
import { describeError } from './utils/AppError';

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled Rejection:', { reason: describeError(reason) });
  // Don't exit - let the server continue running
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught Exception:', { error: error.message, stack: error.stack });
  process.exit(1);
});

async function start(): Promise<void> {
  validateAppConfig(appConfig);

  const server = app.listen(appConfig.port, () => {
    logger.info('ScribeDesk Bot Starting...');
    logger.info(`Server running on port ${appConfig.port}`, { updateMode: appConfig.updateMode });
  });

  // Handle server errors
  server.on('error', (error: Error) => {
    logger.error('Server error:', { error: error.message });
  });

  let poller: TelegramPoller | undefined;

  if (appConfig.updateMode === 'polling') {
    await telegramService.deleteWebhook();
    poller = new TelegramPoller(telegramService, (update) => updateDispatcher.dispatch(update));
    poller.start();
  } else if (appConfig.publicUrl) {
    await telegramService.setWebhook(`${appConfig.publicUrl}/webhook`, appConfig.webhookSecret);
  } else {
    logger.warn('PUBLIC_URL not set: the webhook must already be registered');
  }

  const shutdown = async (): Promise<void> => {
    logger.info('SIGTERM received, shutting down');
    try {
      await poller?.stop();
    } catch (error) {
      logger.error('Failed to stop polling', { error: describeError(error) });
    }
    server.close(() => process.exit(0));
  };

  process.on('SIGTERM', () => {
    shutdown().catch((error: unknown) => logger.error('Shutdown failed', { error: describeError(error) }));
  });
}

start().catch((error: unknown) => {
  logger.error('Failed to start server:', {
    error: describeError(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
