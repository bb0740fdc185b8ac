import http, { Server } from 'http';
import { createApp } from './app';
import { IConfig, loadConfig } from './app/config';
import { createStripeClient } from './app/lib/stripeHelper';
import { createChargeService } from './app/modules/Charge/charge.service';
import { createNotificationService } from './app/modules/Notification/notification.service';
import { createEmailSender } from './app/utils/emailService';
import { Logger } from './app/utils/logger';
import { createPushSender } from './app/utils/pushover.utils';

let server: Server | null = null;

const resolveConfig = (): IConfig => {
  try {
    return loadConfig();
  } catch (error) {
    Logger.error('❌ Refusing to start', error);
    process.exit(1);
  }
};

// bootstrap function
function bootstrap() {
  const config = resolveConfig();

  const notifications = createNotificationService({
    config,
    emailSender: createEmailSender(config.mailgun),
    pushSender: createPushSender(config.pushover),
    logger: Logger,
  });

  const chargeService = createChargeService({
    config,
    charges: createStripeClient(config.stripe).charges,
    notifications,
    logger: Logger,
  });

  const app = createApp({ config, chargeService, logger: Logger });

  // Start the HTTP server
  server = http.createServer(app);

  server.listen(config.port, config.host, () => {
    Logger.info(`🚀 Server running on http://${config.host}:${config.port}`);
  });

  // Handle connection errors gracefully
  server.on('error', (err) => {
    Logger.error('❌ Server error', err);
    void shutdown('SERVER_ERROR', err);
  });
}

// Gracefully closes the HTTP server.
async function shutdown(signal: string, error?: Error) {
  Logger.warn(`⚠️  Received ${signal}. Shutting down gracefully...`);

  if (error) {
    Logger.error(`Reason: ${error.message}`);
  }

  try {
    const running = server;
    if (running) {
      await new Promise<void>((resolve, reject) => {
        running.close((err) => (err ? reject(err) : resolve()));
      });
      Logger.info('🧩 Server closed.');
    }

    process.exit(error ? 1 : 0);
  } catch (err) {
    Logger.error('Error during shutdown', err);
    process.exit(1);
  }
}

// Boot up
bootstrap();

// Global process event handlers
(['SIGTERM', 'SIGINT'] as const).forEach((signal) => {
  process.on(signal, () => {
    void shutdown(signal);
  });
});

process.on('uncaughtException', (err) => {
  void shutdown('uncaughtException', err);
});

process.on('unhandledRejection', (reason) => {
  void shutdown(
    'unhandledRejection',
    reason instanceof Error ? reason : new Error(String(reason))
  );
});
