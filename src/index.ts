import { createApp } from './app';
import { createContainer, createNotificationSender, createSupabaseRepositories } from './container';
import { env, SCAN_DEDUPE_WINDOW_MS } from './config/environment';
import { logger } from './config/logger';
import { closeConnection, getSupabaseClient, testConnection } from './config/database';

/**
 * Application Entry Point
 *
 * Starts the Express server and handles graceful shutdown
 */
async function startServer(): Promise<void> {
  // Verify database connection before starting server
  if (!(await testConnection())) {
    throw new Error('Database connection failed');
  }

  const sender = createNotificationSender(env.RESEND_API_KEY, env.MAIL_FROM);
  if (!sender) {
    logger.warn('RESEND_API_KEY is not set; slips and login codes will not be mailed');
  }

  const container = createContainer(createSupabaseRepositories(getSupabaseClient()), sender, {
    jwtSecret: env.JWT_SECRET,
    jwtExpiresInSeconds: env.JWT_EXPIRES_IN_SECONDS,
    otpTtlMinutes: env.OTP_TTL_MINUTES,
    pendingReturnsEnabled: env.PENDING_RETURNS_ENABLED,
    overReturnPolicy: env.OVER_RETURN_POLICY,
    dedupeWindowMs: SCAN_DEDUPE_WINDOW_MS,
    institutionName: env.INSTITUTION_NAME,
    timeZone: env.TIMEZONE,
    notifyMaxAttempts: env.NOTIFY_MAX_ATTEMPTS,
    notifyRetryDelayMs: env.NOTIFY_RETRY_DELAY_MS,
  });

  const app = createApp(container, { allowedOrigins: env.ALLOWED_ORIGINS });

  // Start listening
  const server = app.listen(env.PORT, () => {
    logger.info(`
╔════════════════════════════════════════════════════════════╗
║  Lab Equipment Desk API Server                             ║
╟────────────────────────────────────────────────────────────╢
║  Environment: ${env.NODE_ENV.padEnd(42)} ║
║  Port:        ${String(env.PORT).padEnd(42)} ║
║  Base URL:    http://localhost:${env.PORT}${' '.repeat(30)} ║
║  Docs:        http://localhost:${env.PORT}/docs${' '.repeat(25)} ║
║  OpenAPI:     http://localhost:${env.PORT}/openapi.json${' '.repeat(17)} ║
║  Health:      http://localhost:${env.PORT}/health${' '.repeat(23)} ║
╚════════════════════════════════════════════════════════════╝
    `.trim());

    logger.info('Server is ready to accept connections');
  });

  let shuttingDown = false;

  // Graceful shutdown handler
  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received, starting graceful shutdown...`);

    // Force shutdown after 10 seconds
    const forceExit = setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, 10000);
    forceExit.unref();

    server.close(() => {
      logger.info('HTTP server closed');

      // Let queued slip mails finish before exiting
      container.dispatcher
        .drain()
        .then(() => {
          closeConnection();
          logger.info('Shutting down gracefully');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error('Failed to drain notifications', { error });
          process.exit(1);
        });
    });
  };

  // Handle shutdown signals
  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));

  // Handle uncaught errors
  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
    gracefulShutdown('uncaughtException');
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logger.error('Unhandled Rejection', { reason });
    gracefulShutdown('unhandledRejection');
  });
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error });
  process.exit(1);
});
