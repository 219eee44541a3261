import express from 'express';
import { createServer } from 'http';
import cors from 'cors';
import { env, validateEnv } from '@/shared/config';
import { logger } from '@/shared/utils';
import { initializeSocketServer, shutdownSocketServer, getSocketStats } from '@/modules/socket';
import { relayConfig, relayController } from '@/modules/relay';
import { openaiConfig } from '@/modules/translation';
import { createCallsRouter, errorHandler, notFoundHandler } from '@/modules/calls';

// Validate environment variables and module configuration
try {
  validateEnv();
  openaiConfig.validate();
  relayConfig.validate();
} catch (error) {
  logger.error('Configuration validation failed', error);
  process.exit(1);
}

// Create Express app
const app = express();

// Middleware
app.use(cors());

// Health check endpoint
app.get('/health', (_req, res) => {
  const socketStats = getSocketStats(wss);

  res.json({
    status: 'ok',
    message: 'Translation relay is running',
    uptime: process.uptime(),
    sessions: socketStats.sessionStats,
    websocketServer: {
      totalConnections: socketStats.totalConnections,
      activeSessions: socketStats.activeSessions,
    },
  });
});

// Session API and Twilio webhooks
app.use(createCallsRouter(relayController));

app.use(notFoundHandler);
app.use(errorHandler);

// Create HTTP server
const httpServer = createServer(app);

// Initialize WebSocket server
const wss = initializeSocketServer(httpServer);

// Idle session expiry
relayController.startExpirySweep();

let shuttingDown = false;

// Graceful shutdown handler
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`${signal} received, starting graceful shutdown`);

  try {
    // Step 1: Stop accepting new connections
    await new Promise<void>((resolve) => {
      const forceTimer = setTimeout(() => {
        logger.warn('HTTP server force closed after timeout');
        resolve();
      }, 5000);

      httpServer.close(() => {
        clearTimeout(forceTimer);
        logger.info('HTTP server closed');
        resolve();
      });
    });

    // Step 2: End every session and close the WebSocket server
    await shutdownSocketServer(wss);

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown', error);
    process.exit(1);
  }
}

// Register shutdown handlers
process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void gracefulShutdown('UNCAUGHT_EXCEPTION');
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled rejection', { reason });
  void gracefulShutdown('UNHANDLED_REJECTION');
});

// Start server
httpServer.listen(env.PORT, () => {
  logger.info('Translation relay server started', {
    port: env.PORT,
    environment: env.NODE_ENV,
    publicHost: env.PUBLIC_HOST || '(request host)',
  });
});
