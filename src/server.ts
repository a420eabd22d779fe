import http from 'http';
import { createApp } from './app.js';
import { env } from './config/env.js';
import { connectDB, disconnectDB } from './config/database.js';
import { createAmadeusProvider, createServices, serviceConfigFromEnv } from './config/container.js';
import { CacheBackend } from './utils/constants.js';
import { logger } from './utils/logger.js';

const services = createServices(serviceConfigFromEnv(env), createAmadeusProvider(env));
const app = createApp(services, { apiPrefix: env.API_PREFIX, corsOrigin: env.CORS_ORIGIN });
const server = http.createServer(app);

async function startServer(): Promise<void> {
  try {
    if (env.CACHE_BACKEND === CacheBackend.MONGO && env.MONGODB_URI) {
      await connectDB(env.MONGODB_URI);
    }
    logger.info(`Cache backend: ${env.CACHE_BACKEND}`);

    // Start HTTP server
    server.listen(env.PORT, () => {
      logger.info(`🚀 Server running on port ${env.PORT} in ${env.NODE_ENV} mode`);
      logger.info(`📡 API prefix: ${env.API_PREFIX}`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
}

// ── Graceful Shutdown ──
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Shutting down gracefully...`);

  // Stop accepting new connections
  server.close(() => {
    logger.info('HTTP server closed');

    disconnectDB()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error closing MongoDB connection:', error);
        process.exit(1);
      });
  });

  // Force shutdown after 10s
  setTimeout(() => {
    logger.error('Forced shutdown after 10s timeout');
    process.exit(1);
  }, 10_000).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason, promise) => {
  logger.error('Unhandled Rejection at:', promise, 'reason:', reason);
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', error);
  process.exit(1);
});

void startServer();
