import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';

import type { Services } from './config/container.js';
import { apiLimiter } from './middleware/rateLimiter.js';
import { errorHandler } from './middleware/errorHandler.js';
import { AppError } from './utils/appError.js';
import { logger } from './utils/logger.js';

// Route imports
import airportRoutes from './modules/airports/airports.routes.js';
import meetingRoutes from './modules/meetings/meetings.routes.js';

export interface AppOptions {
  apiPrefix: string;
  corsOrigin: string;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();
  app.set('trust proxy', 1);

  // ── Security Headers ──
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
    }),
  );

  // ── CORS ──
  app.use(
    cors({
      origin: options.corsOrigin.split(',').map((o) => o.trim()),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type'],
    }),
  );

  // ── Body Parsing ──
  app.use(express.json({ limit: '100kb' }));

  // ── HTTP Logging ──
  const morganStream = {
    write: (message: string) => logger.http(message.trim()),
  };
  app.use(morgan('combined', { stream: morganStream }));

  // ── Global Rate Limiter ──
  app.use(apiLimiter);

  // ── Health Check ──
  app.get('/health', (_req, res) => {
    res.json({
      success: true,
      data: {
        status: 'ok',
        provider: services.provider.name,
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
      },
    });
  });

  // ── API Routes ──
  const prefix = options.apiPrefix;

  app.use(`${prefix}/meetings`, meetingRoutes(services.meetings));
  app.use(`${prefix}/airports`, airportRoutes(services.resolver));

  // ── 404 Handler ──
  app.use((_req, _res, next) => {
    next(AppError.notFound('Route not found'));
  });

  // ── Global Error Handler ──
  app.use(errorHandler);

  return app;
}
