import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import { requestLogger, errorLogger, logger } from '@/utils/logger';
import { config } from '@/utils/config';
import { AppError } from '@/utils/errors';
import { createSalesRouter } from '@/routes/sales';
import { SalesController, salesController } from '@/controllers/salesController';

export function createApp(controller: SalesController = salesController) {
  const app = express();

  // Security middleware
  app.use(helmet());

  app.use(cors({
    origin: true,
    credentials: true,
    methods: ['GET', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Cache-Control', 'Pragma', 'Expires'],
    exposedHeaders: ['Content-Disposition', 'x-data-source', 'x-row-count', 'x-source-encoding', 'x-last-updated']
  }));

  if (config.rateLimitEnabled) {
    app.use('/api/', rateLimit({
      windowMs: config.rateLimitWindowMs,
      max: config.rateLimitMaxRequests,
      message: {
        success: false,
        error: {
          code: 'RATE_LIMIT_EXCEEDED',
          message: 'Too many requests from this IP, please try again later.'
        }
      },
      standardHeaders: true,
      legacyHeaders: false,
    }));
  }

  app.use(compression());
  app.use(express.json({ limit: '1mb' }));

  // Logging middleware
  if (config.nodeEnv !== 'test') {
    app.use(morgan('combined'));
  }
  app.use(requestLogger);

  app.get('/health', (req, res) => {
    res.json({
      success: true,
      message: 'Sales Filter API is running',
      timestamp: new Date().toISOString(),
      environment: config.nodeEnv,
      version: process.env.npm_package_version || '1.0.0'
    });
  });

  app.use('/api/v1/sales', createSalesRouter(controller));

  app.get('/api/v1', (req, res) => {
    res.json({
      success: true,
      message: 'Sales Filter API',
      version: '1.0.0',
      endpoints: {
        filterOptions: '/api/v1/sales/filter-options',
        report: '/api/v1/sales/report',
        export: '/api/v1/sales/export',
        dataHealth: '/api/v1/sales/data-health'
      }
    });
  });

  // 404 handler
  app.use('*', (req, res) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.originalUrl} not found`
      }
    });
  });

  app.use(errorLogger);

  app.use((error: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const appError = error instanceof AppError ? error : undefined;
    if (!appError) {
      logger.error('Unhandled error:', error);
    }

    res.status(appError?.status ?? 500).json({
      success: false,
      error: {
        code: appError?.code ?? 'INTERNAL_SERVER_ERROR',
        message: error instanceof Error ? error.message : 'An unexpected error occurred',
        ...(appError?.stage && { stage: appError.stage }),
        ...(config.nodeEnv === 'development' && error instanceof Error && { stack: error.stack })
      }
    });
  });

  return app;
}
