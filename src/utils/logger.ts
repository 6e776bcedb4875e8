import { Request, Response, NextFunction } from 'express';
import winston from 'winston';
import { config } from '@/utils/config';

const isProduction = config.nodeEnv === 'production';

export const logger = winston.createLogger({
  level: config.logLevel,
  silent: config.nodeEnv === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), winston.format.simple())
  ),
  defaultMeta: { service: 'sales-filter-api' },
  transports: [new winston.transports.Console()]
});

/**
 * Logs one line per request once the response has been sent
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.info(`${req.method} ${req.originalUrl}`, {
      status: res.statusCode,
      durationMs: Date.now() - startedAt
    });
  });
  next();
}

export function errorLogger(error: unknown, req: Request, _res: Response, next: NextFunction) {
  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, error);
  next(error);
}
