export const config = {
  port: Number(process.env.PORT || 5001),
  nodeEnv: (process.env.NODE_ENV || 'development'),
  logLevel: (process.env.LOG_LEVEL || 'info'),
  salesSourceUrl: (process.env.SALES_SOURCE_URL || ''),
  salesFetchTimeoutMs: Number(process.env.SALES_FETCH_TIMEOUT_MS || 60000),
  salesCacheTtlSeconds: Number(process.env.SALES_CACHE_TTL_SECONDS || 600),
  monthLocale: (process.env.MONTH_LOCALE || 'en-US'),
  rateLimitEnabled: process.env.RATE_LIMIT_ENABLED === 'true',
  rateLimitWindowMs: Number(process.env.RATE_LIMIT_WINDOW_MS || 60000),
  rateLimitMaxRequests: Number(process.env.RATE_LIMIT_MAX_REQUESTS || 10000),
};
