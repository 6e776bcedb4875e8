import dotenv from 'dotenv';
import path from 'path';

// Register module aliases for runtime path resolution
import moduleAlias from 'module-alias';
moduleAlias.addAliases({
  '@': path.join(__dirname, '.')
});

// Load environment variables FIRST, before any other imports
// Try multiple common .env locations (later loads override earlier)
const envCandidates = [
  path.join(process.cwd(), '.env'),
  path.join(__dirname, '../.env')
];
for (const p of envCandidates) {
  const loaded = dotenv.config({ path: p, override: true });
  if (loaded.parsed) {
    console.log(`Loaded env from: ${p}`);
  }
}

import { createApp } from '@/app';
import { config } from '@/utils/config';
import { logger } from '@/utils/logger';
import { cacheService } from '@/services/cacheService';
import { getSalesSourceService } from '@/services/salesSourceService';

const app = createApp();

// Graceful shutdown
process.on('SIGTERM', () => {
  logger.info('SIGTERM received, shutting down gracefully');
  cacheService.clear();
  process.exit(0);
});

process.on('SIGINT', () => {
  logger.info('SIGINT received, shutting down gracefully');
  cacheService.clear();
  process.exit(0);
});

const startServer = async () => {
  try {
    // Warm the cache (non-fatal)
    try {
      const { meta } = await getSalesSourceService().fetchSalesData();
      logger.info(`✅ Sales data loaded (${meta.rowCount} rows, ${meta.encoding})`);
    } catch (e) {
      logger.warn('⚠️ Unable to prefetch sales data. Server will still start; endpoints may return errors until the source is reachable.', e);
    }

    app.listen(config.port, () => {
      logger.info(`🚀 Sales Filter API server running on port ${config.port}`);
      logger.info(`📊 Environment: ${config.nodeEnv}`);
      logger.info(`🔗 Health check: http://localhost:${config.port}/health`);
    });
  } catch (error) {
    logger.error('❌ Failed to start server:', error);
    process.exit(1);
  }
};

void startServer();

export default app;
