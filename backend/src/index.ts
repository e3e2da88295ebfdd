import dotenv from 'dotenv';
import { createServer } from './api/server';
import { createApplication } from './bootstrap';
import { loadConfig } from './config/appConfig';
import { CacheRefreshedEvent } from './services/DataAggregator';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

const config = loadConfig();

// Top-level code execution
logger.info('🚀 Starting EcoWatch Backend...');

const { aggregator, cache } = createApplication(config);

// Warm the cache from the last shutdown, if a snapshot is configured
try {
  await cache.restore();
} catch (error) {
  logger.error({ error }, '❌ Could not restore cache snapshot, starting cold');
}

await aggregator.initialize();

aggregator.on('cache-refreshed', (event: CacheRefreshedEvent) => {
  logger.debug(event, '♻️  Cache entry refreshed in background');
});

const app = createServer(aggregator);

const server = app.listen(config.port, () => {
  logger.info({ port: config.port }, `✅ Server running on http://localhost:${config.port}`);
  logger.info('📊 API endpoints:');
  logger.info('   GET  /health              - Health check');
  logger.info('   GET  /api/dashboard       - Aggregated data (?subjects=&lat=&lon=&region=&start=&end=&providers=)');
  logger.info('   POST /api/dashboard       - Aggregated data (JSON query body)');
  logger.info('   GET  /api/:subject        - Single subject (airQuality, deforestation, birds, news)');
  logger.info('   GET  /api/providers       - Provider statistics and quotas');
  logger.info('   GET  /api/cache/stats     - Get cache statistics');
  logger.info('   POST /api/cache/clear     - Clear cache (debug only)');
});

// Graceful shutdown
const shutdown = async () => {
  logger.info('🛑 Shutting down gracefully...');
  try {
    await aggregator.cleanup();
    await cache.persist();
  } catch (error) {
    logger.error({ error }, '❌ Error during shutdown');
  }
  server.close(() => {
    logger.info('✅ Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', () => void shutdown());
process.on('SIGINT', () => void shutdown());
