/**
 * Main entry point for the index service
 */
import { main } from './worker/index-worker';
import { logger } from './utils/logger';
import Config from './config';

// Log the startup
logger.info({
  name: Config.service.name,
  version: Config.service.version,
  environment: process.env.NODE_ENV || 'development',
  storage: Config.storage.mode,
  broker: Config.broker.enabled ? Config.broker.url : 'disabled',
  topics: {
    in: Config.topics.in,
    out: Config.topics.out,
  },
}, 'Starting index service');

// Start the worker
main().catch((error) => {
  logger.fatal({ error }, 'Fatal error in index service');
  process.exit(1);
});
