import { loadConfig } from './config';
import { createLotteryService } from './app';
import { logger } from './utils/logger';
import { handleError } from './utils/error-handler';

function main(): void {
  const config = loadConfig();
  const service = createLotteryService(config);

  service.start();
  logger.info('🎰 Lottery service running', {
    environment: config.environment,
    lottery: service.engine.getAddress(),
    coordinator: service.coordinator.getAddress(),
  });

  const shutdown = (signal: string) => {
    logger.info(`🔄 ${signal} received, shutting down`);
    service.stop();
    process.exit(0);
  };

  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  handleError(error, { operation: 'startup' });
  process.exit(1);
}
