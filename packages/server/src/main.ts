/**
 * Server entry point
 */

import { LocalDeployment } from '@pixhold/deployment';
import { ConfigService } from '@pixhold/services';
import { createLogger } from '@pixhold/utils';

import { startServer } from './app.js';

async function main(): Promise<void> {
  const config = ConfigService.fromEnv().assertValid();
  const logger = createLogger({ level: config.logLevel, file: config.logFile });

  const deployment = new LocalDeployment(config, logger);
  await deployment.initialize();

  const app = await startServer({ deployment });

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, 'Shutting down');
    await app.close();
    await deployment.cleanup();
    logger.info('Server stopped.');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
