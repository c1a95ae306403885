/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { initDatabases, PPA_TABLES } from './infra/database/client.js';
import { createLogger, prettyTransport } from './infra/logger/index.js';
import { makeContractsRepo } from './modules/contracts/index.js';
import { makeDbHealthChecker } from './modules/health/index.js';
import { makePpaQuotationRepo } from './modules/ppa-quotations/index.js';
import { makeRecontractRepo } from './modules/recontracts/index.js';

const getVersion = (): string | undefined => process.env['APP_VERSION'] ?? '0.1.0';

const main = async (): Promise<void> => {
  // Parse and validate environment
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: config.app.name,
    pretty: config.logger.pretty,
  });

  logger.info({ config: { server: config.server } }, 'Starting API server');

  const { ppaDb } = initDatabases(config);

  // Build application - let Fastify create its own logger based on config
  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && { transport: prettyTransport }),
      },
      disableRequestLogging: false,
    },
    deps: {
      config,
      healthCheckers: [makeDbHealthChecker(ppaDb, { name: 'database', tables: PPA_TABLES })],
      ppaQuotationRepo: makePpaQuotationRepo({ db: ppaDb, logger }),
      recontractRepo: makeRecontractRepo({ db: ppaDb, logger }),
      contractsRepo: makeContractsRepo({ db: ppaDb, logger }),
    },
    version: getVersion(),
  });

  // Graceful shutdown handler
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      await ppaDb.destroy();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  // Start server
  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    await ppaDb.destroy();
    process.exit(1);
  }
};

// Start the server (top-level await)
await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
