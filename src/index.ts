/**
 * Room Server Versions Bot - Main Entry Point
 *
 * Connects to the homeserver, answers !servers commands in every joined room
 * and serves health checks.
 */

import pino from 'pino';
import { getConfig } from './config.js';
import { defaultCompatibilityTable } from './domain/compatibility.js';
import { createCommandRouter } from './handlers/router.js';
import { registerAllCommandHandlers } from './handlers/registration.js';
import { createHealthServer, type HealthChecker } from './health.js';
import { BatchProber } from './services/BatchProber.js';
import { FederationTester } from './services/FederationTester.js';
import { MatrixRestService } from './services/MatrixRest.js';
import { RoomResultsStore } from './services/RoomResultsStore.js';
import { SyncConsumer } from './services/SyncConsumer.js';
import { logSerializers } from './utils/log-sanitizer.js';

// Initialize logger first with sanitization serializers
const env = process.env;
const logger = pino({
  level: env['LOG_LEVEL'] || 'info',
  serializers: {
    ...pino.stdSerializers,
    ...logSerializers,
  },
  transport:
    env['NODE_ENV'] === 'development'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
});

const startTime = Date.now();

let syncConsumer: SyncConsumer | null = null;
let healthServer: ReturnType<typeof createHealthServer> | null = null;

async function main(): Promise<void> {
  logger.info('Room server versions bot starting...');

  const config = getConfig();
  logger.info({ env: config.nodeEnv }, 'Configuration loaded');

  const matrix = new MatrixRestService(
    { homeserverUrl: config.homeserverUrl, accessToken: config.accessToken },
    logger
  );
  const tester = new FederationTester(
    { urlTemplate: config.federationTesterUrl, timeoutMs: config.probeTimeoutMs },
    logger
  );
  const store = new RoomResultsStore(logger);
  const table = defaultCompatibilityTable;
  logger.info({ updated: table.updated, roomVersions: table.roomVersions.length }, 'Room version table loaded');

  const handlers = registerAllCommandHandlers({
    messenger: matrix,
    batchProber: new BatchProber(tester, logger),
    store,
    table,
  });
  logger.info({ handlerCount: handlers.size }, 'Command handlers registered');

  const consumer = new SyncConsumer(
    matrix,
    createCommandRouter(matrix, handlers),
    { timeoutMs: config.syncTimeoutMs },
    logger
  );
  syncConsumer = consumer;
  await consumer.start();

  const healthChecker: HealthChecker = {
    getSyncStats: () => consumer.getStats(),
    getCachedRoomCount: () => store.roomCount,
    getRunningBatchCount: () => store.runningCount,
    getStartTime: () => startTime,
  };
  healthServer = createHealthServer(config.healthPort, config.memoryThresholdMb, healthChecker, logger);

  logger.info('Bot fully initialized and ready');
}

/**
 * Graceful shutdown
 */
async function shutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Shutdown signal received, starting graceful shutdown');

  healthServer?.close();
  await syncConsumer?.stop();

  logger.info('Graceful shutdown complete');
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.fatal({ error }, 'Shutdown failed');
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.fatal({ error }, 'Shutdown failed');
    process.exit(1);
  });
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught exception, shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ reason }, 'Unhandled rejection, shutting down');
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start bot');
  process.exit(1);
});
