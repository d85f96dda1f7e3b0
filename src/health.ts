/**
 * Health Check Server
 *
 * HTTP health endpoints for liveness and readiness probes. Reports the sync
 * loop, cached room results and memory use, and serves Prometheus metrics.
 */

import http from 'node:http';
import type { Logger } from 'pino';
import { collectMetrics, registry } from './infrastructure/metrics.js';
import type { SyncConsumerStats } from './services/SyncConsumer.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface HealthChecker {
  getSyncStats: () => SyncConsumerStats;
  getCachedRoomCount: () => number;
  getRunningBatchCount: () => number;
  getStartTime: () => number;
}

export interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: number;
  checks: {
    sync: SyncConsumerStats;
    rooms: {
      cached: number;
      running: number;
    };
    memory: {
      heapUsed: number;
      heapTotal: number;
      rss: number;
      belowThreshold: boolean;
    };
  };
  uptime: number;
}

// --------------------------------------------------------------------------
// Health Server
// --------------------------------------------------------------------------

/**
 * Build the request listener; split from the server so it can be called
 * directly in tests.
 */
export function createHealthListener(
  memoryThresholdMb: number,
  checker: HealthChecker
): http.RequestListener {
  return (req, res) => {
    const url = req.url ?? '/';

    // Liveness probe - basic process health
    if (url === '/healthz' || url === '/health') {
      const health = getHealthStatus(checker, memoryThresholdMb);
      const statusCode = health.status === 'healthy' ? 200 : 503;

      res.writeHead(statusCode, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(health));
      return;
    }

    // Readiness probe - ready to answer commands
    if (url === '/ready' || url === '/readyz') {
      const ready = checker.getSyncStats().running;

      res.writeHead(ready ? 200 : 503, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ ready, timestamp: Date.now() }));
      return;
    }

    // Prometheus metrics endpoint
    if (url === '/metrics') {
      void serveMetrics(res);
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found' }));
  };
}

async function serveMetrics(res: http.ServerResponse): Promise<void> {
  try {
    const body = await collectMetrics();
    res.writeHead(200, { 'Content-Type': registry.contentType });
    res.end(body);
  } catch (error) {
    res.writeHead(500, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: error instanceof Error ? error.message : 'Metrics unavailable' }));
  }
}

/**
 * Create HTTP server for health checks
 */
export function createHealthServer(
  port: number,
  memoryThresholdMb: number,
  checker: HealthChecker,
  logger: Logger
): http.Server {
  const log = logger.child({ component: 'HealthServer' });
  const server = http.createServer(createHealthListener(memoryThresholdMb, checker));

  server.listen(port, () => {
    log.info({ port }, 'Health server listening');
  });

  server.on('error', (error) => {
    log.error({ error }, 'Health server error');
  });

  return server;
}

/**
 * Healthy while the sync loop runs and the heap is below the threshold
 */
export function getHealthStatus(checker: HealthChecker, memoryThresholdMb: number): HealthStatus {
  const sync = checker.getSyncStats();
  const memUsage = process.memoryUsage();
  const heapUsedMb = memUsage.heapUsed / 1024 / 1024;
  const belowThreshold = heapUsedMb < memoryThresholdMb;

  return {
    status: sync.running && belowThreshold ? 'healthy' : 'unhealthy',
    timestamp: Date.now(),
    checks: {
      sync,
      rooms: {
        cached: checker.getCachedRoomCount(),
        running: checker.getRunningBatchCount(),
      },
      memory: {
        heapUsed: memUsage.heapUsed,
        heapTotal: memUsage.heapTotal,
        rss: memUsage.rss,
        belowThreshold,
      },
    },
    uptime: Date.now() - checker.getStartTime(),
  };
}
