/**
 * Bot Metrics
 *
 * Prometheus-compatible metrics for commands, federation probes and Matrix
 * requests, served from the health server's /metrics endpoint.
 */

import { Counter, Histogram, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

// Create a dedicated registry
export const registry = new Registry();

// Collect default Node.js metrics
collectDefaultMetrics({ register: registry });

// ==============================================================================
// Command Metrics
// ==============================================================================

export const commandsProcessed = new Counter({
  name: 'bot_commands_processed_total',
  help: 'Total commands processed',
  labelNames: ['command', 'status'] as const,
  registers: [registry],
});

export const commandDuration = new Histogram({
  name: 'bot_command_duration_seconds',
  help: 'Command handling duration in seconds',
  labelNames: ['command'] as const,
  buckets: [0.1, 0.5, 1, 5, 15, 30, 60, 120],
  registers: [registry],
});

// ==============================================================================
// Probe Metrics
// ==============================================================================

export const probesTotal = new Counter({
  name: 'bot_federation_probes_total',
  help: 'Total federation probes by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const probeDuration = new Histogram({
  name: 'bot_federation_probe_duration_seconds',
  help: 'Federation probe duration in seconds',
  buckets: [0.25, 0.5, 1, 2, 5, 10, 30, 60],
  registers: [registry],
});

export const activeBatches = new Gauge({
  name: 'bot_active_batches',
  help: 'Room tests currently running',
  registers: [registry],
});

// ==============================================================================
// Matrix REST Metrics
// ==============================================================================

export const matrixRequests = new Counter({
  name: 'bot_matrix_requests_total',
  help: 'Total Matrix client-server API requests',
  labelNames: ['method', 'status'] as const,
  registers: [registry],
});

// ==============================================================================
// Helper Functions
// ==============================================================================

/**
 * Record a handled command
 */
export function recordCommandProcessed(command: string, status: 'success' | 'error', durationSeconds: number): void {
  commandsProcessed.labels(command, status).inc();
  commandDuration.labels(command).observe(durationSeconds);
}

/**
 * Record one probe; `outcome` is "ok" or the failure kind
 */
export function recordProbe(outcome: string, durationSeconds: number): void {
  probesTotal.labels(outcome).inc();
  probeDuration.observe(durationSeconds);
}

/**
 * Start tracking a running batch
 */
export function startActiveBatch(): () => void {
  activeBatches.inc();
  return () => activeBatches.dec();
}

/**
 * Collect all metrics as string
 */
export async function collectMetrics(): Promise<string> {
  return registry.metrics();
}
