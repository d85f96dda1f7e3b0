import { z } from 'zod';
import { ConfigError } from './domain/errors.js';

export const DEFAULT_FEDERATION_TESTER_URL =
  'https://federationtester.matrix.org/api/report?server_name={server}';

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  // Matrix homeserver the bot account lives on
  homeserverUrl: z.string().url('MATRIX_HOMESERVER_URL must be a valid URL'),
  accessToken: z.string().min(1, 'MATRIX_ACCESS_TOKEN is required'),

  // Federation tester report endpoint, {server} is replaced with the server name
  federationTesterUrl: z
    .string()
    .url('FEDERATION_TESTER_URL must be a valid URL')
    .refine((url) => url.includes('{server}'), 'FEDERATION_TESTER_URL must contain {server}')
    .default(DEFAULT_FEDERATION_TESTER_URL),

  // Timeouts
  probeTimeoutMs: z.number().int().min(1000).max(600000).default(60000),
  syncTimeoutMs: z.number().int().min(0).max(120000).default(30000),

  // Health check
  healthPort: z.number().int().min(1).max(65535).default(8080),
  memoryThresholdMb: z.number().int().min(1).default(200),

  // Environment
  nodeEnv: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Parse environment variables into configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const raw = {
    homeserverUrl: env['MATRIX_HOMESERVER_URL'],
    accessToken: env['MATRIX_ACCESS_TOKEN'],
    federationTesterUrl: env['FEDERATION_TESTER_URL'] || undefined,
    probeTimeoutMs: env['PROBE_TIMEOUT_MS'] ? parseInt(env['PROBE_TIMEOUT_MS'], 10) : 60000,
    syncTimeoutMs: env['SYNC_TIMEOUT_MS'] ? parseInt(env['SYNC_TIMEOUT_MS'], 10) : 30000,
    healthPort: env['PORT'] ? parseInt(env['PORT'], 10) : 8080,
    memoryThresholdMb: env['MEMORY_THRESHOLD_MB']
      ? parseInt(env['MEMORY_THRESHOLD_MB'], 10)
      : 200,
    nodeEnv: env['NODE_ENV'] || 'development',
    logLevel: env['LOG_LEVEL'] || 'info',
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigError(`Configuration validation failed:\n${errors.join('\n')}`, errors);
  }

  return result.data;
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// For testing - allow resetting config
export function resetConfig(): void {
  configInstance = null;
}
