import { describe, it, expect, afterEach } from 'vitest';
import { DEFAULT_FEDERATION_TESTER_URL, getConfig, loadConfig, resetConfig } from '../src/config.js';
import { ConfigError } from '../src/domain/errors.js';

const required = {
  MATRIX_HOMESERVER_URL: 'https://hs.example.test',
  MATRIX_ACCESS_TOKEN: 'test-token',
};

function configError(env: NodeJS.ProcessEnv): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected loadConfig to fail');
}

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('fills in defaults', () => {
    expect(loadConfig(required)).toEqual({
      homeserverUrl: 'https://hs.example.test',
      accessToken: 'test-token',
      federationTesterUrl: DEFAULT_FEDERATION_TESTER_URL,
      probeTimeoutMs: 60000,
      syncTimeoutMs: 30000,
      healthPort: 8080,
      memoryThresholdMb: 200,
      nodeEnv: 'development',
      logLevel: 'info',
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      ...required,
      FEDERATION_TESTER_URL: 'http://tester.example.test/report?server_name={server}',
      PROBE_TIMEOUT_MS: '5000',
      SYNC_TIMEOUT_MS: '0',
      PORT: '9090',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      federationTesterUrl: 'http://tester.example.test/report?server_name={server}',
      probeTimeoutMs: 5000,
      syncTimeoutMs: 0,
      healthPort: 9090,
      nodeEnv: 'production',
      logLevel: 'debug',
    });
  });

  it('treats an empty tester URL as unset', () => {
    expect(loadConfig({ ...required, FEDERATION_TESTER_URL: '' }).federationTesterUrl).toBe(
      DEFAULT_FEDERATION_TESTER_URL
    );
  });

  it('lists every invalid setting', () => {
    const error = configError({
      MATRIX_HOMESERVER_URL: 'not a url',
      MATRIX_ACCESS_TOKEN: '',
      FEDERATION_TESTER_URL: 'https://tester.example.test/report',
      PROBE_TIMEOUT_MS: '500',
    });

    expect(error.details).toEqual([
      'homeserverUrl: MATRIX_HOMESERVER_URL must be a valid URL',
      'accessToken: MATRIX_ACCESS_TOKEN is required',
      'federationTesterUrl: FEDERATION_TESTER_URL must contain {server}',
      'probeTimeoutMs: Number must be greater than or equal to 1000',
    ]);
    expect(error.message).toBe(`Configuration validation failed:\n${error.details.join('\n')}`);
  });

  it('caches the process configuration until reset', () => {
    const previous = { ...process.env };
    Object.assign(process.env, required);
    try {
      const first = getConfig();
      expect(getConfig()).toBe(first);
      resetConfig();
      expect(getConfig()).not.toBe(first);
    } finally {
      process.env = previous;
    }
  });
});
