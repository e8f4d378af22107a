import { tmpdir } from 'os';
import { join } from 'path';
import { AppConfig } from '../types';
import { ConfigurationError } from '../errors';
import { loadSecretsFromKeyVault } from './secrets';

const MB = 1024 * 1024;

/**
 * Parse an integer environment variable, falling back to a default when unset
 */
function readInt(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readOptional(name: string): string | undefined {
  const raw = process.env[name];
  return raw && raw.trim() !== '' ? raw.trim() : undefined;
}

/**
 * Load configuration from environment variables and Azure Key Vault
 *
 * In production mode with KEY_VAULT_URI set, secrets are loaded from Azure Key Vault
 * and override environment variables. In development mode, only environment variables are used.
 */
export async function loadConfig(): Promise<AppConfig> {
  const nodeEnv = process.env.NODE_ENV || 'development';
  const keyVaultUri = readOptional('KEY_VAULT_URI');

  const config: AppConfig = {
    port: readInt('PORT', 8080),
    host: process.env.HOST || '0.0.0.0',
    nodeEnv,
    logLevel: process.env.LOG_LEVEL || 'info',
    maxInputBytes: readInt('MAX_INPUT_BYTES', 50 * MB),
    maxWaitMs: readInt('MAX_WAIT_MS', 30000),
    engine: {
      binary: process.env.ENGINE_BINARY || 'soffice',
      workdir: process.env.ENGINE_WORKDIR || join(tmpdir(), 'docforge'),
      defaultTimeoutMs: readInt('CONVERSION_TIMEOUT_MS', 30000),
      maxTimeoutMs: readInt('CONVERSION_MAX_TIMEOUT_MS', 120000),
      probeTimeoutMs: readInt('ENGINE_PROBE_TIMEOUT_MS', 15000),
    },
    pool: {
      concurrency: readInt('POOL_CONCURRENCY', 2),
      maxQueueDepth: readInt('POOL_MAX_QUEUE_DEPTH', 32),
      engineCrashRetries: readInt('ENGINE_CRASH_RETRIES', 1),
      drainTimeoutMs: readInt('POOL_DRAIN_TIMEOUT_MS', 30000),
    },
    results: {
      ttlMs: readInt('RESULT_TTL_MS', 15 * 60 * 1000),
      sweepIntervalMs: readInt('RESULT_SWEEP_INTERVAL_MS', 60 * 1000),
      maxBytes: readInt('RESULT_MAX_BYTES', 512 * MB),
    },
    templates: {
      dir: readOptional('TEMPLATES_DIR'),
      cacheMaxBytes: readInt('TEMPLATE_CACHE_MAX_BYTES', 100 * MB),
    },
    auth: {
      jwtSecret: readOptional('JWT_SECRET'),
      issuer: readOptional('JWT_ISSUER'),
      audience: readOptional('JWT_AUDIENCE'),
    },
    keyVaultUri,
    azureMonitorConnectionString: readOptional('AZURE_MONITOR_CONNECTION_STRING'),
    enableTelemetry: process.env.ENABLE_TELEMETRY !== 'false', // Enabled by default, can be explicitly disabled
  };

  // Key Vault secrets override environment variables in production
  if (nodeEnv === 'production' && keyVaultUri) {
    const kvSecrets = await loadSecretsFromKeyVault(keyVaultUri);

    if (kvSecrets.jwtSecret) {
      config.auth.jwtSecret = kvSecrets.jwtSecret;
    }
    if (kvSecrets.azureMonitorConnectionString) {
      config.azureMonitorConnectionString = kvSecrets.azureMonitorConnectionString;
    }
  }

  return config;
}

function requirePositive(name: string, value: number): void {
  if (value <= 0) {
    throw new ConfigurationError(`${name} must be positive, got ${value}`);
  }
}

/**
 * Check ranges and production requirements
 */
export function validateConfig(config: AppConfig): void {
  if (config.port < 0 || config.port > 65535) {
    throw new ConfigurationError(`PORT out of range: ${config.port}`);
  }

  requirePositive('POOL_CONCURRENCY', config.pool.concurrency);
  requirePositive('CONVERSION_TIMEOUT_MS', config.engine.defaultTimeoutMs);
  requirePositive('CONVERSION_MAX_TIMEOUT_MS', config.engine.maxTimeoutMs);
  requirePositive('ENGINE_PROBE_TIMEOUT_MS', config.engine.probeTimeoutMs);
  requirePositive('MAX_INPUT_BYTES', config.maxInputBytes);
  requirePositive('RESULT_TTL_MS', config.results.ttlMs);
  requirePositive('RESULT_SWEEP_INTERVAL_MS', config.results.sweepIntervalMs);
  requirePositive('RESULT_MAX_BYTES', config.results.maxBytes);

  if (config.pool.maxQueueDepth < 0) {
    throw new ConfigurationError(`POOL_MAX_QUEUE_DEPTH must not be negative, got ${config.pool.maxQueueDepth}`);
  }
  if (config.pool.engineCrashRetries < 0) {
    throw new ConfigurationError(`ENGINE_CRASH_RETRIES must not be negative, got ${config.pool.engineCrashRetries}`);
  }
  if (config.maxWaitMs < 0) {
    throw new ConfigurationError(`MAX_WAIT_MS must not be negative, got ${config.maxWaitMs}`);
  }

  if (config.engine.defaultTimeoutMs > config.engine.maxTimeoutMs) {
    throw new ConfigurationError(
      `CONVERSION_TIMEOUT_MS (${config.engine.defaultTimeoutMs}) exceeds CONVERSION_MAX_TIMEOUT_MS (${config.engine.maxTimeoutMs})`
    );
  }

  if (config.nodeEnv === 'production' && !config.auth.jwtSecret) {
    throw new ConfigurationError('Missing required configuration in production: JWT_SECRET');
  }
}
