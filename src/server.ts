import dotenv from 'dotenv';
import Fastify, { FastifyInstance } from 'fastify';
import { healthRoutes } from './routes/health';
import { convertRoutes } from './routes/convert';
import { poolRoutes } from './routes/pool';
import authPlugin from './plugins/auth';
import { loadConfig, validateConfig } from './config';
import { createErrorHandler } from './errors';
import { initializeAppInsights } from './obs';
import { SofficeEngine, ConversionEngine } from './engine';
import { ConversionScheduler, DocumentPreparer, InputPreparer, ResultStore } from './jobs';
import { TemplateCache, TemplateStore } from './templates';
import { createLogger } from './utils/logger';
import { AppConfig } from './types';

// Load environment variables from .env file
dotenv.config();

const logger = createLogger('server');

export interface BuildOptions {
  config?: AppConfig;
  /** Replaces the soffice engine (tests) */
  engine?: ConversionEngine;
  preparer?: InputPreparer;
}

export function createEngine(config: AppConfig): SofficeEngine {
  return new SofficeEngine({
    binary: config.engine.binary,
    maxTimeoutMs: config.engine.maxTimeoutMs,
    probeTimeoutMs: config.engine.probeTimeoutMs,
  });
}

/**
 * Build and configure the Fastify application
 *
 * The scheduler and result store live as long as the instance; closing it
 * drains the pool and stops the expiry sweep.
 */
export async function build(options: BuildOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? (await loadConfig());
  validateConfig(config);

  initializeAppInsights({
    nodeEnv: config.nodeEnv,
    enabled: config.enableTelemetry,
    connectionString: config.azureMonitorConnectionString,
  });

  const engine = options.engine ?? createEngine(config);
  const store = new ResultStore(config.results);
  const templates = new TemplateStore(config.templates.dir, new TemplateCache(config.templates.cacheMaxBytes));
  const scheduler = new ConversionScheduler({
    engine,
    store,
    preparer: options.preparer ?? new DocumentPreparer(templates),
    pool: config.pool,
    workdir: config.engine.workdir,
    defaultTimeoutMs: config.engine.defaultTimeoutMs,
    maxTimeoutMs: config.engine.maxTimeoutMs,
    maxInputBytes: config.maxInputBytes,
  });

  // Documents arrive base64-encoded inside JSON
  const bodyLimit = Math.ceil((config.maxInputBytes * 4) / 3) + 1024 * 1024;

  const app = Fastify({
    logger: config.nodeEnv === 'test' ? false : { level: config.logLevel },
    bodyLimit,
  });

  app.setErrorHandler(createErrorHandler(app, { maxBodyBytes: bodyLimit }));

  store.startSweeper();
  app.addHook('onClose', async () => {
    await scheduler.shutdown({ drain: true, drainTimeoutMs: config.pool.drainTimeoutMs });
    store.stopSweeper();
  });

  // Register auth plugin before routes
  await app.register(authPlugin, { config });

  await app.register(healthRoutes, { engine, scheduler });
  await app.register(convertRoutes, { scheduler, store, maxWaitMs: config.maxWaitMs });
  await app.register(poolRoutes, { prefix: '/pool', scheduler, store });

  return app;
}

/**
 * Probe the engine, then listen; exits with code 1 when the engine is
 * unusable
 */
async function start(): Promise<void> {
  const config = await loadConfig();
  validateConfig(config);

  const engine = createEngine(config);
  const probe = await engine.probe();
  if (!probe.available) {
    logger.fatal({ binary: config.engine.binary, error: probe.error }, 'Conversion engine unavailable, aborting startup');
    process.exit(1);
  }
  logger.info({ version: probe.version }, 'Conversion engine available');

  const app = await build({ config, engine });
  await app.listen({ port: config.port, host: config.host });
  app.log.info(`Environment: ${config.nodeEnv}`);

  const shutdown = (signal: string): void => {
    app.log.info({ signal }, 'Shutting down gracefully');
    app.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ error }, 'Error during shutdown');
        process.exit(1);
      }
    );
  };

  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

/**
 * Start the server if this file is run directly
 */
if (require.main === module) {
  start().catch((error: unknown) => {
    logger.fatal({ error: error instanceof Error ? error.message : String(error) }, 'Failed to start server');
    process.exit(1);
  });
}
