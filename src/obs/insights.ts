/**
 * Azure Application Insights observability wrapper using OpenTelemetry
 *
 * Provides:
 * - Metrics tracking (counters, histograms, gauges)
 * - Dependency tracking (conversion engine invocations)
 * - Correlation ID propagation as a span attribute
 * - No-op behaviour when App Insights is not configured
 */

import { useAzureMonitor } from '@azure/monitor-opentelemetry';
import { metrics, trace, context, SpanStatusCode } from '@opentelemetry/api';
import type { Counter, Histogram, Meter } from '@opentelemetry/api';
import { createLogger } from '../utils/logger';

const logger = createLogger('obs:insights');

const SERVICE_NAME = 'docforge';
const SERVICE_VERSION = '1.0.0';

export type CounterName =
  | 'conversion_failures_total'
  | 'retries_total'
  | 'jobs_rejected_total'
  | 'results_expired_total'
  | 'template_cache_hit'
  | 'template_cache_miss';

export type HistogramName = 'conversion_duration_ms';

export type GaugeName = 'pool_active' | 'pool_queued' | 'result_store_bytes';

export type MetricName = CounterName | HistogramName;

const COUNTERS: Record<CounterName, string> = {
  conversion_failures_total: 'Total number of jobs that ended without an artifact',
  retries_total: 'Engine invocations repeated after a crash',
  jobs_rejected_total: 'Submissions refused because the queue was full',
  results_expired_total: 'Stored results purged by the TTL sweep',
  template_cache_hit: 'Template cache hit counter',
  template_cache_miss: 'Template cache miss counter',
};

const HISTOGRAMS: Record<HistogramName, string> = {
  conversion_duration_ms: 'Job duration from RUNNING to terminal state in milliseconds',
};

const GAUGES: Record<GaugeName, string> = {
  pool_active: 'Number of RUNNING conversion jobs',
  pool_queued: 'Number of QUEUED conversion jobs',
  result_store_bytes: 'Artifact bytes held by the result store',
};

export interface TelemetryOptions {
  nodeEnv: string;
  enabled: boolean;
  connectionString?: string;
}

// Telemetry state
let isInitialized = false;
let telemetryEnabled = false;
let meter: Meter | null = null;

const counters = new Map<string, Counter>();
// Gauges are recorded as histograms
const histograms = new Map<string, Histogram>();

/**
 * Initialize Azure Application Insights with OpenTelemetry
 *
 * Stays disabled under test, when telemetry is switched off, or without a
 * connection string.
 */
export function initializeAppInsights(options: TelemetryOptions): void {
  isInitialized = true;
  telemetryEnabled = false;

  if (options.nodeEnv === 'test') {
    logger.info('App Insights disabled in test environment');
    return;
  }

  if (!options.enabled) {
    logger.info('App Insights disabled by ENABLE_TELEMETRY=false');
    return;
  }

  if (!options.connectionString) {
    logger.warn('AZURE_MONITOR_CONNECTION_STRING not set. App Insights telemetry disabled.');
    return;
  }

  try {
    useAzureMonitor({
      azureMonitorExporterOptions: {
        connectionString: options.connectionString,
      },
    });

    meter = metrics.getMeter(SERVICE_NAME, SERVICE_VERSION);
    createMetricInstruments(meter);
    telemetryEnabled = true;

    logger.info({ service: SERVICE_NAME, version: SERVICE_VERSION }, 'App Insights initialized successfully');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize App Insights');
  }
}

function createMetricInstruments(m: Meter): void {
  for (const [name, description] of Object.entries(COUNTERS)) {
    counters.set(name, m.createCounter(name, { description }));
  }
  for (const [name, description] of Object.entries(HISTOGRAMS)) {
    histograms.set(name, m.createHistogram(name, { description, unit: 'ms' }));
  }
  for (const [name, description] of Object.entries(GAUGES)) {
    histograms.set(name, m.createHistogram(name, { description }));
  }
  logger.debug('Metric instruments created');
}

/**
 * Track a metric (counter or histogram)
 */
export function trackMetric(name: MetricName, value: number, dimensions: Record<string, string | number> = {}): void {
  if (!telemetryEnabled) {
    return;
  }

  try {
    const counter = counters.get(name);
    if (counter) {
      counter.add(value, dimensions);
      return;
    }
    histograms.get(name)?.record(value, dimensions);
  } catch (error) {
    logger.error({ error, name }, 'Failed to track metric');
  }
}

/**
 * Track a gauge metric (point-in-time measurement)
 */
export function trackGauge(name: GaugeName, value: number, dimensions: Record<string, string | number> = {}): void {
  if (!telemetryEnabled) {
    return;
  }

  try {
    histograms.get(name)?.record(value, dimensions);
  } catch (error) {
    logger.error({ error, name }, 'Failed to track gauge');
  }
}

export interface DependencyOptions {
  /** Dependency type (e.g. "LibreOffice") */
  type: string;
  /** Dependency name (e.g. "soffice --convert-to pdf") */
  name: string;
  duration: number;
  success: boolean;
  correlationId: string;
  error?: string;
}

/**
 * Track a dependency call as an OpenTelemetry span
 */
export function trackDependency(options: DependencyOptions): void {
  if (!telemetryEnabled) {
    return;
  }

  try {
    const tracer = trace.getTracer(SERVICE_NAME, SERVICE_VERSION);
    const span = tracer.startSpan(options.name, { startTime: Date.now() - options.duration }, context.active());

    span.setAttribute('dependency.type', options.type);
    span.setAttribute('dependency.name', options.name);
    span.setAttribute('dependency.duration', options.duration);
    span.setAttribute('correlationId', options.correlationId);

    if (options.success) {
      span.setStatus({ code: SpanStatusCode.OK });
    } else {
      span.setStatus({ code: SpanStatusCode.ERROR });
      if (options.error) {
        span.recordException(options.error);
      }
    }

    span.end();
  } catch (error) {
    logger.error({ error, options }, 'Failed to track dependency');
  }
}

export function isTelemetryEnabled(): boolean {
  return telemetryEnabled;
}

export function isAppInsightsInitialized(): boolean {
  return isInitialized;
}
