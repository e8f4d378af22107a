// Common TypeScript interfaces and types

import type { Readable } from 'stream';
import type { ErrorCode } from './errors/codes';

export interface HealthStatus {
  status: 'ok';
}

export interface ReadinessStatus {
  ready: boolean;
  checks: {
    engine: boolean;
    scheduler: boolean;
  };
  engineVersion?: string;
}

export interface AppConfig {
  port: number;
  host: string;
  nodeEnv: string;
  logLevel: string;
  /** Largest accepted input document, in bytes */
  maxInputBytes: number;
  /** Upper bound for GET /convert/:jobId?wait= */
  maxWaitMs: number;
  engine: EngineConfig;
  pool: PoolConfig;
  results: ResultStoreConfig;
  templates: TemplateStoreConfig;
  auth: AuthConfig;
  keyVaultUri?: string;
  // Azure Application Insights settings
  azureMonitorConnectionString?: string;
  enableTelemetry: boolean;
}

export interface EngineConfig {
  /** Engine executable (default: soffice) */
  binary: string;
  /** Root directory for per-slot workspaces */
  workdir: string;
  /** Timeout applied when a request does not carry one */
  defaultTimeoutMs: number;
  /** Largest timeout a request may ask for */
  maxTimeoutMs: number;
  /** Timeout for the startup/readiness probe */
  probeTimeoutMs: number;
}

export interface PoolConfig {
  /** Number of engine slots (max concurrently RUNNING jobs) */
  concurrency: number;
  /** Queued jobs accepted while every slot is busy */
  maxQueueDepth: number;
  /** Automatic retries after an engine crash */
  engineCrashRetries: number;
  /** How long shutdown waits for outstanding jobs before cancelling them */
  drainTimeoutMs: number;
}

export interface ResultStoreConfig {
  ttlMs: number;
  sweepIntervalMs: number;
  maxBytes: number;
}

export interface TemplateStoreConfig {
  dir?: string;
  cacheMaxBytes: number;
}

export interface AuthConfig {
  jwtSecret?: string;
  issuer?: string;
  audience?: string;
}

export interface CorrelationContext {
  correlationId: string;
}

// Formats

export type TargetFormat = 'pdf' | 'docx' | 'odt' | 'rtf' | 'html' | 'txt';

export interface FormatDescriptor {
  format: TargetFormat;
  contentType: string;
  extension: string;
  /** Value passed to `soffice --convert-to` */
  filter: string;
}

// Conversion jobs

export type JobState = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'TIMED_OUT' | 'CANCELLED';

export type TerminalJobState = Exclude<JobState, 'QUEUED' | 'RUNNING'>;

/**
 * Reference to the document a job converts
 */
export type JobInput =
  | { kind: 'template'; templateId: string }
  | { kind: 'document'; bytes: Buffer; contentType: string; fileName?: string };

/**
 * What a job record keeps of its input once admitted; the bytes stay with
 * the scheduler's payload
 */
export type JobSource =
  | { kind: 'template'; templateId: string }
  | { kind: 'document'; contentType: string; fileName?: string; sizeBytes: number };

/**
 * Input bytes and merge data of an active job, released when it finishes
 */
export interface JobPayload {
  input: JobInput;
  data?: Record<string, unknown>;
}

/**
 * What a caller asks the scheduler to do
 */
export interface ConversionRequest {
  input: JobInput;
  targetFormat: TargetFormat;
  /** Merge payload, only for DOCX templates from the template store */
  data?: Record<string, unknown>;
  locale?: string;
  timezone?: string;
  timeoutMs?: number;
  correlationId?: string;
}

/**
 * Error recorded on a terminal job
 */
export interface JobErrorDetail {
  code: ErrorCode;
  /** Error class name (e.g. "EngineCrashedError") */
  error: string;
  message: string;
  retryable: boolean;
}

export interface JobTransition {
  state: JobState;
  at: Date;
}

export interface ConversionJob {
  id: string;
  input: JobSource;
  locale: string;
  timezone: string;
  targetFormat: TargetFormat;
  timeoutMs: number;
  correlationId: string;
  submittedAt: Date;
  state: JobState;
  attempts: number;
  startedAt: Date | null;
  finishedAt: Date | null;
  /** Artifact id, set only on SUCCEEDED */
  resultRef: string | null;
  /** Set only on FAILED, TIMED_OUT and CANCELLED */
  error: JobErrorDetail | null;
  transitions: JobTransition[];
}

/**
 * Public, byte-free view of a job (API responses, logs)
 */
export interface JobView {
  jobId: string;
  state: JobState;
  targetFormat: TargetFormat;
  input: { kind: 'template'; templateId: string } | { kind: 'document'; contentType: string; sizeBytes: number };
  attempts: number;
  submittedAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  resultRef: string | null;
  error: JobErrorDetail | null;
  correlationId: string;
}

export interface JobHandle {
  jobId: string;
  state(): JobState;
  /** Resolves with the terminal job; never rejects */
  done: Promise<ConversionJob>;
}

export type JobListener = (job: ConversionJob, from: JobState | null, to: JobState) => void;

/**
 * Immutable rendered output of a successful job
 */
export interface Artifact {
  readonly id: string;
  readonly bytes: Buffer;
  readonly format: TargetFormat;
  readonly contentType: string;
  readonly extension: string;
  readonly sizeBytes: number;
  readonly sha256: string;
  readonly createdAt: Date;
}

// Engine

/**
 * Bytes handed to the engine
 */
export interface EngineInput {
  source: Buffer | Readable;
  contentType: string;
  extension: string;
}

export interface EngineRequest {
  /** Artifact id to stamp on the output (the job id) */
  artifactId: string;
  input: EngineInput;
  targetFormat: TargetFormat;
  timeoutMs: number;
  /** Slot-private directory; the engine creates one subdirectory per call */
  workdir: string;
  signal?: AbortSignal;
  correlationId: string;
}

export interface EngineProbe {
  available: boolean;
  version?: string;
  error?: string;
}

/**
 * One concurrent execution unit of the pool
 */
export interface EngineSlot {
  id: number;
  workdir: string;
  jobId: string | null;
  invocations: number;
}

/**
 * Scheduler statistics
 * Tracks job execution and pool state for observability
 */
export interface SchedulerStats {
  /** Number of slots */
  capacity: number;
  /** Jobs currently RUNNING */
  activeJobs: number;
  /** Jobs waiting for a slot */
  queuedJobs: number;
  maxQueueDepth: number;
  /** Highest number of simultaneously RUNNING jobs observed */
  peakActiveJobs: number;
  totalSubmitted: number;
  succeededJobs: number;
  failedJobs: number;
  timedOutJobs: number;
  cancelledJobs: number;
  /** Submissions refused with Overloaded */
  rejectedJobs: number;
  /** Automatic retries after engine crashes */
  retriedAttempts: number;
  accepting: boolean;
}

// Result store

export type ResultLookup =
  | { status: 'ready'; job: ConversionJob; artifact: Artifact }
  | { status: 'failed'; job: ConversionJob }
  | { status: 'not_ready' }
  | { status: 'not_found' };

export interface ResultStoreStats {
  pendingJobs: number;
  storedJobs: number;
  storedArtifacts: number;
  currentBytes: number;
  maxBytes: number;
  expired: number;
  evicted: number;
  deleted: number;
}

// Template Cache Types

/**
 * Cache entry for a template
 * Template files are treated as immutable once read, so no TTL
 */
export interface TemplateCacheEntry {
  templateId: string;
  template: StoredTemplate;
  sizeBytes: number;
  cachedAt: number; // Unix timestamp in milliseconds
  lastAccessedAt: number; // For LRU eviction
}

export interface TemplateCacheStats {
  hits: number;
  misses: number;
  evictions: number;
  currentSize: number; // bytes
  entryCount: number;
}

export interface StoredTemplate {
  templateId: string;
  bytes: Buffer;
  contentType: string;
  extension: string;
}

/**
 * Options for template merging
 */
export interface MergeOptions {
  locale: string;
  timezone: string;
}
