import path from 'path';
import type {
  Artifact,
  ConversionJob,
  ConversionRequest,
  EngineInput,
  EngineSlot,
  JobErrorDetail,
  JobHandle,
  JobListener,
  JobPayload,
  JobState,
  PoolConfig,
  SchedulerStats,
  TerminalJobState,
} from '../types';
import {
  ServiceError,
  EngineCrashedError,
  EngineTimedOutError,
  InputTooLargeError,
  InternalError,
  JobCancelledError,
  OverloadedError,
  ServiceUnavailableError,
  ValidationError,
  wrapError,
} from '../errors';
import type { ConversionEngine } from '../engine/soffice';
import { abortError } from '../engine/soffice';
import { extensionForContentType, isTargetFormat } from '../engine/formats';
import { isValidTemplateId } from '../templates/store';
import { createLogger } from '../utils/logger';
import { trackGauge, trackMetric } from '../obs';
import { createJob, snapshot, transition } from './job';
import { DocumentPreparer, InputPreparer } from './preparer';
import { ResultStore } from './result-store';

const logger = createLogger('jobs:scheduler');

export interface SchedulerOptions {
  engine: ConversionEngine;
  store: ResultStore;
  preparer?: InputPreparer;
  pool: PoolConfig;
  /** Root of the per-slot directories */
  workdir: string;
  defaultTimeoutMs: number;
  maxTimeoutMs: number;
  maxInputBytes: number;
  locale?: string;
  timezone?: string;
}

export interface ShutdownOptions {
  /** Wait for outstanding jobs before cancelling them (default true) */
  drain?: boolean;
  drainTimeoutMs?: number;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

interface ActiveJob {
  job: ConversionJob;
  /** Dropped once the job is terminal */
  payload: JobPayload | null;
  controller: AbortController;
  completion: Deferred<ConversionJob>;
}

interface Counters {
  peakActiveJobs: number;
  totalSubmitted: number;
  succeededJobs: number;
  failedJobs: number;
  timedOutJobs: number;
  cancelledJobs: number;
  rejectedJobs: number;
  retriedAttempts: number;
}

/**
 * Bounded pool of engine slots fed from a FIFO queue
 *
 * Every mutation of the queue and the slot table happens synchronously
 * between awaits, so the event loop is the only lock. A job holds its slot
 * until the engine call has settled, which for a killed process means after
 * the process has closed.
 *
 * @example
 * ```typescript
 * const scheduler = new ConversionScheduler({ engine, store, pool, workdir, ... });
 * const handle = scheduler.submit({ input: { kind: 'template', templateId: 'invoice' }, targetFormat: 'pdf' });
 * const job = await handle.done; // terminal snapshot
 * ```
 */
export class ConversionScheduler {
  private readonly slots: EngineSlot[];
  private readonly queue: ActiveJob[] = [];
  private readonly active = new Map<string, ActiveJob>();
  private readonly listeners = new Set<JobListener>();
  private readonly preparer: InputPreparer;
  private accepting = true;
  private counters: Counters = {
    peakActiveJobs: 0,
    totalSubmitted: 0,
    succeededJobs: 0,
    failedJobs: 0,
    timedOutJobs: 0,
    cancelledJobs: 0,
    rejectedJobs: 0,
    retriedAttempts: 0,
  };

  constructor(private readonly options: SchedulerOptions) {
    if (!Number.isInteger(options.pool.concurrency) || options.pool.concurrency <= 0) {
      throw new ValidationError(`pool concurrency must be a positive integer, got ${options.pool.concurrency}`);
    }
    this.preparer = options.preparer ?? new DocumentPreparer();
    this.slots = Array.from({ length: options.pool.concurrency }, (_, id) => ({
      id,
      workdir: path.join(options.workdir, `slot-${id}`),
      jobId: null,
      invocations: 0,
    }));

    logger.info(
      { concurrency: options.pool.concurrency, maxQueueDepth: options.pool.maxQueueDepth, workdir: options.workdir },
      'ConversionScheduler initialized'
    );
  }

  /**
   * Admit a job; never waits for a slot
   *
   * @throws ValidationError or InputTooLargeError for a malformed request
   * @throws OverloadedError when every slot is busy and the queue is full
   * @throws ServiceUnavailableError once shutdown has begun
   */
  submit(request: ConversionRequest): JobHandle {
    if (!this.accepting) {
      throw new ServiceUnavailableError('Scheduler is shutting down', { correlationId: request.correlationId });
    }

    this.validate(request);

    if (this.freeSlots() === 0 && this.queue.length >= this.options.pool.maxQueueDepth) {
      this.counters.rejectedJobs++;
      trackMetric('jobs_rejected_total', 1);
      logger.warn(
        { correlationId: request.correlationId, queuedJobs: this.queue.length, activeJobs: this.runningCount() },
        'Submission rejected, queue full'
      );
      throw new OverloadedError({ correlationId: request.correlationId });
    }

    const job = createJob(request, {
      timeoutMs: this.options.defaultTimeoutMs,
      locale: this.options.locale ?? 'en-US',
      timezone: this.options.timezone ?? 'UTC',
    });
    const entry: ActiveJob = {
      job,
      payload: { input: request.input, data: request.data },
      controller: new AbortController(),
      completion: deferred<ConversionJob>(),
    };

    this.options.store.reserve(job.id);
    this.active.set(job.id, entry);
    this.queue.push(entry);
    this.counters.totalSubmitted++;

    logger.info(
      { jobId: job.id, correlationId: job.correlationId, targetFormat: job.targetFormat, queuePosition: this.queue.length },
      'Job queued'
    );
    this.notify(job, null, 'QUEUED');
    this.dispatch();

    return {
      jobId: job.id,
      state: () => entry.job.state,
      done: entry.completion.promise,
    };
  }

  /**
   * Cancel a queued or running job
   *
   * A queued job is finished on the spot without touching the engine. A
   * running job's signal is aborted; it turns CANCELLED once the engine has
   * killed its process.
   *
   * @returns false for unknown or already terminal jobs
   */
  cancel(jobId: string): boolean {
    const entry = this.active.get(jobId);
    if (!entry) {
      return false;
    }

    const { job } = entry;
    if (job.state === 'QUEUED') {
      const index = this.queue.indexOf(entry);
      if (index >= 0) {
        this.queue.splice(index, 1);
      }
      const error = new JobCancelledError('Job cancelled before it started', { jobId, correlationId: job.correlationId });
      this.complete(entry, 'CANCELLED', null, error.toJobError());
      logger.info({ jobId, correlationId: job.correlationId }, 'Queued job cancelled');
      return true;
    }

    if (!entry.controller.signal.aborted) {
      logger.info({ jobId, correlationId: job.correlationId }, 'Cancelling running job');
      entry.controller.abort(new JobCancelledError('Job cancelled while running', { jobId, correlationId: job.correlationId }));
    }
    return true;
  }

  /**
   * Snapshot of a job, active or stored; null when unknown or expired
   */
  getJob(jobId: string): ConversionJob | null {
    const entry = this.active.get(jobId);
    if (entry) {
      return snapshot(entry.job);
    }
    const lookup = this.options.store.get(jobId);
    return lookup.status === 'ready' || lookup.status === 'failed' ? lookup.job : null;
  }

  /**
   * Resolve with the job once it is terminal or after waitMs, whichever
   * comes first
   */
  async waitFor(jobId: string, waitMs: number): Promise<ConversionJob | null> {
    const entry = this.active.get(jobId);
    if (!entry || waitMs <= 0) {
      return this.getJob(jobId);
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), waitMs);
    });
    try {
      const finished = await Promise.race([entry.completion.promise, timeout]);
      return finished ?? this.getJob(jobId);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Register a listener for every state change
   *
   * @returns function that removes the listener
   */
  subscribe(listener: JobListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  getStats(): SchedulerStats {
    return {
      capacity: this.slots.length,
      activeJobs: this.runningCount(),
      queuedJobs: this.queue.length,
      maxQueueDepth: this.options.pool.maxQueueDepth,
      ...this.counters,
      accepting: this.accepting,
    };
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Stop admitting work, optionally drain, then cancel whatever is left and
   * wait for its slots to be released
   */
  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    const drain = options.drain ?? true;
    const drainTimeoutMs = options.drainTimeoutMs ?? this.options.pool.drainTimeoutMs;
    this.accepting = false;

    logger.info({ drain, drainTimeoutMs, outstanding: this.active.size }, 'Scheduler shutting down');

    if (drain && this.active.size > 0) {
      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, drainTimeoutMs);
      });
      try {
        await Promise.race([Promise.all(this.outstanding()), deadline]);
      } finally {
        clearTimeout(timer);
      }
    }

    for (const jobId of [...this.active.keys()]) {
      this.cancel(jobId);
    }
    await Promise.all(this.outstanding());

    logger.info({ stats: this.getStats() }, 'Scheduler stopped');
  }

  private outstanding(): Promise<ConversionJob>[] {
    return [...this.active.values()].map((entry) => entry.completion.promise);
  }

  private runningCount(): number {
    return this.slots.filter((slot) => slot.jobId !== null).length;
  }

  private freeSlots(): number {
    return this.slots.length - this.runningCount();
  }

  private validate(request: ConversionRequest): void {
    const context = { correlationId: request.correlationId };

    if (!isTargetFormat(request.targetFormat)) {
      throw new ValidationError(`Unsupported target format: ${String(request.targetFormat)}`, context);
    }

    if (request.timeoutMs !== undefined) {
      const { timeoutMs } = request;
      if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > this.options.maxTimeoutMs) {
        throw new ValidationError(
          `timeoutMs must be a positive integer no larger than ${this.options.maxTimeoutMs}`,
          context
        );
      }
    }

    const { input } = request;
    if (input.kind === 'template') {
      if (!isValidTemplateId(input.templateId)) {
        throw new ValidationError('templateId must match ^[A-Za-z0-9_-]{1,128}$', context);
      }
    } else {
      if (!Buffer.isBuffer(input.bytes) || input.bytes.length === 0) {
        throw new ValidationError('document is empty', context);
      }
      if (input.bytes.length > this.options.maxInputBytes) {
        throw new InputTooLargeError(this.options.maxInputBytes, input.bytes.length, context);
      }
      if (!extensionForContentType(input.contentType)) {
        throw new ValidationError(`Unsupported content type: ${input.contentType}`, context);
      }
      if (request.data !== undefined) {
        throw new ValidationError('data can only be merged into templates', context);
      }
    }

    if (request.data !== undefined && (typeof request.data !== 'object' || request.data === null || Array.isArray(request.data))) {
      throw new ValidationError('data must be an object', context);
    }

    try {
      new Intl.DateTimeFormat(request.locale, { timeZone: request.timezone });
    } catch {
      throw new ValidationError(`Invalid locale or timezone: ${request.locale ?? ''} ${request.timezone ?? ''}`.trim(), context);
    }
  }

  /**
   * Hand free slots to the oldest queued jobs
   */
  private dispatch(): void {
    for (const slot of this.slots) {
      if (slot.jobId !== null) {
        continue;
      }
      const entry = this.queue.shift();
      if (!entry) {
        break;
      }

      slot.jobId = entry.job.id;
      transition(entry.job, 'RUNNING');
      this.counters.peakActiveJobs = Math.max(this.counters.peakActiveJobs, this.runningCount());
      logger.info({ jobId: entry.job.id, correlationId: entry.job.correlationId, slot: slot.id }, 'Job started');
      this.notify(entry.job, 'QUEUED', 'RUNNING');

      this.run(entry, slot).catch((error: unknown) => {
        logger.error({ jobId: entry.job.id, error: error instanceof Error ? error.message : String(error) }, 'Job runner failed');
      });
    }
    this.reportGauges();
  }

  private async run(entry: ActiveJob, slot: EngineSlot): Promise<void> {
    const { job, controller } = entry;
    const deadline = Date.now() + job.timeoutMs;
    const watchdog = setTimeout(() => {
      controller.abort(new EngineTimedOutError(job.timeoutMs, { jobId: job.id, correlationId: job.correlationId }));
    }, job.timeoutMs);

    let artifact: Artifact | null = null;
    let failure: ServiceError | null = null;

    try {
      if (!entry.payload) {
        throw new InternalError('job started without its payload', { jobId: job.id });
      }
      const input = await this.preparer.prepare(job, entry.payload);
      if (controller.signal.aborted) {
        throw abortError(controller.signal);
      }
      artifact = await this.execute(entry, slot, input, deadline);
    } catch (error) {
      failure = controller.signal.aborted
        ? abortError(controller.signal)
        : wrapError(error, { jobId: job.id, correlationId: job.correlationId });
    } finally {
      clearTimeout(watchdog);
    }

    slot.jobId = null;
    if (artifact) {
      this.complete(entry, 'SUCCEEDED', artifact, null);
    } else {
      const error = failure ?? new InternalError('engine returned no artifact', { jobId: job.id });
      this.complete(entry, terminalStateFor(error), null, error.toJobError());
    }
    this.dispatch();
  }

  /**
   * Run the engine, repeating once (by default) after a crash with a fresh
   * invocation directory in the same slot
   */
  private async execute(entry: ActiveJob, slot: EngineSlot, input: EngineInput, deadline: number): Promise<Artifact> {
    const { job, controller } = entry;
    const retries = this.options.pool.engineCrashRetries;

    for (let attempt = 1; ; attempt++) {
      job.attempts = attempt;
      slot.invocations++;
      try {
        return await this.options.engine.execute({
          artifactId: job.id,
          input,
          targetFormat: job.targetFormat,
          timeoutMs: Math.max(1, Math.ceil(deadline - Date.now())),
          workdir: slot.workdir,
          signal: controller.signal,
          correlationId: job.correlationId,
        });
      } catch (error) {
        if (!(error instanceof EngineCrashedError) || attempt > retries || controller.signal.aborted) {
          throw error;
        }
        this.counters.retriedAttempts++;
        trackMetric('retries_total', 1, { targetFormat: job.targetFormat });
        logger.warn(
          { jobId: job.id, correlationId: job.correlationId, attempt, error: error.message },
          'Engine crashed, retrying'
        );
      }
    }
  }

  /**
   * Make a job terminal, hand it to the result store and wake its waiters
   */
  private complete(entry: ActiveJob, to: TerminalJobState, artifact: Artifact | null, error: JobErrorDetail | null): void {
    const { job } = entry;
    const from = job.state;

    transition(job, to, { resultRef: artifact?.id, error: error ?? undefined });
    entry.payload = null;
    this.options.store.put(job, artifact);
    this.active.delete(job.id);
    this.count(to);

    const durationMs = job.startedAt && job.finishedAt ? job.finishedAt.getTime() - job.startedAt.getTime() : 0;
    if (from === 'RUNNING') {
      trackMetric('conversion_duration_ms', durationMs, { targetFormat: job.targetFormat, state: to });
    }
    if (to !== 'SUCCEEDED') {
      trackMetric('conversion_failures_total', 1, { state: to, code: error?.code ?? 'unknown' });
    }

    const log = to === 'SUCCEEDED' || to === 'CANCELLED' ? logger.info.bind(logger) : logger.warn.bind(logger);
    log(
      { jobId: job.id, correlationId: job.correlationId, state: to, attempts: job.attempts, durationMs, error: error?.message },
      'Job finished'
    );

    this.notify(job, from, to);
    entry.completion.resolve(snapshot(job));
    this.reportGauges();
  }

  private count(state: TerminalJobState): void {
    switch (state) {
      case 'SUCCEEDED':
        this.counters.succeededJobs++;
        break;
      case 'FAILED':
        this.counters.failedJobs++;
        break;
      case 'TIMED_OUT':
        this.counters.timedOutJobs++;
        break;
      case 'CANCELLED':
        this.counters.cancelledJobs++;
        break;
    }
  }

  private notify(job: ConversionJob, from: JobState | null, to: JobState): void {
    for (const listener of this.listeners) {
      try {
        listener(snapshot(job), from, to);
      } catch (error) {
        logger.error({ jobId: job.id, error: error instanceof Error ? error.message : String(error) }, 'Job listener threw');
      }
    }
  }

  private reportGauges(): void {
    trackGauge('pool_active', this.runningCount());
    trackGauge('pool_queued', this.queue.length);
  }
}

function terminalStateFor(error: ServiceError): TerminalJobState {
  if (error instanceof EngineTimedOutError) {
    return 'TIMED_OUT';
  }
  if (error instanceof JobCancelledError) {
    return 'CANCELLED';
  }
  return 'FAILED';
}
