import type { Artifact, ConversionJob, ResultLookup, ResultStoreConfig, ResultStoreStats } from '../types';
import { InternalError } from '../errors';
import { createLogger } from '../utils/logger';
import { trackGauge, trackMetric } from '../obs';
import { isTerminal, snapshot } from './job';

const logger = createLogger('jobs:result-store');

interface StoredResult {
  job: ConversionJob;
  artifact: Artifact | null;
  completedAt: number;
}

function copyArtifact(artifact: Artifact): Artifact {
  return Object.freeze({ ...artifact, bytes: Buffer.from(artifact.bytes) });
}

/**
 * Terminal jobs and their artifacts, kept for a TTL after completion
 *
 * Job ids are reserved on admission so lookups can tell NotReady (known,
 * still active) from NotFound (unknown or expired). Map insertion order is
 * completion order, which the byte budget uses to evict oldest first.
 */
export class ResultStore {
  private readonly pending = new Set<string>();
  private readonly results = new Map<string, StoredResult>();
  private currentBytes = 0;
  private expiredCount = 0;
  private evictedCount = 0;
  private deletedCount = 0;
  private sweeper: NodeJS.Timeout | null = null;

  constructor(
    private readonly config: ResultStoreConfig,
    private readonly clock: () => number = Date.now
  ) {}

  /**
   * Mark a job id as admitted; lookups answer not_ready until put()
   */
  reserve(jobId: string): void {
    this.pending.add(jobId);
  }

  /**
   * Record a terminal job, with its artifact when it succeeded
   */
  put(job: ConversionJob, artifact: Artifact | null): void {
    if (!isTerminal(job.state)) {
      throw new InternalError(`cannot store job in state ${job.state}`, { jobId: job.id });
    }
    if (job.state === 'SUCCEEDED' && (!artifact || artifact.id !== job.resultRef)) {
      throw new InternalError('succeeded job stored without its artifact', { jobId: job.id });
    }
    if (job.state !== 'SUCCEEDED' && artifact) {
      throw new InternalError(`${job.state} job stored with an artifact`, { jobId: job.id });
    }

    this.remove(job.id);
    this.pending.delete(job.id);
    this.results.set(job.id, { job: snapshot(job), artifact, completedAt: this.clock() });
    this.currentBytes += artifact ? artifact.sizeBytes : 0;

    this.enforceBudget(job.id);
    trackGauge('result_store_bytes', this.currentBytes);
  }

  get(jobId: string): ResultLookup {
    if (this.pending.has(jobId)) {
      return { status: 'not_ready' };
    }

    const entry = this.results.get(jobId);
    if (!entry) {
      return { status: 'not_found' };
    }
    if (this.isExpired(entry, this.clock())) {
      this.remove(jobId);
      this.expiredCount++;
      return { status: 'not_found' };
    }

    if (entry.artifact) {
      return { status: 'ready', job: snapshot(entry.job), artifact: copyArtifact(entry.artifact) };
    }
    return { status: 'failed', job: snapshot(entry.job) };
  }

  /**
   * Remove a stored result; reservations of active jobs are left alone
   */
  delete(jobId: string): boolean {
    if (!this.remove(jobId)) {
      return false;
    }
    this.deletedCount++;
    logger.debug({ jobId }, 'Result deleted');
    return true;
  }

  /**
   * Purge every entry whose TTL has elapsed
   *
   * @returns number of purged entries
   */
  expire(now: number = this.clock()): number {
    let purged = 0;
    for (const [jobId, entry] of this.results) {
      if (this.isExpired(entry, now)) {
        this.remove(jobId);
        purged++;
      }
    }

    if (purged > 0) {
      this.expiredCount += purged;
      trackMetric('results_expired_total', purged);
      trackGauge('result_store_bytes', this.currentBytes);
      logger.info({ purged, remaining: this.results.size, currentBytes: this.currentBytes }, 'Expired results purged');
    }
    return purged;
  }

  startSweeper(): void {
    if (this.sweeper) {
      return;
    }
    this.sweeper = setInterval(() => this.expire(), this.config.sweepIntervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = null;
    }
  }

  getStats(): ResultStoreStats {
    let storedArtifacts = 0;
    for (const entry of this.results.values()) {
      if (entry.artifact) storedArtifacts++;
    }
    return {
      pendingJobs: this.pending.size,
      storedJobs: this.results.size,
      storedArtifacts,
      currentBytes: this.currentBytes,
      maxBytes: this.config.maxBytes,
      expired: this.expiredCount,
      evicted: this.evictedCount,
      deleted: this.deletedCount,
    };
  }

  private isExpired(entry: StoredResult, now: number): boolean {
    return now - entry.completedAt >= this.config.ttlMs;
  }

  private remove(jobId: string): boolean {
    const entry = this.results.get(jobId);
    if (!entry) {
      return false;
    }
    this.results.delete(jobId);
    this.currentBytes -= entry.artifact ? entry.artifact.sizeBytes : 0;
    return true;
  }

  /**
   * Evict oldest completed entries until the artifact bytes fit; the entry
   * just stored is never evicted
   */
  private enforceBudget(keep: string): void {
    if (this.currentBytes <= this.config.maxBytes) {
      return;
    }
    for (const [jobId, entry] of this.results) {
      if (this.currentBytes <= this.config.maxBytes) {
        break;
      }
      if (jobId === keep || !entry.artifact) {
        continue;
      }
      this.remove(jobId);
      this.evictedCount++;
      logger.warn({ jobId, sizeBytes: entry.artifact.sizeBytes, currentBytes: this.currentBytes }, 'Result evicted (byte budget)');
    }
  }
}
