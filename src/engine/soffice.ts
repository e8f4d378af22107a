import { promises as fs, createWriteStream } from 'fs';
import path from 'path';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import { pathToFileURL } from 'url';
import type { Artifact, EngineProbe, EngineRequest } from '../types';
import {
  ServiceError,
  EngineCrashedError,
  EngineInvalidOutputError,
  EngineTimedOutError,
  EngineUnavailableError,
  JobCancelledError,
  ValidationError,
} from '../errors';
import { createLogger } from '../utils/logger';
import { trackDependency } from '../obs';
import { FORMATS, verifyOutput } from './formats';
import { createArtifact } from './artifact';
import { runProcess, ProcessOutcome, ProcessRunner } from './process';

const logger = createLogger('engine:soffice');

const PROBE_CACHE_MS = 30000;
const STDERR_TAIL = 2000;

/**
 * One conversion per call; the scheduler decides when and where
 */
export interface ConversionEngine {
  execute(request: EngineRequest): Promise<Artifact>;
  probe(): Promise<EngineProbe>;
}

export interface SofficeEngineOptions {
  binary: string;
  maxTimeoutMs: number;
  probeTimeoutMs: number;
  runner?: ProcessRunner;
}

/**
 * Error to throw once the request's signal has fired
 *
 * The scheduler aborts with a typed reason (its watchdog uses
 * EngineTimedOutError); anything else counts as a cancellation.
 */
export function abortError(signal: AbortSignal): ServiceError {
  return signal.reason instanceof ServiceError ? signal.reason : new JobCancelledError('Job cancelled');
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL ? trimmed.slice(-STDERR_TAIL) : trimmed;
}

/**
 * LibreOffice engine wrapper
 *
 * Each call gets a fresh directory under the slot's workdir holding the
 * input, the output directory and a private user profile (concurrent soffice
 * processes sharing a profile block each other on its lock file). The
 * directory is removed on every exit path.
 *
 * @example
 * ```typescript
 * const engine = new SofficeEngine({ binary: 'soffice', maxTimeoutMs: 120000, probeTimeoutMs: 15000 });
 * const artifact = await engine.execute({
 *   artifactId: jobId,
 *   input: { source: docxBuffer, contentType, extension: 'docx' },
 *   targetFormat: 'pdf',
 *   timeoutMs: 30000,
 *   workdir: '/tmp/docforge/slot-0',
 *   correlationId,
 * });
 * ```
 */
export class SofficeEngine implements ConversionEngine {
  private readonly runner: ProcessRunner;
  private lastProbe: { at: number; result: EngineProbe } | null = null;

  constructor(private readonly options: SofficeEngineOptions) {
    this.runner = options.runner ?? runProcess;
  }

  async execute(request: EngineRequest): Promise<Artifact> {
    const { timeoutMs, correlationId, signal } = request;
    const context = { jobId: request.artifactId, correlationId, targetFormat: request.targetFormat };

    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0 || timeoutMs > this.options.maxTimeoutMs) {
      throw new ValidationError(
        `timeoutMs must be a positive integer no larger than ${this.options.maxTimeoutMs}, got ${timeoutMs}`,
        context
      );
    }
    if (!Buffer.isBuffer(request.input.source) && !(request.input.source instanceof Readable)) {
      throw new ValidationError('Engine input must be a Buffer or a readable stream', context);
    }
    if (signal?.aborted) {
      throw abortError(signal);
    }

    const format = FORMATS[request.targetFormat];
    const startTime = Date.now();
    await fs.mkdir(request.workdir, { recursive: true });
    const invocationDir = await fs.mkdtemp(path.join(request.workdir, 'run-'));

    try {
      const inputPath = path.join(invocationDir, `input.${request.input.extension}`);
      const outDir = path.join(invocationDir, 'out');
      await fs.mkdir(outDir);
      await this.writeInput(inputPath, request.input.source);

      const args = [
        '--headless',
        '--norestore',
        '--nolockcheck',
        '--nodefault',
        '--nofirststartwizard',
        `-env:UserInstallation=${pathToFileURL(path.join(invocationDir, 'profile')).href}`,
        '--convert-to',
        format.filter,
        '--outdir',
        outDir,
        inputPath,
      ];

      logger.debug({ ...context, args, timeoutMs }, 'Starting engine');
      const outcome = await this.runner(this.options.binary, args, {
        cwd: invocationDir,
        timeoutMs,
        signal,
      });
      this.classify(outcome, request, context);

      const outputPath = path.join(outDir, `input.${format.extension}`);
      const bytes = await this.readOutput(outputPath, outcome, context);
      const problem = await verifyOutput(bytes, format.format);
      if (problem) {
        throw new EngineInvalidOutputError(problem, { ...context, sizeBytes: bytes.length });
      }

      const artifact = createArtifact(request.artifactId, bytes, format.format);
      const duration = Date.now() - startTime;
      trackDependency({
        type: 'LibreOffice',
        name: `soffice --convert-to ${format.format}`,
        duration,
        success: true,
        correlationId,
      });
      logger.info({ ...context, sizeBytes: artifact.sizeBytes, duration }, 'Engine conversion succeeded');
      return artifact;
    } catch (error) {
      trackDependency({
        type: 'LibreOffice',
        name: `soffice --convert-to ${format.format}`,
        duration: Date.now() - startTime,
        success: false,
        correlationId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    } finally {
      await this.cleanup(invocationDir, correlationId);
    }
  }

  /**
   * Run `soffice --version`; successful results are reused for a short while
   */
  async probe(): Promise<EngineProbe> {
    if (this.lastProbe && this.lastProbe.result.available && Date.now() - this.lastProbe.at < PROBE_CACHE_MS) {
      return this.lastProbe.result;
    }

    const outcome = await this.runner(this.options.binary, ['--version'], {
      timeoutMs: this.options.probeTimeoutMs,
    });

    let result: EngineProbe;
    if (outcome.spawnError) {
      result = { available: false, error: `${this.options.binary}: ${outcome.spawnError.message}` };
    } else if (outcome.timedOut) {
      result = { available: false, error: `version check timed out after ${this.options.probeTimeoutMs}ms` };
    } else if (outcome.exitCode !== 0) {
      result = { available: false, error: `version check exited with ${outcome.exitCode ?? outcome.signal}` };
    } else {
      result = { available: true, version: outcome.stdout.trim().split('\n')[0] };
    }

    this.lastProbe = { at: Date.now(), result };
    return result;
  }

  private async writeInput(inputPath: string, source: Buffer | Readable): Promise<void> {
    if (Buffer.isBuffer(source)) {
      await fs.writeFile(inputPath, source);
      return;
    }
    await pipeline(source, createWriteStream(inputPath));
  }

  /**
   * Turn an abnormal process outcome into the matching error
   */
  private classify(outcome: ProcessOutcome, request: EngineRequest, context: Record<string, unknown>): void {
    if (outcome.spawnError) {
      throw new EngineUnavailableError(`${this.options.binary}: ${outcome.spawnError.message}`, context);
    }
    if (outcome.aborted && request.signal) {
      throw abortError(request.signal);
    }
    if (outcome.timedOut) {
      throw new EngineTimedOutError(request.timeoutMs, context);
    }
    if (outcome.exitCode !== 0) {
      const reason = outcome.signal ? `killed by ${outcome.signal}` : `exit code ${outcome.exitCode}`;
      logger.warn({ ...context, exitCode: outcome.exitCode, signal: outcome.signal, stderr: tail(outcome.stderr) }, 'Engine exited abnormally');
      throw new EngineCrashedError(reason, {
        ...context,
        exitCode: outcome.exitCode,
        signal: outcome.signal,
        stderr: tail(outcome.stderr),
      });
    }
  }

  private async readOutput(outputPath: string, outcome: ProcessOutcome, context: Record<string, unknown>): Promise<Buffer> {
    try {
      return await fs.readFile(outputPath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        // soffice exits 0 when it could not load the input
        throw new EngineCrashedError('exited cleanly without producing output', {
          ...context,
          exitCode: outcome.exitCode,
          stderr: tail(outcome.stderr),
        });
      }
      throw error;
    }
  }

  private async cleanup(dir: string, correlationId: string): Promise<void> {
    try {
      await fs.rm(dir, { recursive: true, force: true });
    } catch (error) {
      logger.warn(
        { correlationId, dir, error: error instanceof Error ? error.message : String(error) },
        'Failed to clean up invocation directory'
      );
    }
  }
}
