import { spawn } from 'child_process';

const DEFAULT_MAX_OUTPUT_BYTES = 1024 * 1024;

export interface ProcessOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs: number;
  signal?: AbortSignal;
  /** stdout/stderr beyond this many bytes are dropped */
  maxOutputBytes?: number;
}

export interface SpawnFailure {
  code?: string;
  message: string;
}

export interface ProcessOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
  /** Set when the executable could not be started */
  spawnError?: SpawnFailure;
  durationMs: number;
}

/**
 * Runs one external process to completion; never rejects
 */
export type ProcessRunner = (command: string, args: readonly string[], options: ProcessOptions) => Promise<ProcessOutcome>;

function toSpawnFailure(error: Error): SpawnFailure {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return { code, message: error.message };
}

/**
 * Keeps the first `limit` bytes of a stream
 */
class OutputCapture {
  private readonly chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.size;
    if (room <= 0) {
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  text(): string {
    return Buffer.concat(this.chunks, this.size).toString('utf8');
  }
}

/**
 * Spawn a process in its own process group and wait for it to close
 *
 * On timeout or abort the whole group gets SIGKILL, so helpers the process
 * forked die with it, even after the direct child has exited while they
 * still hold its pipes. The promise settles only once the process has closed.
 * Output is captured up to `maxOutputBytes` bytes per stream.
 */
export const runProcess: ProcessRunner = (command, args, options) =>
  new Promise<ProcessOutcome>((resolve) => {
    const startedAt = Date.now();
    const limit = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const { signal } = options;

    if (signal?.aborted) {
      resolve({ exitCode: null, signal: null, stdout: '', stderr: '', timedOut: false, aborted: true, durationMs: 0 });
      return;
    }

    const stdout = new OutputCapture(limit);
    const stderr = new OutputCapture(limit);
    let timedOut = false;
    let aborted = false;
    let spawnError: SpawnFailure | undefined;
    let settled = false;

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      env: options.env ?? process.env,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    // The group outlives its leader, so it is signalled until close
    const kill = (): void => {
      if (settled || child.pid === undefined) {
        return;
      }
      try {
        process.kill(-child.pid, 'SIGKILL');
      } catch {
        // Group already gone or not ours; fall back to the direct child
        if (child.exitCode === null && child.signalCode === null) {
          child.kill('SIGKILL');
        }
      }
    };

    const onAbort = (): void => {
      aborted = true;
      kill();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      kill();
    }, options.timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    const finish = (exitCode: number | null, exitSignal: NodeJS.Signals | null): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve({
        exitCode,
        signal: exitSignal,
        stdout: stdout.text(),
        stderr: stderr.text(),
        timedOut,
        aborted,
        spawnError,
        durationMs: Date.now() - startedAt,
      });
    };

    child.stdout?.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr?.on('data', (chunk: Buffer) => stderr.push(chunk));

    child.on('error', (error) => {
      spawnError = toSpawnFailure(error);
      // Without a pid there is no process whose close event could follow
      if (child.pid === undefined) {
        finish(null, null);
      }
    });

    child.on('close', (code, exitSignal) => finish(code, exitSignal));
  });
