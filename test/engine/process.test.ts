import { describe, it, expect } from '@jest/globals';
import { runProcess } from '../../src/engine/process';

const node = process.execPath;

describe('runProcess', () => {
  it('should capture output and the exit code', async () => {
    const outcome = await runProcess(
      node,
      ['-e', 'process.stdout.write("out"); process.stderr.write("err"); process.exit(3)'],
      { timeoutMs: 5000 }
    );

    expect(outcome.exitCode).toBe(3);
    expect(outcome.signal).toBeNull();
    expect(outcome.stdout).toBe('out');
    expect(outcome.stderr).toBe('err');
    expect(outcome.timedOut).toBe(false);
    expect(outcome.aborted).toBe(false);
    expect(outcome.spawnError).toBeUndefined();
  });

  it('should kill a process that outlives its timeout', async () => {
    const startedAt = Date.now();

    const outcome = await runProcess(node, ['-e', 'setTimeout(() => {}, 10000)'], { timeoutMs: 200 });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe('SIGKILL');
    expect(Date.now() - startedAt).toBeLessThan(5000);
  });

  it('should kill children left holding the pipes after the process exited', async () => {
    const startedAt = Date.now();

    const outcome = await runProcess('sh', ['-c', 'sleep 4 & exit 0'], { timeoutMs: 300 });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).toBe(0);
    expect(Date.now() - startedAt).toBeLessThan(1500);
  });

  it('should kill the process when the signal aborts', async () => {
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 100);

    const outcome = await runProcess(node, ['-e', 'setTimeout(() => {}, 10000)'], {
      timeoutMs: 5000,
      signal: controller.signal,
    });

    expect(outcome.aborted).toBe(true);
    expect(outcome.timedOut).toBe(false);
    expect(outcome.signal).toBe('SIGKILL');
  });

  it('should not spawn when the signal has already fired', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await runProcess(node, ['-e', 'process.exit(0)'], { timeoutMs: 5000, signal: controller.signal });

    expect(outcome).toMatchObject({ aborted: true, exitCode: null, durationMs: 0 });
  });

  it('should report a missing executable without rejecting', async () => {
    const outcome = await runProcess('definitely-not-an-installed-binary', ['--version'], { timeoutMs: 1000 });

    expect(outcome.spawnError?.code).toBe('ENOENT');
    expect(outcome.exitCode).toBeNull();
  });

  it('should cap captured output', async () => {
    const outcome = await runProcess(node, ['-e', 'process.stdout.write("x".repeat(1000000))'], {
      timeoutMs: 5000,
      maxOutputBytes: 10,
    });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.stdout).toBe('x'.repeat(10));
  });

  it('should cap output by bytes rather than characters', async () => {
    const outcome = await runProcess(node, ['-e', 'process.stderr.write("é".repeat(100))'], {
      timeoutMs: 5000,
      maxOutputBytes: 6,
    });

    expect(outcome.stderr).toBe('ééé');
  });
});
