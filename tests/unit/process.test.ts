import { ChildProcessExecutor, Semaphore } from '../../src/utils/process.js';
import { ProcessError } from '../../src/types.js';

const node = process.execPath;

describe('Semaphore', () => {
  it('should reject a non-positive limit', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
  });

  it('should queue acquirers beyond the limit until a slot is released', async () => {
    const slots = new Semaphore(1);
    const releaseFirst = await slots.acquire();

    let secondAcquired = false;
    const second = slots.acquire().then(release => {
      secondAcquired = true;
      return release;
    });
    await Promise.resolve();

    expect(secondAcquired).toBe(false);
    expect(slots.pending).toBe(1);

    releaseFirst();
    const releaseSecond = await second;

    expect(secondAcquired).toBe(true);
    expect(slots.running).toBe(1);
    expect(slots.pending).toBe(0);

    releaseSecond();
    expect(slots.running).toBe(0);
  });

  it('should ignore a second release from the same holder', async () => {
    const slots = new Semaphore(2);
    const release = await slots.acquire();
    await slots.acquire();

    release();
    release();

    expect(slots.running).toBe(1);
  });
});

describe('ChildProcessExecutor', () => {
  const executor = new ChildProcessExecutor({ defaultTimeoutMs: 10_000, maxConcurrent: 2 });

  it('should capture stdout as raw bytes and stderr as text', async () => {
    const result = await executor.execute(node, [
      '-e',
      'process.stdout.write(Buffer.from([0, 255, 10])); process.stderr.write("warn")',
    ]);

    expect(result.exitCode).toBe(0);
    expect([...result.stdout]).toEqual([0, 255, 10]);
    expect(result.stderr).toBe('warn');
  });

  it('should reject with NonZeroExit and keep stderr', async () => {
    const error = await executor
      .execute(node, ['-e', 'process.stderr.write("error: closed"); process.exit(3)'])
      .then(
        () => undefined,
        (reason: unknown) => reason
      );

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({
      failure: 'NonZeroExit',
      exitCode: 3,
      stderr: 'error: closed',
      message: 'Command exited with code 3: error: closed',
    });
  });

  it('should keep stdout of a command that exits non-zero', async () => {
    await expect(
      executor.execute(node, ['-e', 'process.stdout.write("partial"); process.exit(1)'])
    ).rejects.toMatchObject({ failure: 'NonZeroExit', exitCode: 1, stdout: 'partial' });
  });

  it('should not fire the timeout early for delays beyond the timer range', async () => {
    const result = await executor.execute(node, ['-e', 'process.stdout.write("ok")'], { timeoutMs: 3_000_000_000 });

    expect(result.stdout.toString('utf-8')).toBe('ok');
  });

  it('should reject with NotFound for a missing executable', async () => {
    await expect(executor.execute('/nonexistent/bin/adb', ['devices'])).rejects.toMatchObject({
      kind: 'ProcessError',
      failure: 'NotFound',
      message: 'Executable not found: /nonexistent/bin/adb',
    });
  });

  it('should kill the process and reject with TimedOut', async () => {
    const started = Date.now();

    await expect(
      executor.execute(node, ['-e', 'setTimeout(() => {}, 30000)'], { timeoutMs: 200 })
    ).rejects.toMatchObject({ failure: 'TimedOut' });
    expect(Date.now() - started).toBeLessThan(10_000);
  });

  it('should run the process in the given working directory', async () => {
    const cwd = process.cwd();
    const result = await executor.execute(node, ['-e', 'process.stdout.write(process.cwd())'], { cwd });

    expect(result.stdout.toString('utf-8')).toBe(cwd);
  });
});
