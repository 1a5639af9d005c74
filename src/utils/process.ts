import { spawn } from 'child_process';
import { ProcessError } from '../types.js';

// setTimeout fires immediately for delays above this
export const MAX_TIMER_MS = 2 ** 31 - 1;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

export interface ProcessResult {
  stdout: Buffer;
  stderr: string;
  exitCode: number;
}

export interface ExecuteOptions {
  cwd?: string;
  timeoutMs?: number;
}

export interface ProcessExecutor {
  execute(command: string, args: string[], options?: ExecuteOptions): Promise<ProcessResult>;
}

// Caps how many external processes run at once across all connections
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<() => void> {
    if (this.active < this.limit) {
      this.active++;
    } else {
      // the releasing holder hands its slot over, so active stays unchanged
      await new Promise<void>(resolve => this.waiters.push(resolve));
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    };
  }
}

function describeCommand(command: string, args: string[]): string {
  return [command, ...args].join(' ');
}

export class ChildProcessExecutor implements ProcessExecutor {
  private readonly slots: Semaphore;

  constructor(private readonly options: { defaultTimeoutMs: number; maxConcurrent: number }) {
    this.slots = new Semaphore(options.maxConcurrent);
  }

  async execute(
    command: string,
    args: string[],
    options: ExecuteOptions = {}
  ): Promise<ProcessResult> {
    const release = await this.slots.acquire();
    try {
      const timeoutMs = Math.min(options.timeoutMs ?? this.options.defaultTimeoutMs, MAX_TIMER_MS);
      return await this.run(command, args, timeoutMs, options.cwd);
    } finally {
      release();
    }
  }

  private run(command: string, args: string[], timeoutMs: number, cwd?: string): Promise<ProcessResult> {
    const commandLine = describeCommand(command, args);

    return new Promise((resolve, reject) => {
      const child = spawn(command, args, { cwd, stdio: ['ignore', 'pipe', 'pipe'] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;
      let settled = false;

      const settle = (error: ProcessError | undefined, result?: ProcessResult) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else if (result) {
          resolve(result);
        }
      };

      const timer = setTimeout(() => {
        timedOut = true;
        child.kill('SIGKILL');
      }, timeoutMs);

      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

      // 'exit' is not guaranteed after a spawn failure, so settle here
      child.on('error', (error: NodeJS.ErrnoException) => {
        if (child.exitCode === null && child.pid !== undefined) {
          child.kill('SIGKILL');
        }
        settle(
          error.code === 'ENOENT'
            ? new ProcessError('NotFound', `Executable not found: ${command}`, {
                command: commandLine,
              })
            : new ProcessError('NonZeroExit', `Failed to run ${command}: ${error.message}`, {
                command: commandLine,
              })
        );
      });

      // 'close' fires once the process has exited and its pipes are drained
      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        const stderrText = Buffer.concat(stderr).toString('utf-8');

        if (timedOut) {
          settle(
            new ProcessError('TimedOut', `Command timed out after ${timeoutMs}ms: ${commandLine}`, {
              command: commandLine,
              timeoutMs,
              stderr: stderrText,
            })
          );
          return;
        }

        const exitCode = code ?? -1;
        if (exitCode !== 0) {
          const reason = stderrText.trim() || (signal ? `terminated by ${signal}` : 'no output');
          settle(
            new ProcessError('NonZeroExit', `Command exited with code ${exitCode}: ${reason}`, {
              command: commandLine,
              exitCode,
              stdout: Buffer.concat(stdout).toString('utf-8'),
              stderr: stderrText,
            })
          );
          return;
        }

        settle(undefined, { stdout: Buffer.concat(stdout), stderr: stderrText, exitCode });
      });
    });
  }
}
