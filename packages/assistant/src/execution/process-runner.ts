import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { constants } from 'node:os';
import { CancelledByUserError, ExecutionTimeoutError, LaunchError } from '../errors.js';
import { silentLogger, type Logger } from '../logging/index.js';
import type { ExecutionResult } from '../types/index.js';

export type RunnerSettings = {
  readonly timeoutMs: number;
  /** Cap per stream; stdout and stderr are counted separately. */
  readonly maxOutputBytes: number;
  /** Delay between SIGTERM and SIGKILL once the deadline passes. */
  readonly killGraceMs: number;
  readonly cwd: string | null;
};

export type RunOptions = {
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
};

export type ProcessRunner = {
  /** Runs `command` through the system shell. */
  readonly runShell: (command: string, options?: RunOptions) => Promise<ExecutionResult>;
  /** Runs `file` with a fixed argv; nothing is interpreted by a shell. */
  readonly runArgv: (file: string, args: ReadonlyArray<string>, options?: RunOptions) => Promise<ExecutionResult>;
};

// Credentials the assistant itself holds stay out of the commands it runs.
const SENSITIVE_PATTERNS = [/_API_KEY$/i, /_SECRET$/i, /_TOKEN$/i, /_PASSWORD$/i, /_CREDENTIALS?$/i];

function childEnv(): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && !SENSITIVE_PATTERNS.some((pattern) => pattern.test(key))) {
      env[key] = value;
    }
  }
  return env;
}

type Capture = {
  readonly chunks: Buffer[];
  bytes: number;
};

export function createProcessRunner(settings: RunnerSettings, logger: Logger = silentLogger): ProcessRunner {
  function run(
    label: string,
    start: () => ChildProcess,
    options: RunOptions = {},
  ): Promise<ExecutionResult> {
    const timeoutMs = options.timeoutMs ?? settings.timeoutMs;
    const signal = options.signal;

    if (signal?.aborted) {
      return Promise.reject(new CancelledByUserError('Cancelled before the command started'));
    }

    return new Promise((resolve, reject) => {
      const startTime = Date.now();
      const stdout: Capture = { chunks: [], bytes: 0 };
      const stderr: Capture = { chunks: [], bytes: 0 };
      let truncated = false;
      let timedOut = false;
      let settled = false;
      let timeoutHandle: NodeJS.Timeout | null = null;
      let killHandle: NodeJS.Timeout | null = null;

      let proc: ChildProcess;
      try {
        proc = start();
      } catch (error) {
        reject(new LaunchError(label, toError(error), errorCode(error)));
        return;
      }

      const pid = proc.pid;

      const capture = (target: Capture) => (data: Buffer) => {
        const room = settings.maxOutputBytes - target.bytes;
        if (room <= 0) {
          truncated = true;
          return;
        }
        const kept = data.length > room ? data.subarray(0, room) : data;
        if (kept.length < data.length) {
          truncated = true;
        }
        target.chunks.push(kept);
        target.bytes += kept.length;
      };

      proc.stdout?.on('data', capture(stdout));
      proc.stderr?.on('data', capture(stderr));

      const killGroup = (sig: NodeJS.Signals) => {
        if (pid === undefined) {
          return;
        }
        try {
          // negative pid: the whole process group started by `detached`
          process.kill(-pid, sig);
        } catch (error) {
          if (errorCode(error) !== 'ESRCH') {
            logger.warn('process_kill_failed', { pid, signal: sig, error: toError(error) });
          }
        }
      };

      const terminate = () => {
        killGroup('SIGTERM');
        killHandle = setTimeout(() => killGroup('SIGKILL'), settings.killGraceMs);
      };

      const onAbort = () => {
        logger.info('process_cancelled', { command: label, pid });
        terminate();
      };

      const cleanup = () => {
        settled = true;
        if (timeoutHandle) clearTimeout(timeoutHandle);
        if (killHandle) clearTimeout(killHandle);
        signal?.removeEventListener('abort', onAbort);
      };

      timeoutHandle = setTimeout(() => {
        timedOut = true;
        logger.warn('command_timed_out', { error: new ExecutionTimeoutError(label, timeoutMs), pid });
        terminate();
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      proc.on('error', (error) => {
        if (settled) {
          return;
        }
        cleanup();
        reject(new LaunchError(label, error, errorCode(error)));
      });

      // 'close' rather than 'exit': both pipes are drained by then
      proc.on('close', (code, exitSignal) => {
        if (settled) {
          return;
        }
        cleanup();

        const result: ExecutionResult = Object.freeze({
          exitCode: code ?? signalExitCode(exitSignal),
          stdout: Buffer.concat(stdout.chunks).toString('utf8'),
          stderr: Buffer.concat(stderr.chunks).toString('utf8'),
          durationMs: Date.now() - startTime,
          timedOut,
          truncated,
        });
        logger.debug('process_finished', {
          command: label,
          exitCode: result.exitCode,
          durationMs: result.durationMs,
          timedOut,
          truncated,
        });
        resolve(result);
      });
    });
  }

  const spawnOptions = (): SpawnOptions => ({
    detached: true,
    cwd: settings.cwd ?? undefined,
    env: childEnv(),
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  return {
    runShell: (command, options) =>
      run(command, () => spawn(command, [], { ...spawnOptions(), shell: true }), options),
    runArgv: (file, args, options) =>
      run([file, ...args].join(' '), () => spawn(file, [...args], spawnOptions()), options),
  };
}

/** Shell convention: a process killed by signal N exits with 128 + N. */
function signalExitCode(signal: NodeJS.Signals | null): number {
  const number = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return number === undefined ? 1 : 128 + number;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

function errorCode(value: unknown): string | null {
  if (value instanceof Error && 'code' in value && typeof value.code === 'string') {
    return value.code;
  }
  return null;
}
