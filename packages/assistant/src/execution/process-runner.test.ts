import { describe, it, expect, afterEach, vi } from 'vitest';
import { CancelledByUserError, LaunchError } from '../errors.js';
import { createProcessRunner, type RunnerSettings } from './process-runner.js';

const settings: RunnerSettings = {
  timeoutMs: 5_000,
  maxOutputBytes: 64 * 1024,
  killGraceMs: 200,
  cwd: null,
};

describe('createProcessRunner', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('runShell', () => {
    it('captures stdout and a zero exit code', async () => {
      const result = await createProcessRunner(settings).runShell('echo hello');

      expect(result).toMatchObject({ exitCode: 0, stdout: 'hello\n', stderr: '', timedOut: false, truncated: false });
      expect(Object.isFrozen(result)).toBe(true);
    });

    it('reports a non-zero exit verbatim', async () => {
      const result = await createProcessRunner(settings).runShell('echo oops >&2; exit 3');

      expect(result.exitCode).toBe(3);
      expect(result.stderr).toBe('oops\n');
    });

    it('runs shell syntax such as pipes', async () => {
      const result = await createProcessRunner(settings).runShell("printf 'b\\na\\n' | sort");

      expect(result.stdout).toBe('a\nb\n');
    });

    it('caps each stream and flags the result as truncated', async () => {
      const runner = createProcessRunner({ ...settings, maxOutputBytes: 10 });

      const result = await runner.runShell("printf '%s' 0123456789abcdef");

      expect(result.stdout).toBe('0123456789');
      expect(result.truncated).toBe(true);
    });

    it('terminates on timeout and keeps the partial output', async () => {
      const runner = createProcessRunner({ ...settings, timeoutMs: 300, killGraceMs: 100 });

      const result = await runner.runShell('echo partial; sleep 5');

      expect(result.timedOut).toBe(true);
      expect(result.stdout).toBe('partial\n');
      expect(result.durationMs).toBeLessThan(3_000);
    }, 10_000);

    it('kills background children in the same process group', async () => {
      const runner = createProcessRunner({ ...settings, timeoutMs: 300, killGraceMs: 100 });
      const started = Date.now();

      const result = await runner.runShell('sleep 5 & sleep 5');

      expect(result.timedOut).toBe(true);
      expect(Date.now() - started).toBeLessThan(3_000);
    }, 10_000);

    it('terminates the process when the signal aborts', async () => {
      const controller = new AbortController();
      const pending = createProcessRunner(settings).runShell('sleep 5', { signal: controller.signal });
      setTimeout(() => controller.abort(), 100);

      const result = await pending;

      expect(result.timedOut).toBe(false);
      expect(result.durationMs).toBeLessThan(3_000);
    }, 10_000);

    it('refuses to start when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        createProcessRunner(settings).runShell('echo never', { signal: controller.signal }),
      ).rejects.toThrow(CancelledByUserError);
    });

    it('raises LaunchError when the working directory is missing', async () => {
      const runner = createProcessRunner({ ...settings, cwd: '/nonexistent/tuxmate-test-dir' });

      await expect(runner.runShell('ls')).rejects.toThrow(LaunchError);
    });

    it('keeps API keys out of the child environment', async () => {
      vi.stubEnv('TUXMATE_API_KEY', 'test-secret');
      vi.stubEnv('TUXMATE_GREETING', 'hi');

      const result = await createProcessRunner(settings).runShell(
        'printf "%s %s" "${TUXMATE_API_KEY:-unset}" "$TUXMATE_GREETING"',
      );

      expect(result.stdout).toBe('unset hi');
    });
  });

  describe('runArgv', () => {
    it('passes arguments without shell interpretation', async () => {
      const result = await createProcessRunner(settings).runArgv('printf', ['%s', '$(whoami); ls']);

      expect(result.stdout).toBe('$(whoami); ls');
    });

    it('raises LaunchError with the code for a missing binary', async () => {
      const error = await createProcessRunner(settings)
        .runArgv('tuxmate-no-such-binary', ['--json'])
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(LaunchError);
      expect(error).toMatchObject({ code: 'ENOENT', command: 'tuxmate-no-such-binary --json' });
    });
  });
});
