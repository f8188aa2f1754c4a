import type { ExecutionResult } from '../types/index.js';

/** The TOOL turn text for a command that ran. */
export function formatExecution(command: string, result: ExecutionResult): string {
  const status = result.timedOut
    ? `exit code: ${result.exitCode} (timed out after ${result.durationMs}ms)`
    : `exit code: ${result.exitCode}`;
  const lines = [`$ ${command}`, status];

  const stdout = result.stdout.trimEnd();
  const stderr = result.stderr.trimEnd();
  if (stdout !== '') {
    lines.push('stdout:', stdout);
  }
  if (stderr !== '') {
    lines.push('stderr:', stderr);
  }
  if (stdout === '' && stderr === '') {
    lines.push('(no output)');
  }
  if (result.truncated) {
    lines.push('[output truncated]');
  }

  return lines.join('\n');
}

export function formatBlocked(command: string, reason: string): string {
  return `Command blocked: ${reason}\n$ ${command}`;
}

export function formatDenied(command: string): string {
  return `Command declined by the user\n$ ${command}`;
}

export function formatLaunchFailure(message: string): string {
  return `Command failed to start: ${message}`;
}
