export type FailureKind =
  | 'malformed_tool_payload'
  | 'command_blocked'
  | 'confirmation_denied'
  | 'launch_error'
  | 'execution_timeout'
  | 'model_unavailable'
  | 'model_timeout'
  | 'cancelled_by_user';

/** Failure kinds that end a dispatch cycle with a Rejected outcome. */
export type RejectionKind = Extract<
  FailureKind,
  'command_blocked' | 'confirmation_denied' | 'launch_error' | 'model_unavailable' | 'model_timeout'
>;

export abstract class AssistantError extends Error {
  abstract readonly kind: FailureKind;
  override name: string;
  override readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = this.constructor.name;
    this.cause = cause;
  }
}

export class MalformedToolPayloadError extends AssistantError {
  readonly kind = 'malformed_tool_payload';
}

export class CommandBlockedError extends AssistantError {
  readonly kind = 'command_blocked';
  readonly command: string;

  constructor(command: string, reason: string) {
    super(reason);
    this.command = command;
  }
}

export class ConfirmationDeniedError extends AssistantError {
  readonly kind = 'confirmation_denied';
  readonly command: string;

  constructor(command: string) {
    super(`The user declined to run: ${command}`);
    this.command = command;
  }
}

/** The child process never started: missing binary, EACCES, bad cwd. */
export class LaunchError extends AssistantError {
  readonly kind = 'launch_error';
  readonly command: string;
  readonly code: string | null;

  constructor(command: string, cause: Error, code: string | null = null) {
    super(`Could not start \`${command}\`: ${cause.message}`, cause);
    this.command = command;
    this.code = code;
  }
}

export class ExecutionTimeoutError extends AssistantError {
  readonly kind = 'execution_timeout';
  readonly timeoutMs: number;

  constructor(command: string, timeoutMs: number) {
    super(`\`${command}\` was terminated after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class ModelUnavailableError extends AssistantError {
  readonly kind = 'model_unavailable';
}

export class ModelTimeoutError extends AssistantError {
  readonly kind = 'model_timeout';
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number, cause?: Error) {
    super(message, cause);
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledByUserError extends AssistantError {
  readonly kind = 'cancelled_by_user';

  constructor(message: string = 'Cancelled by user') {
    super(message);
  }
}
