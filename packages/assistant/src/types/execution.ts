export type ExecutionResult = {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly timedOut: boolean;
  readonly truncated: boolean;
};

export type ValidationVerdict =
  | { readonly kind: 'safe'; readonly advisory: boolean }
  | { readonly kind: 'requires_confirmation'; readonly reason: string }
  | { readonly kind: 'blocked'; readonly reason: string };

export type ConfirmationRequest = {
  readonly command: string;
  readonly explanation: string;
  readonly reason: string;
};

/**
 * Resolves true to approve. The signal aborts when the dispatch cycle is
 * cancelled; the handler should drop the request then.
 */
export type ConfirmationHandler = (request: ConfirmationRequest, signal?: AbortSignal) => Promise<boolean>;
