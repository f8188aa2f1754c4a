import type { RejectionKind } from '../errors.js';
import type { ExecutionResult } from './execution.js';
import type { ToolCall } from './tool-call.js';

export type DispatchStage =
  | 'idle'
  | 'awaiting_model_reply'
  | 'parsing'
  | 'plain_text_done'
  | 'validating'
  | 'awaiting_confirmation'
  | 'executing'
  | 'summarizing'
  | 'done'
  | 'cancelled';

export type DispatchOutcome =
  | { readonly kind: 'displayed'; readonly text: string }
  | {
      readonly kind: 'executed';
      readonly call: ToolCall;
      readonly result: ExecutionResult;
      readonly summary: string | null;
    }
  | { readonly kind: 'rejected'; readonly reason: string; readonly failure: RejectionKind }
  | { readonly kind: 'cancelled' };
