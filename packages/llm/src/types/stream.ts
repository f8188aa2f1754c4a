import type { FinishReason, Usage } from './response.js';

export type StreamEventType = 'STREAM_START' | 'TEXT_DELTA' | 'THINKING_DELTA' | 'FINISH';

export type StreamStart = {
  readonly type: 'STREAM_START';
  readonly id: string;
  readonly model: string;
};

export type TextDelta = {
  readonly type: 'TEXT_DELTA';
  readonly text: string;
};

export type ThinkingDelta = {
  readonly type: 'THINKING_DELTA';
  readonly text: string;
};

export type Finish = {
  readonly type: 'FINISH';
  readonly finishReason: FinishReason;
  readonly usage: Usage;
};

export type StreamEvent = StreamStart | TextDelta | ThinkingDelta | Finish;
