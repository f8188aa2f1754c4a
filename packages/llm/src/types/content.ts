export type Role = 'system' | 'user' | 'assistant';

export type ContentKind = 'TEXT' | 'THINKING';

export type TextData = {
  readonly kind: 'TEXT';
  readonly text: string;
};

export type ThinkingData = {
  readonly kind: 'THINKING';
  readonly text: string;
};

export type ContentPart = TextData | ThinkingData;
