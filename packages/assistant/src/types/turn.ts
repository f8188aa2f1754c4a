export type TurnRole = 'user' | 'assistant' | 'tool';

export type ToolName = 'shell' | 'search';

type TurnBase = {
  readonly id: string;
  readonly content: string;
  /** Epoch milliseconds. */
  readonly timestamp: number;
};

export type UserTurn = TurnBase & { readonly role: 'user' };

export type AssistantTurn = TurnBase & { readonly role: 'assistant' };

export type ToolTurn = TurnBase & {
  readonly role: 'tool';
  readonly tool: ToolName;
};

export type Turn = UserTurn | AssistantTurn | ToolTurn;
