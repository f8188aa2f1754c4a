export type ShellCall = {
  readonly tool: 'shell';
  readonly command: string;
  readonly explanation: string;
};

export type SearchCall = {
  readonly tool: 'search';
  readonly query: string;
};

export type ToolCall = ShellCall | SearchCall;

export type ParsedReply =
  | {
      readonly kind: 'plain_text';
      readonly text: string;
      /** Set when the reply opened like a tool payload but did not parse as one. */
      readonly malformed: string | null;
    }
  | { readonly kind: 'tool_call'; readonly call: ToolCall };
