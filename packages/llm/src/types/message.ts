import type { Role } from './content.js';

export type Message = {
  readonly role: Role;
  readonly content: string;
};

export function systemMessage(text: string): Message {
  return {
    role: 'system',
    content: text,
  };
}

export function userMessage(content: string): Message {
  return {
    role: 'user',
    content,
  };
}

export function assistantMessage(content: string): Message {
  return {
    role: 'assistant',
    content,
  };
}
