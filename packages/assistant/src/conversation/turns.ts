import { nanoid } from 'nanoid';
import type { AssistantTurn, ToolName, ToolTurn, UserTurn } from '../types/index.js';

export type Clock = () => number;

export function createUserTurn(content: string, now: Clock = Date.now): UserTurn {
  return Object.freeze({ id: nanoid(), role: 'user', content, timestamp: now() });
}

export function createAssistantTurn(content: string, now: Clock = Date.now): AssistantTurn {
  return Object.freeze({ id: nanoid(), role: 'assistant', content, timestamp: now() });
}

export function createToolTurn(tool: ToolName, content: string, now: Clock = Date.now): ToolTurn {
  return Object.freeze({ id: nanoid(), role: 'tool', tool, content, timestamp: now() });
}
