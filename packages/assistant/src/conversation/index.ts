export {
  createConversationState,
  MAX_HISTORY_LIMIT,
  type ConversationOptions,
  type ConversationSnapshot,
  type ConversationState,
} from './state.js';
export { createAssistantTurn, createToolTurn, createUserTurn, type Clock } from './turns.js';
