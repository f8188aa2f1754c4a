// @tuxmate/assistant: tool-use dispatch and command execution core

export * from './types/index.js';
export * from './errors.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './parser/index.js';
export * from './validation/index.js';
export * from './execution/index.js';
export * from './truncation/index.js';
export * from './conversation/index.js';
export * from './prompts/index.js';
export * from './model/index.js';
export * from './dispatch/index.js';
export * from './session/index.js';
