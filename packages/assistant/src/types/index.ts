export type * from './turn.js';
export type * from './tool-call.js';
export type * from './execution.js';
export type * from './outcome.js';
