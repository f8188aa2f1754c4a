export * from './truncate.js';
