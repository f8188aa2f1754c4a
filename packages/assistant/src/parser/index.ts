export * from './parse-reply.js';
