export { createSession, type Session, type SessionOptions } from './session.js';
export { startWorker, type ExecutionWorker, type WorkerEvent } from './worker.js';
export { createConfirmationGate, type ConfirmationGate, type PendingConfirmation } from './confirmation-gate.js';
export { createEventChannel, type EventChannel } from './events.js';
