export {
  classifyModelError,
  createModelGateway,
  toMessages,
  type GatewayOptions,
  type ModelGateway,
  type ModelRequest,
} from './gateway.js';
export { createLoggingMiddleware } from './logging-middleware.js';
export { createModelClient } from './client.js';
