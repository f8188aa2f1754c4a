export {
  createDispatcher,
  type DispatchOptions,
  type DispatchSettings,
  type Dispatcher,
  type DispatcherDeps,
} from './dispatcher.js';
export { formatBlocked, formatDenied, formatExecution, formatLaunchFailure } from './format.js';
