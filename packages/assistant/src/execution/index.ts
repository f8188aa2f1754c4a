export { createProcessRunner, type ProcessRunner, type RunnerSettings, type RunOptions } from './process-runner.js';
export {
  createSearchClient,
  formatSearchOutput,
  parseHits,
  type SearchClient,
  type SearchHit,
  type SearchOutcome,
  type SearchSettings,
} from './search.js';
