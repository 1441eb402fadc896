export {
  BatchRunner,
  chunkArray,
  progressBar,
  DEFAULT_CONCURRENCY,
  type BatchConfig,
  type BatchProgress,
  type BatchResult,
} from './batch-runner.js';
export { CancellationToken } from './cancellation.js';
