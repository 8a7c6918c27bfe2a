/**
 * Service exports
 */

export { AstutoService } from './astuto';
export { GitHubIssueReader } from './github';
export {
  PostPublisher,
  buildMarkerIndex,
  classifyDestinationError,
  extractSourceUrl,
  formatPostDescription,
  markerFor,
} from './publisher';
export { createIssueReader, logSyncSummary, runSync } from './syncDriver';
export type { SyncDependencies } from './syncDriver';
