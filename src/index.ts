/**
 * Release promoter
 *
 * Library entry point. The CLI lives in ./cli/index.ts; everything it uses is
 * exported here for programmatic use.
 */

export * from './promotion/index.js';
export { loadPromotionConfig, splitRepository, DEFAULTS, MAX_CANDIDATE_LIMIT } from './config/PromotionConfig.js';
export type { PromotionConfig, StoredPreferences } from './config/PromotionConfig.js';
export type {
  CiExecutionSystem,
  CommitEntry,
  ImageRegistry,
  ListRunsOptions,
  ReleaseMappingProvider,
  VcsHistoryProvider,
  WorkflowRun,
} from './providers/types.js';
export { GitClient, GitError } from './providers/GitClient.js';
export { GitHubClient } from './providers/GitHubClient.js';
export type { GitHubClientOptions } from './providers/GitHubClient.js';
export { RegistryClient, parseBearerChallenge } from './providers/RegistryClient.js';
export type { RegistryClientOptions } from './providers/RegistryClient.js';
export { initializeLogging, getLogger, shutdownLogging, LogLevel } from './logging/index.js';
