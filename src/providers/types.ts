/**
 * Capability interfaces for the external systems the orchestrator consults.
 *
 * The orchestration core depends only on these; GitClient, GitHubClient and
 * RegistryClient are the production implementations and tests substitute
 * in-memory fakes.
 */

import type { DeploymentOutcome, ImageReference } from '../promotion/types.js';

export interface CommitEntry {
  hash: string;
  subject: string;
}

export interface VcsHistoryProvider {
  /** Full hash of the checked-out HEAD. Rejects when there is no repository. */
  head(): Promise<string>;
  currentBranch(): Promise<string>;
  /** Newest-first commits reachable from `ref` (HEAD when omitted). */
  log(ref: string | undefined, limit: number): Promise<CommitEntry[]>;
  hasCommit(hash: string): Promise<boolean>;
  /** Every known commit whose full hash starts with `prefix`. */
  findByPrefix(prefix: string): Promise<string[]>;
  subject(hash: string): Promise<string | undefined>;
}

export interface ReleaseMappingProvider {
  /** Newest-first release tag names */
  listTags(limit: number): Promise<string[]>;
  /** Full commit hash a tag points to; rejects with NotFoundError when unknown */
  tagCommit(tag: string): Promise<string>;
}

export interface WorkflowRun {
  id: number;
  runNumber: number;
  createdAt: string;
  headSha: string;
  title: string;
  outcome: DeploymentOutcome;
  url?: string;
}

export interface ListRunsOptions {
  status?: 'success';
  limit: number;
}

export interface CiExecutionSystem {
  listRuns(workflow: string, options: ListRunsOptions): Promise<WorkflowRun[]>;
  dispatch(workflow: string, inputs: Record<string, string>): Promise<void>;
  /** Monitoring URL for the newest manually dispatched run, if one can be found */
  latestDispatchUrl(workflow: string): Promise<string | undefined>;
  /** Page listing runs of the workflow; used when no run URL is available */
  workflowPageUrl(workflow: string): string;
}

export interface ImageRegistry {
  /** Rejects with RegistryUnreachableError when the registry cannot answer */
  exists(ref: ImageReference): Promise<boolean>;
}
