/**
 * CLI-specific type definitions
 */

/**
 * Global CLI options available on all commands
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  /** Overrides PROMOTE_REPO and the stored repo for this invocation */
  repo?: string;
}

/**
 * Keys `promote-cli config set` accepts, mapped onto StoredPreferences
 */
export type ConfigKey =
  | 'repo'
  | 'apiUrl'
  | 'registry'
  | 'imageRepository'
  | 'trunkBranch'
  | 'dispatchRef'
  | 'candidateLimit'
  | 'historyLimit';

export interface PromoteCommandOptions {
  method?: string;
  emergency?: boolean;
}

export interface HistoryCommandOptions {
  limit?: string;
}

export interface CandidatesCommandOptions {
  limit?: string;
}
