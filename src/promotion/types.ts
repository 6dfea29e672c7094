/**
 * Promotion domain types.
 *
 * Everything here lives for a single CLI invocation. The CI system and the
 * registry are the source of truth; nothing in this module is persisted.
 */

export const ENVIRONMENTS = ['dev', 'staging', 'prod'] as const;

export type Environment = (typeof ENVIRONMENTS)[number];

export type PromotionMode = 'normal' | 'emergency';

export type DispatchMethod = 'full-pipeline' | 're-tag-promote';

export const DISPATCH_METHODS: readonly DispatchMethod[] = ['full-pipeline', 're-tag-promote'];

export type ApprovalTier =
  | 'none'
  | 'interactive-confirm'
  | 'interactive-confirm+typed-phrase'
  | 'remote-approval-gate';

export function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((env) => env === value);
}

export function isDispatchMethod(value: string): value is DispatchMethod {
  return DISPATCH_METHODS.some((method) => method === value);
}

/** Rank used for display ordering: dev < staging < prod. */
export function environmentRank(env: Environment): number {
  return ENVIRONMENTS.indexOf(env);
}

// ───── Commits ─────

/** A parsed, user-supplied commit reference. */
export type CommitRef =
  | { kind: 'current' }
  | { kind: 'full'; hash: string }
  | { kind: 'short'; prefix: string }
  | { kind: 'tag'; tag: string };

export type CommitSource =
  | 'current'
  | 'local-history'
  | 'trunk-history'
  | 'release'
  | 'deployment-history'
  | 'manual';

export interface ResolvedCommit {
  /** Canonical 40-character lowercase hex identifier */
  hash: string;
  /** First 8 hex characters; the short form used for image tags and display */
  shortHash: string;
  /** Commit subject, or "Release: <tag>" */
  label?: string;
  source: CommitSource;
}

/** A candidate whose identifier could not be verified as a full hash. */
export interface PartialCandidate {
  id: string;
  label?: string;
  source: CommitSource;
}

export type CandidateSet =
  | {
      status: 'ok';
      commits: ResolvedCommit[];
      partial: PartialCandidate[];
      failedSources: string[];
    }
  | {
      status: 'empty';
      partial: PartialCandidate[];
      failedSources: string[];
    };

// ───── Deployment history ─────

export type DeploymentOutcome = 'success' | 'failure' | 'pending';

export interface DeploymentRecord {
  runId: number;
  runNumber: number;
  createdAt: string;
  /** 8-character short form */
  commit: string;
  /** Full head SHA reported by the CI system */
  headSha: string;
  environment: Environment;
  outcome: DeploymentOutcome;
  title: string;
  workflow: string;
  url?: string;
}

// ───── Images ─────

export interface ImageReference {
  registry: string;
  repository: string;
  tag: string;
}

export type ImageCheck =
  | { status: 'verified' }
  | { status: 'unverified'; reason: string };

// ───── Decisions ─────

export interface ApprovalPolicy {
  environment: Environment;
  mode: PromotionMode;
  tiers: ApprovalTier[];
  /** Step-2 token, required verbatim */
  confirmToken?: string;
  /** Step-3 phrase for prod, distinct from confirmToken */
  secondPhrase?: string;
  /** Staging emergency path: only the confirm token, no extra prose */
  reduced: boolean;
}

export interface WorkflowTarget {
  /** Workflow display name, file name or numeric id */
  workflow: string;
  /** Extra inputs added to commit_sha */
  inputs: Record<string, string>;
  /** The workflow itself blocks on a human approval (issue/ticket) */
  enforcesApproval: boolean;
  /** The workflow re-tags an existing image rather than building one */
  requiresExistingImage: boolean;
}

export interface PromotionDecision {
  environment: Environment;
  mode: PromotionMode;
  method: DispatchMethod;
  from?: DeploymentRecord;
  to: ResolvedCommit;
  image: ImageReference;
  imageCheck: ImageCheck;
  policy: ApprovalPolicy;
  target: WorkflowTarget;
}

export interface DispatchHandle {
  workflow: string;
  inputs: Record<string, string>;
  url: string;
  dispatchedAt: string;
}

export type PromotionOutcome =
  | { status: 'dispatched'; decision: PromotionDecision; handle: DispatchHandle }
  | { status: 'declined'; decision?: PromotionDecision; reason: string };
