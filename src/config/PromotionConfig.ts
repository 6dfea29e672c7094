/**
 * Promotion Configuration
 *
 * Merges environment variables, the CLI preference store and defaults into a
 * single frozen value. The value is built once per invocation and handed to
 * every component's constructor; nothing reads configuration from module
 * state afterwards.
 *
 * Precedence: environment variable > stored preference > default.
 */

import { z } from 'zod';
import { InvalidConfigurationError } from '../promotion/errors.js';
import { ENVIRONMENTS } from '../promotion/types.js';
import type { Environment } from '../promotion/types.js';
import {
  DEFAULT_HISTORY_WORKFLOWS,
  buildWorkflowTable,
} from '../promotion/workflows.js';
import type { WorkflowNameOverrides, WorkflowTable } from '../promotion/workflows.js';

/**
 * Preferences persisted by `promote-cli config set`. Every field is optional;
 * missing fields fall back to defaults.
 */
export interface StoredPreferences {
  repo?: string;
  apiUrl?: string;
  registry?: string;
  imageRepository?: string;
  trunkBranch?: string;
  dispatchRef?: string;
  candidateLimit?: number;
  historyLimit?: number;
  workflows?: WorkflowNameOverrides;
  historyWorkflows?: Partial<Record<Environment, string[]>>;
}

export interface PromotionConfig {
  /** GitHub repository hosting the workflows, "owner/name" */
  repository: string;
  apiUrl: string;
  /** API token (GITHUB_TOKEN or GH_TOKEN) */
  token?: string;
  registry: {
    host: string;
    /** Image repository path, e.g. "acme/web" for ghcr.io/acme/web */
    repository: string;
    username?: string;
    token?: string;
  };
  trunkBranch: string;
  /** Git ref the dispatched workflows run on */
  dispatchRef: string;
  candidateLimit: number;
  historyQueryLimit: number;
  httpTimeoutMs: number;
  runUrlDelayMs: number;
  maxSelectionAttempts: number;
  workflows: WorkflowTable;
  historyWorkflows: Record<Environment, string[]>;
}

export const DEFAULTS = {
  apiUrl: 'https://api.github.com',
  registry: 'ghcr.io',
  trunkBranch: 'origin/main',
  dispatchRef: 'main',
  candidateLimit: 15,
  historyQueryLimit: 5,
  httpTimeoutMs: 30000,
  runUrlDelayMs: 2000,
  maxSelectionAttempts: 3,
} as const;

/** Upper bound on the candidate list; beyond this interactive selection stops being usable */
export const MAX_CANDIDATE_LIMIT = 20;

const repositoryPattern = /^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/;

const configSchema = z.object({
  repository: z
    .string({ required_error: 'Repository not configured: set PROMOTE_REPO or run `promote-cli config set repo <owner/name>`' })
    .regex(repositoryPattern, 'Repository must look like "owner/name"'),
  apiUrl: z.string().url(),
  token: z.string().min(1).optional(),
  registry: z.object({
    host: z.string().min(1).regex(/^[^/\s]+$/, 'Registry host must not contain a path'),
    repository: z.string().min(1).regex(/^[a-z0-9._/-]+$/, 'Image repository must be lowercase'),
    username: z.string().min(1).optional(),
    token: z.string().min(1).optional(),
  }),
  trunkBranch: z.string().min(1),
  dispatchRef: z.string().min(1),
  candidateLimit: z.number().int().min(1).max(MAX_CANDIDATE_LIMIT),
  historyQueryLimit: z.number().int().min(2).max(100),
  httpTimeoutMs: z.number().int().positive(),
  runUrlDelayMs: z.number().int().min(0),
  maxSelectionAttempts: z.number().int().min(1),
});

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? fallback : parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function buildHistoryWorkflows(
  overrides: Partial<Record<Environment, string[]>> = {}
): Record<Environment, string[]> {
  const result = { ...DEFAULT_HISTORY_WORKFLOWS };
  for (const env of ENVIRONMENTS) {
    const list = overrides[env];
    if (list && list.length > 0) {
      result[env] = [...list];
    }
  }
  return result;
}

/**
 * Build the effective configuration. Throws InvalidConfigurationError listing
 * every problem found.
 */
export function loadPromotionConfig(
  env: Env = process.env,
  stored: StoredPreferences = {}
): Readonly<PromotionConfig> {
  const repository = nonEmpty(env['PROMOTE_REPO']) ?? stored.repo;
  const token = nonEmpty(env['GITHUB_TOKEN']) ?? nonEmpty(env['GH_TOKEN']);

  const raw = {
    repository,
    apiUrl: (nonEmpty(env['PROMOTE_API_URL']) ?? stored.apiUrl ?? DEFAULTS.apiUrl).replace(/\/+$/, ''),
    token,
    registry: {
      host: nonEmpty(env['PROMOTE_REGISTRY']) ?? stored.registry ?? DEFAULTS.registry,
      repository:
        nonEmpty(env['PROMOTE_IMAGE_REPOSITORY']) ?? stored.imageRepository ?? repository?.toLowerCase() ?? '',
      username: nonEmpty(env['PROMOTE_REGISTRY_USER']),
      token: nonEmpty(env['PROMOTE_REGISTRY_TOKEN']) ?? token,
    },
    trunkBranch: nonEmpty(env['PROMOTE_TRUNK_BRANCH']) ?? stored.trunkBranch ?? DEFAULTS.trunkBranch,
    dispatchRef: nonEmpty(env['PROMOTE_DISPATCH_REF']) ?? stored.dispatchRef ?? DEFAULTS.dispatchRef,
    candidateLimit: parseNumber(env['PROMOTE_CANDIDATE_LIMIT'], stored.candidateLimit ?? DEFAULTS.candidateLimit),
    historyQueryLimit: parseNumber(env['PROMOTE_HISTORY_LIMIT'], stored.historyLimit ?? DEFAULTS.historyQueryLimit),
    httpTimeoutMs: parseNumber(env['PROMOTE_HTTP_TIMEOUT'], DEFAULTS.httpTimeoutMs),
    runUrlDelayMs: parseNumber(env['PROMOTE_RUN_URL_DELAY'], DEFAULTS.runUrlDelayMs),
    maxSelectionAttempts: parseNumber(env['PROMOTE_SELECTION_ATTEMPTS'], DEFAULTS.maxSelectionAttempts),
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new InvalidConfigurationError(`Invalid configuration: ${issues[0] ?? 'unknown problem'}`, issues);
  }

  return Object.freeze({
    ...parsed.data,
    workflows: buildWorkflowTable(stored.workflows),
    historyWorkflows: buildHistoryWorkflows(stored.historyWorkflows),
  });
}

/** Owner/name split of the configured repository */
export function splitRepository(repository: string): { owner: string; name: string } {
  const [owner = '', name = ''] = repository.split('/');
  return { owner, name };
}
