/**
 * GitHub Client
 *
 * Wraps axios for the two GitHub capabilities the orchestrator uses:
 * - release mapping (releases + git tag refs)
 * - CI execution (Actions workflow runs and workflow_dispatch)
 *
 * Workflows can be addressed by display name ("CD • Production (manual
 * approval)"), file name ("prod-manual.yml") or numeric id. Responses are
 * validated with zod; anything unexpected is reported as the executor being
 * unavailable rather than passed on half-parsed.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import { ExecutorUnavailableError, NotFoundError } from '../promotion/errors.js';
import type { DeploymentOutcome } from '../promotion/types.js';
import type {
  CiExecutionSystem,
  ListRunsOptions,
  ReleaseMappingProvider,
  WorkflowRun,
} from './types.js';

export interface GitHubClientOptions {
  /** "owner/name" */
  repository: string;
  apiUrl: string;
  token?: string;
  timeoutMs: number;
  /** Git ref dispatched workflows run on */
  dispatchRef: string;
  verbose?: boolean;
}

const workflowSchema = z.object({
  id: z.number(),
  name: z.string(),
  path: z.string(),
});

const workflowListSchema = z.object({
  workflows: z.array(workflowSchema),
});

const runSchema = z.object({
  id: z.number(),
  run_number: z.number(),
  created_at: z.string(),
  head_sha: z.string(),
  display_title: z.string().optional(),
  name: z.string().nullish(),
  status: z.string().nullish(),
  conclusion: z.string().nullish(),
  html_url: z.string().optional(),
});

const runListSchema = z.object({
  workflow_runs: z.array(runSchema),
});

const releaseListSchema = z.array(z.object({ tag_name: z.string() }));

const gitObjectSchema = z.object({
  object: z.object({
    sha: z.string(),
    type: z.string(),
  }),
});

type RunPayload = z.infer<typeof runSchema>;

/** Annotated tags may point at other tags; stop following after this many hops */
const MAX_TAG_DEPTH = 5;

export function toOutcome(run: Pick<RunPayload, 'status' | 'conclusion'>): DeploymentOutcome {
  if (run.conclusion === 'success') return 'success';
  if (run.status && run.status !== 'completed') return 'pending';
  return 'failure';
}

/** https://api.github.com -> https://github.com; GHES https://host/api/v3 -> https://host */
export function webUrlFor(apiUrl: string): string {
  const trimmed = apiUrl.replace(/\/+$/, '');
  if (trimmed === 'https://api.github.com') return 'https://github.com';
  return trimmed.replace(/\/api\/v3$/, '');
}

function basename(path: string): string {
  const index = path.lastIndexOf('/');
  return index === -1 ? path : path.slice(index + 1);
}

function isWorkflowFile(identifier: string): boolean {
  return /^[^\s/]+\.ya?ml$/.test(identifier);
}

export class GitHubClient implements CiExecutionSystem, ReleaseMappingProvider {
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly webUrl: string;
  /** identifier -> workflow file name, filled as workflows are resolved */
  private readonly workflowFiles = new Map<string, string>();
  private workflowList: Promise<Array<z.infer<typeof workflowSchema>>> | null = null;

  constructor(private readonly options: GitHubClientOptions) {
    this.logger = getLogger('github-client');
    this.webUrl = webUrlFor(options.apiUrl);

    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    if (options.token) {
      headers['Authorization'] = `Bearer ${options.token}`;
    }

    this.http = axios.create({
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      headers,
      // Status codes are mapped to typed errors in request()
      validateStatus: () => true,
    });

    if (options.verbose) {
      this.http.interceptors.request.use((config) => {
        this.logger.debug(`${config.method?.toUpperCase() ?? 'GET'} ${config.url ?? ''}`);
        return config;
      });
    }
  }

  private get repoPath(): string {
    return `/repos/${this.options.repository}`;
  }

  // ───── Release mapping ─────

  async listTags(limit: number): Promise<string[]> {
    const data = await this.request('GET', `${this.repoPath}/releases`, releaseListSchema, {
      params: { per_page: limit },
    });
    return data.slice(0, limit).map((release) => release.tag_name);
  }

  async tagCommit(tag: string): Promise<string> {
    let object: z.infer<typeof gitObjectSchema>['object'];
    try {
      ({ object } = await this.request(
        'GET',
        `${this.repoPath}/git/ref/tags/${encodeURIComponent(tag)}`,
        gitObjectSchema
      ));
    } catch (err) {
      if (err instanceof NotFoundError) {
        throw new NotFoundError('commit', tag, `Tag '${tag}' not found in ${this.options.repository}`);
      }
      throw err;
    }

    // Annotated tags point at a tag object, which in turn points at the commit
    for (let depth = 0; object.type === 'tag' && depth < MAX_TAG_DEPTH; depth++) {
      ({ object } = await this.request('GET', `${this.repoPath}/git/tags/${object.sha}`, gitObjectSchema));
    }

    if (object.type !== 'commit') {
      throw new NotFoundError('commit', tag, `Tag '${tag}' does not point to a commit (${object.type})`);
    }
    return object.sha.toLowerCase();
  }

  // ───── CI execution ─────

  async listRuns(workflow: string, options: ListRunsOptions): Promise<WorkflowRun[]> {
    const id = await this.resolveWorkflow(workflow);
    const params: Record<string, string | number> = { per_page: options.limit };
    if (options.status) params['status'] = options.status;

    const data = await this.request('GET', `${this.repoPath}/actions/workflows/${id}/runs`, runListSchema, {
      params,
    });

    return data.workflow_runs.slice(0, options.limit).map((run) => ({
      id: run.id,
      runNumber: run.run_number,
      createdAt: run.created_at,
      headSha: run.head_sha,
      title: run.display_title ?? run.name ?? '',
      outcome: toOutcome(run),
      ...(run.html_url ? { url: run.html_url } : {}),
    }));
  }

  async dispatch(workflow: string, inputs: Record<string, string>): Promise<void> {
    if (!this.options.token) {
      throw new ExecutorUnavailableError('A GitHub token is required to dispatch workflows (set GITHUB_TOKEN)');
    }
    const id = await this.resolveWorkflow(workflow);
    await this.request('POST', `${this.repoPath}/actions/workflows/${id}/dispatches`, z.unknown(), {
      data: { ref: this.options.dispatchRef, inputs },
    });
  }

  async latestDispatchUrl(workflow: string): Promise<string | undefined> {
    const id = await this.resolveWorkflow(workflow);
    const data = await this.request('GET', `${this.repoPath}/actions/workflows/${id}/runs`, runListSchema, {
      params: { event: 'workflow_dispatch', per_page: 1 },
    });
    return data.workflow_runs[0]?.html_url;
  }

  workflowPageUrl(workflow: string): string {
    const base = `${this.webUrl}/${this.options.repository}/actions`;
    const file = isWorkflowFile(workflow) ? workflow : this.workflowFiles.get(workflow);
    return file ? `${base}/workflows/${file}` : base;
  }

  /**
   * Map a workflow identifier to something the Actions API accepts in a path.
   */
  async resolveWorkflow(identifier: string): Promise<string> {
    if (/^\d+$/.test(identifier) || isWorkflowFile(identifier)) {
      return identifier;
    }

    const workflows = await this.listWorkflows();
    const match = workflows.find((w) => w.name === identifier || basename(w.path) === identifier);
    if (!match) {
      throw new NotFoundError(
        'workflow',
        identifier,
        `Workflow '${identifier}' not found in ${this.options.repository}`
      );
    }
    this.workflowFiles.set(identifier, basename(match.path));
    return String(match.id);
  }

  private listWorkflows(): Promise<Array<z.infer<typeof workflowSchema>>> {
    if (!this.workflowList) {
      const pending = this.request('GET', `${this.repoPath}/actions/workflows`, workflowListSchema, {
        params: { per_page: 100 },
      }).then((data) => data.workflows);
      // Do not keep a failed listing around
      pending.catch(() => {
        this.workflowList = null;
      });
      this.workflowList = pending;
    }
    return this.workflowList;
  }

  // ───── Internal helpers ─────

  private async request<T>(
    method: 'GET' | 'POST',
    url: string,
    schema: z.ZodType<T>,
    config: { params?: Record<string, string | number>; data?: unknown } = {}
  ): Promise<T> {
    let response: { status: number; statusText: string; data: unknown };
    try {
      response = await this.http.request({ method, url, params: config.params, data: config.data });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ExecutorUnavailableError(`GitHub API unreachable (${method} ${url}): ${reason}`);
    }

    if (response.status === 404) {
      throw new NotFoundError('repository', url, `GitHub resource not found: ${url}`);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new ExecutorUnavailableError(
        `GitHub API ${method} ${url} failed: ${response.status} ${extractMessage(response.data) ?? response.statusText}`,
        response.status
      );
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new ExecutorUnavailableError(`Unexpected response from GitHub for ${url}: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

function extractMessage(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'message' in data && typeof data.message === 'string') {
    return data.message;
  }
  return undefined;
}
