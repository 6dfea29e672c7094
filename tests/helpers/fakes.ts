/**
 * In-process stand-ins for the external systems the promotion core consults.
 */

import { NotFoundError, RegistryUnreachableError } from '../../src/promotion/errors.js';
import type { Prompter } from '../../src/promotion/SafetyGate.js';
import type { ImageReference } from '../../src/promotion/types.js';
import type {
  CiExecutionSystem,
  CommitEntry,
  ImageRegistry,
  ListRunsOptions,
  ReleaseMappingProvider,
  VcsHistoryProvider,
  WorkflowRun,
} from '../../src/providers/types.js';

/**
 * Deterministic 40-character hash: the seed in hex, padded with a fill digit.
 */
export function fakeHash(seed: number | string, fill = '0'): string {
  const prefix = typeof seed === 'number' ? seed.toString(16) : seed;
  return (prefix + fill.repeat(40)).slice(0, 40);
}

export class FakeVcs implements VcsHistoryProvider {
  headHash: string | null;
  branch = 'feature/test';
  readonly logs = new Map<string, CommitEntry[]>();
  readonly subjects = new Map<string, string>();
  failLogFor = new Set<string>();
  calls = { findByPrefix: 0, hasCommit: 0 };

  constructor(headHash: string | null = fakeHash('c0ffee')) {
    this.headHash = headHash;
  }

  addCommit(hash: string, subject: string, ref = 'HEAD'): void {
    this.subjects.set(hash, subject);
    const entries = this.logs.get(ref) ?? [];
    entries.push({ hash, subject });
    this.logs.set(ref, entries);
  }

  async head(): Promise<string> {
    if (!this.headHash) {
      throw new NotFoundError('repository', '.', 'No git repository found');
    }
    return this.headHash;
  }

  async currentBranch(): Promise<string> {
    return this.branch;
  }

  async log(ref: string | undefined, limit: number): Promise<CommitEntry[]> {
    const key = ref ?? 'HEAD';
    if (this.failLogFor.has(key)) {
      throw new Error(`unknown revision ${key}`);
    }
    return (this.logs.get(key) ?? []).slice(0, limit);
  }

  private allHashes(): string[] {
    const hashes = new Set<string>(this.subjects.keys());
    if (this.headHash) hashes.add(this.headHash);
    return [...hashes];
  }

  async hasCommit(hash: string): Promise<boolean> {
    this.calls.hasCommit++;
    return this.allHashes().includes(hash);
  }

  async findByPrefix(prefix: string): Promise<string[]> {
    this.calls.findByPrefix++;
    return this.allHashes().filter((h) => h.startsWith(prefix));
  }

  async subject(hash: string): Promise<string | undefined> {
    return this.subjects.get(hash);
  }
}

export class FakeReleases implements ReleaseMappingProvider {
  readonly tags = new Map<string, string>();
  failListing = false;

  add(tag: string, hash: string): this {
    this.tags.set(tag, hash);
    return this;
  }

  async listTags(limit: number): Promise<string[]> {
    if (this.failListing) throw new Error('release API unavailable');
    return [...this.tags.keys()].slice(0, limit);
  }

  async tagCommit(tag: string): Promise<string> {
    const hash = this.tags.get(tag);
    if (!hash) throw new NotFoundError('commit', tag, `Tag '${tag}' not found`);
    return hash;
  }
}

export function fakeRun(id: number, headSha: string, overrides: Partial<WorkflowRun> = {}): WorkflowRun {
  return {
    id,
    runNumber: id,
    createdAt: `2026-01-${String(id % 28 + 1).padStart(2, '0')}T10:00:00Z`,
    headSha,
    title: `Deploy run ${id}`,
    outcome: 'success',
    url: `https://ci.example.test/runs/${id}`,
    ...overrides,
  };
}

export class FakeCi implements CiExecutionSystem {
  readonly runs = new Map<string, WorkflowRun[]>();
  readonly dispatched: Array<{ workflow: string; inputs: Record<string, string> }> = [];
  readonly listCalls: Array<{ workflow: string; options: ListRunsOptions }> = [];
  missingWorkflows = new Set<string>();
  unreachable = false;
  dispatchError: Error | null = null;
  runUrl: string | undefined = 'https://ci.example.test/runs/latest';

  setRuns(workflow: string, runs: WorkflowRun[]): this {
    this.runs.set(workflow, runs);
    return this;
  }

  async listRuns(workflow: string, options: ListRunsOptions): Promise<WorkflowRun[]> {
    this.listCalls.push({ workflow, options });
    if (this.unreachable) throw new Error('connect ECONNREFUSED');
    if (this.missingWorkflows.has(workflow)) {
      throw new NotFoundError('workflow', workflow);
    }
    const runs = this.runs.get(workflow) ?? [];
    const filtered = options.status ? runs.filter((r) => r.outcome === options.status) : runs;
    return filtered.slice(0, options.limit);
  }

  async dispatch(workflow: string, inputs: Record<string, string>): Promise<void> {
    if (this.dispatchError) throw this.dispatchError;
    this.dispatched.push({ workflow, inputs });
  }

  async latestDispatchUrl(_workflow: string): Promise<string | undefined> {
    return this.runUrl;
  }

  workflowPageUrl(workflow: string): string {
    return `https://ci.example.test/workflows/${encodeURIComponent(workflow)}`;
  }
}

export class FakeRegistry implements ImageRegistry {
  readonly images = new Set<string>();
  unreachable = false;
  checks = 0;

  add(tag: string): this {
    this.images.add(tag);
    return this;
  }

  async exists(ref: ImageReference): Promise<boolean> {
    this.checks++;
    if (this.unreachable) {
      throw new RegistryUnreachableError(`${ref.registry}/${ref.repository}:${ref.tag}`, 'connect ETIMEDOUT');
    }
    return this.images.has(ref.tag);
  }
}

/**
 * Answers questions from a script; null once the script runs out.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly output: string[] = [];

  constructor(private readonly answers: Array<string | null>) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const next = this.answers.shift();
    return next === undefined ? null : next;
  }

  write(line: string): void {
    this.output.push(line);
  }
}
