/**
 * Reference Source Aggregator
 *
 * Gathers candidate commits for interactive selection from, in priority
 * order: the current branch's history, the trunk branch's history, and the
 * release tag mapping. Sources are independent: one failing (no network, no
 * releases yet, trunk not fetched) is logged and skipped so selection keeps
 * working with whatever the others returned.
 *
 * Ordering is source priority, then each source's own newest-first order.
 * Timestamps are never compared across sources.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { ReleaseMappingProvider, VcsHistoryProvider } from '../providers/types.js';
import { isFullHash, toResolvedCommit } from './CommitRef.js';
import { NotFoundError } from './errors.js';
import type { CandidateSet, CommitSource, PartialCandidate, ResolvedCommit } from './types.js';

export interface SourceRecord {
  id: string;
  label?: string;
}

export interface CandidateSource {
  name: string;
  source: CommitSource;
  fetch(): Promise<SourceRecord[]>;
}

export interface AggregatorOptions {
  trunkBranch: string;
  /** Commits read from each git history source */
  historyDepth?: number;
  /** Release tags consulted */
  releaseLimit?: number;
}

export const DEFAULT_HISTORY_DEPTH = 20;
export const DEFAULT_RELEASE_LIMIT = 10;

export function releaseLabel(tag: string): string {
  return `Release: ${tag}`;
}

/**
 * Merge source results in the order given. First-seen label wins; records
 * without a full identifier are kept apart as partial candidates.
 */
export function mergeCandidates(
  results: Array<{ source: CommitSource; records: SourceRecord[] }>,
  limit: number
): { commits: ResolvedCommit[]; partial: PartialCandidate[] } {
  const seen = new Set<string>();
  const seenPartial = new Set<string>();
  const commits: ResolvedCommit[] = [];
  const partial: PartialCandidate[] = [];

  for (const { source, records } of results) {
    for (const record of records) {
      const id = record.id.trim().toLowerCase();
      if (!id) continue;

      if (!isFullHash(id)) {
        if (!seenPartial.has(id) && partial.length < limit) {
          seenPartial.add(id);
          partial.push({ id, ...(record.label ? { label: record.label } : {}), source });
        }
        continue;
      }

      if (seen.has(id) || commits.length >= limit) continue;
      seen.add(id);
      commits.push(toResolvedCommit(id, source, record.label));
    }
  }

  return { commits, partial };
}

export class ReferenceSourceAggregator {
  private readonly logger: Logger;
  private readonly historyDepth: number;
  private readonly releaseLimit: number;

  constructor(
    private readonly vcs: VcsHistoryProvider,
    private readonly releases: ReleaseMappingProvider,
    private readonly options: AggregatorOptions
  ) {
    this.logger = getLogger('aggregator');
    this.historyDepth = options.historyDepth ?? DEFAULT_HISTORY_DEPTH;
    this.releaseLimit = options.releaseLimit ?? DEFAULT_RELEASE_LIMIT;
  }

  /**
   * The three sources in priority order.
   */
  sources(): CandidateSource[] {
    return [
      {
        name: 'local branch history',
        source: 'local-history',
        fetch: async () => {
          const entries = await this.vcs.log(undefined, this.historyDepth);
          return entries.map((e) => ({ id: e.hash, label: e.subject }));
        },
      },
      {
        name: `trunk history (${this.options.trunkBranch})`,
        source: 'trunk-history',
        fetch: async () => {
          const entries = await this.vcs.log(this.options.trunkBranch, this.historyDepth);
          return entries.map((e) => ({ id: e.hash, label: e.subject }));
        },
      },
      {
        name: 'release tags',
        source: 'release',
        fetch: () => this.fetchReleases(),
      },
    ];
  }

  async candidates(limit: number, sources: CandidateSource[] = this.sources()): Promise<CandidateSet> {
    // Read-only and independent, so query concurrently; merge order stays fixed
    const settled = await Promise.allSettled(sources.map((s) => s.fetch()));

    const results: Array<{ source: CommitSource; records: SourceRecord[] }> = [];
    const failedSources: string[] = [];

    settled.forEach((outcome, index) => {
      const source = sources[index];
      if (!source) return;
      if (outcome.status === 'fulfilled') {
        this.logger.debug('Candidate source returned', { source: source.name, count: outcome.value.length });
        results.push({ source: source.source, records: outcome.value });
      } else {
        const reason = outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason);
        this.logger.warn(`Candidate source unavailable: ${source.name}`, { reason });
        failedSources.push(source.name);
      }
    });

    const { commits, partial } = mergeCandidates(results, limit);

    if (commits.length === 0) {
      return { status: 'empty', partial, failedSources };
    }
    return { status: 'ok', commits, partial, failedSources };
  }

  /**
   * Resolve a release tag through the release mapping.
   */
  async resolveTag(tag: string): Promise<ResolvedCommit> {
    let hash: string;
    try {
      hash = (await this.releases.tagCommit(tag)).toLowerCase();
    } catch (err) {
      if (err instanceof NotFoundError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      throw new NotFoundError('commit', tag, `Tag '${tag}' could not be resolved: ${reason}`);
    }
    if (!isFullHash(hash)) {
      throw new NotFoundError('commit', tag, `Tag '${tag}' does not point to a full commit identifier`);
    }
    return toResolvedCommit(hash, 'release', releaseLabel(tag));
  }

  private async fetchReleases(): Promise<SourceRecord[]> {
    const tags = await this.releases.listTags(this.releaseLimit);
    const records: SourceRecord[] = [];
    for (const tag of tags) {
      try {
        const id = await this.releases.tagCommit(tag);
        records.push({ id, label: releaseLabel(tag) });
      } catch (err) {
        this.logger.debug(`Skipping release tag ${tag}`, {
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    }
    return records;
  }
}
