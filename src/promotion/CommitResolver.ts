/**
 * Commit Resolver
 *
 * Turns any CommitRef into exactly one canonical ResolvedCommit, or fails.
 * A short prefix that matches more than one commit is an error, never a
 * silent first match. A hex-looking token that matches no commit is tried
 * as a release tag before giving up, so date-style tags like 20240115 still
 * resolve. Results are memoized per reference and source for the lifetime of
 * the resolver (one CLI run) so "rolling back from" and "rolling back to"
 * lookups agree.
 */

import { getLogger } from '../logging/index.js';
import type { Logger } from '../logging/index.js';
import type { VcsHistoryProvider } from '../providers/types.js';
import { formatCommitRef, isFullHash, parseCommitRef, toResolvedCommit } from './CommitRef.js';
import { AmbiguousRefError, NotFoundError } from './errors.js';
import type { CommitRef, CommitSource, ResolvedCommit } from './types.js';

/** The part of the aggregator the resolver needs for tags */
export interface TagResolver {
  resolveTag(tag: string): Promise<ResolvedCommit>;
}

export class CommitResolver {
  private readonly logger: Logger;
  private readonly memo = new Map<string, Promise<ResolvedCommit>>();

  constructor(
    private readonly vcs: VcsHistoryProvider,
    private readonly tags: TagResolver
  ) {
    this.logger = getLogger('commit-resolver');
  }

  /**
   * Resolve a raw token or a parsed reference.
   */
  resolve(input: string | CommitRef, source?: CommitSource): Promise<ResolvedCommit> {
    const ref = typeof input === 'string' ? parseCommitRef(input) : input;
    const token = typeof input === 'string' ? input.trim() : formatCommitRef(ref);
    const key = `${ref.kind}:${formatCommitRef(ref)}:${source ?? ''}`;

    const cached = this.memo.get(key);
    if (cached) return cached;

    const pending = this.resolveUncached(ref, token, source);
    this.memo.set(key, pending);
    // Failures are not memoized
    pending.catch(() => this.memo.delete(key));
    return pending;
  }

  private async resolveUncached(ref: CommitRef, token: string, source?: CommitSource): Promise<ResolvedCommit> {
    switch (ref.kind) {
      case 'current': {
        const hash = await this.vcs.head();
        return this.withSubject(hash, source ?? 'current');
      }

      case 'full': {
        if (!isFullHash(ref.hash) || !(await this.vcs.hasCommit(ref.hash))) {
          throw new NotFoundError('commit', ref.hash, `Commit ${ref.hash} is not known to the local history`);
        }
        return this.withSubject(ref.hash, source ?? 'manual');
      }

      case 'short': {
        const matches = await this.vcs.findByPrefix(ref.prefix);
        if (matches.length > 1) {
          this.logger.debug('Ambiguous prefix', { prefix: ref.prefix, matches });
          throw new AmbiguousRefError(ref.prefix, matches);
        }
        const [match] = matches;
        if (match) {
          return this.withSubject(match, source ?? 'manual');
        }
        try {
          return await this.tags.resolveTag(token);
        } catch (err) {
          if (err instanceof NotFoundError) {
            throw new NotFoundError('commit', ref.prefix, `No commit matches '${ref.prefix}'`);
          }
          throw err;
        }
      }

      case 'tag':
        return this.tags.resolveTag(ref.tag);
    }
  }

  private async withSubject(hash: string, source: CommitSource): Promise<ResolvedCommit> {
    const subject = await this.vcs.subject(hash);
    const resolved = toResolvedCommit(hash, source, subject);
    this.logger.debug('Resolved commit', { hash: resolved.hash, source });
    return resolved;
  }
}
