/**
 * Commit reference parsing and canonical short forms.
 */

import type { CommitRef, CommitSource, ResolvedCommit } from './types.js';

export const CURRENT_REF = 'current';

/** Length of the short form used for image tags and display everywhere */
export const SHORT_HASH_LENGTH = 8;

/** Shortest prefix accepted as a hash; below this a token is treated as a tag */
export const MIN_PREFIX_LENGTH = 4;

const FULL_HASH = /^[0-9a-f]{40}$/;
const HEX = /^[0-9a-f]+$/;

export function isFullHash(value: string): boolean {
  return FULL_HASH.test(value);
}

export function shortHash(hash: string): string {
  return hash.slice(0, SHORT_HASH_LENGTH);
}

/**
 * Parse a user-supplied token. Hex tokens of 4-39 characters are short
 * hashes, 40 hex characters a full hash; everything else is a tag.
 */
export function parseCommitRef(input: string): CommitRef {
  const token = input.trim();
  if (token === CURRENT_REF) {
    return { kind: 'current' };
  }

  const lower = token.toLowerCase();
  if (HEX.test(lower)) {
    if (lower.length === 40) {
      return { kind: 'full', hash: lower };
    }
    if (lower.length >= MIN_PREFIX_LENGTH && lower.length < 40) {
      return { kind: 'short', prefix: lower };
    }
  }

  return { kind: 'tag', tag: token };
}

export function formatCommitRef(ref: CommitRef): string {
  switch (ref.kind) {
    case 'current':
      return CURRENT_REF;
    case 'full':
      return ref.hash;
    case 'short':
      return ref.prefix;
    case 'tag':
      return ref.tag;
  }
}

export function toResolvedCommit(hash: string, source: CommitSource, label?: string): ResolvedCommit {
  const canonical = hash.toLowerCase();
  return {
    hash: canonical,
    shortHash: shortHash(canonical),
    ...(label ? { label } : {}),
    source,
  };
}

export function describeCommit(commit: ResolvedCommit): string {
  return commit.label ? `${commit.shortHash} (${commit.label})` : commit.shortHash;
}
