import { describe, it, expect, beforeEach } from '@jest/globals';
import { CommitResolver } from '../../../src/promotion/CommitResolver.js';
import { AmbiguousRefError, NotFoundError } from '../../../src/promotion/errors.js';
import { ReferenceSourceAggregator } from '../../../src/promotion/ReferenceSourceAggregator.js';
import { FakeReleases, FakeVcs, fakeHash } from '../../helpers/fakes.js';

describe('CommitResolver', () => {
  let vcs: FakeVcs;
  let releases: FakeReleases;
  let resolver: CommitResolver;

  const first = fakeHash('abc12340');
  const second = fakeHash('abc12341');
  const other = fakeHash('def45678');

  beforeEach(() => {
    vcs = new FakeVcs(fakeHash('c0ffee'));
    vcs.subjects.set(fakeHash('c0ffee'), 'Current work');
    vcs.addCommit(first, 'First change');
    vcs.addCommit(second, 'Second change');
    vcs.addCommit(other, 'Other change');
    releases = new FakeReleases().add('v1.0.0', other);
    const aggregator = new ReferenceSourceAggregator(vcs, releases, { trunkBranch: 'origin/main' });
    resolver = new CommitResolver(vcs, aggregator);
  });

  it('should resolve current to HEAD with its subject', async () => {
    const commit = await resolver.resolve('current');
    expect(commit).toEqual({
      hash: fakeHash('c0ffee'),
      shortHash: 'c0ffee00',
      label: 'Current work',
      source: 'current',
    });
  });

  it('should fail with NotFound when there is no repository', async () => {
    vcs.headHash = null;
    await expect(resolver.resolve('current')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should resolve a unique short hash', async () => {
    const commit = await resolver.resolve('def4');
    expect(commit.hash).toBe(other);
    expect(commit.label).toBe('Other change');
    expect(commit.source).toBe('manual');
  });

  it('should reject an ambiguous short hash and list every match', async () => {
    const error = await resolver.resolve('abc1234').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(AmbiguousRefError);
    if (error instanceof AmbiguousRefError) {
      expect(error.kind).toBe('AmbiguousRef');
      expect(error.matches).toEqual([first, second]);
    }
  });

  it('should fail with NotFound for an unknown short hash', async () => {
    await expect(resolver.resolve('abc1239')).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('should fail with NotFound for an unknown full hash', async () => {
    await expect(resolver.resolve(fakeHash('9999'))).rejects.toMatchObject({
      kind: 'NotFound',
      resource: 'commit',
    });
  });

  it('should resolve a release tag through the release mapping', async () => {
    const commit = await resolver.resolve('v1.0.0');
    expect(commit).toEqual({
      hash: other,
      shortHash: 'def45678',
      label: 'Release: v1.0.0',
      source: 'release',
    });
  });

  it('should resolve a hex-looking release tag when no commit has that prefix', async () => {
    releases.add('20240115', other);

    const commit = await resolver.resolve('20240115');
    expect(commit).toEqual({
      hash: other,
      shortHash: 'def45678',
      label: 'Release: 20240115',
      source: 'release',
    });
  });

  it('should prefer a matching commit over a hex-looking tag', async () => {
    releases.add('def4', first);

    const commit = await resolver.resolve('def4');
    expect(commit.hash).toBe(other);
    expect(commit.source).toBe('manual');
  });

  it('should fail with NotFound for an unknown tag', async () => {
    await expect(resolver.resolve('v9.9.9')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should return the identical value when the same reference is resolved twice', async () => {
    const a = await resolver.resolve('def45678');
    const b = await resolver.resolve('DEF45678');
    expect(b).toBe(a);
    expect(vcs.calls.findByPrefix).toBe(1);
  });

  it('should not memoize failures', async () => {
    await expect(resolver.resolve('1234abcd')).rejects.toBeInstanceOf(NotFoundError);
    const late = fakeHash('1234abcd');
    vcs.addCommit(late, 'Late commit');

    const commit = await resolver.resolve('1234abcd');
    expect(commit.hash).toBe(late);
  });

  it('should honour an explicit source', async () => {
    const commit = await resolver.resolve('def45678', 'trunk-history');
    expect(commit.source).toBe('trunk-history');
  });

  it('should keep results for different sources apart', async () => {
    const fromTrunk = await resolver.resolve('def45678', 'trunk-history');
    const manual = await resolver.resolve('def45678');

    expect(fromTrunk.source).toBe('trunk-history');
    expect(manual.source).toBe('manual');
    expect(manual.hash).toBe(fromTrunk.hash);
  });
});
