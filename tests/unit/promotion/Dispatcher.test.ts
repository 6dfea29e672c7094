import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { toResolvedCommit } from '../../../src/promotion/CommitRef.js';
import { Dispatcher } from '../../../src/promotion/Dispatcher.js';
import { ExecutorUnavailableError, NotFoundError } from '../../../src/promotion/errors.js';
import { DEFAULT_WORKFLOW_TABLE } from '../../../src/promotion/workflows.js';
import { FakeCi, fakeHash } from '../../helpers/fakes.js';

const COMMIT = toResolvedCommit(fakeHash(0x5e), 'manual');

describe('Dispatcher', () => {
  let ci: FakeCi;
  let sleep: jest.Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    ci = new FakeCi();
    sleep = jest.fn(async (_ms: number) => {});
  });

  it('should dispatch the table workflow once with the full commit hash', async () => {
    const dispatcher = new Dispatcher(ci, DEFAULT_WORKFLOW_TABLE, { runUrlDelayMs: 2000, sleep });

    const handle = await dispatcher.dispatch('staging', COMMIT, 're-tag-promote');

    expect(ci.dispatched).toEqual([
      { workflow: 'CD • Promote Image (No Rebuild)', inputs: { to_env: 'staging', commit_sha: fakeHash(0x5e) } },
    ]);
    expect(handle.workflow).toBe('CD • Promote Image (No Rebuild)');
    expect(handle.url).toBe('https://ci.example.test/runs/latest');
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('should dispatch prod through the approval workflow', async () => {
    const dispatcher = new Dispatcher(ci, DEFAULT_WORKFLOW_TABLE, { runUrlDelayMs: 0, sleep });

    await dispatcher.dispatch('prod', COMMIT, 'full-pipeline');

    expect(ci.dispatched).toEqual([
      { workflow: 'CD • Production (manual approval)', inputs: { commit_sha: fakeHash(0x5e) } },
    ]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('should fall back to the workflow page when no run URL is found', async () => {
    ci.runUrl = undefined;
    const dispatcher = new Dispatcher(ci, DEFAULT_WORKFLOW_TABLE, { runUrlDelayMs: 0, sleep });

    const handle = await dispatcher.dispatch('dev', COMMIT, 'full-pipeline');

    expect(handle.url).toBe(
      `https://ci.example.test/workflows/${encodeURIComponent('CI • Build Once & Deploy Dev')}`
    );
  });

  it('should fall back to the workflow page when the run lookup fails', async () => {
    ci.latestDispatchUrl = async () => {
      throw new Error('timeout');
    };
    const dispatcher = new Dispatcher(ci, DEFAULT_WORKFLOW_TABLE, { runUrlDelayMs: 0, sleep });

    const handle = await dispatcher.dispatch('dev', COMMIT, 're-tag-promote');

    expect(handle.url).toBe(
      `https://ci.example.test/workflows/${encodeURIComponent('CD • Promote Image (No Rebuild)')}`
    );
  });

  it('should fail with ExecutorUnavailable and not retry when the dispatch fails', async () => {
    ci.dispatchError = new Error('502 Bad Gateway');
    const dispatch = jest.spyOn(ci, 'dispatch');
    const dispatcher = new Dispatcher(ci, DEFAULT_WORKFLOW_TABLE, { runUrlDelayMs: 0, sleep });

    const error = await dispatcher.dispatch('staging', COMMIT, 're-tag-promote').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutorUnavailableError);
    expect(error).toMatchObject({
      message: "Dispatch of 'CD • Promote Image (No Rebuild)' failed: 502 Bad Gateway",
    });
    expect(dispatch).toHaveBeenCalledTimes(1);
  });

  it('should report a missing workflow at dispatch time as ExecutorUnavailable', async () => {
    ci.dispatchError = new NotFoundError('workflow', 'CD • Promote Image (No Rebuild)');
    const dispatcher = new Dispatcher(ci, DEFAULT_WORKFLOW_TABLE, { runUrlDelayMs: 0, sleep });

    const error = await dispatcher.dispatch('staging', COMMIT, 're-tag-promote').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExecutorUnavailableError);
    expect(error).toMatchObject({
      kind: 'ExecutorUnavailable',
      message:
        "Dispatch of 'CD • Promote Image (No Rebuild)' failed: workflow not found: CD • Promote Image (No Rebuild)",
    });
    expect(ci.dispatched).toEqual([]);
  });
});
