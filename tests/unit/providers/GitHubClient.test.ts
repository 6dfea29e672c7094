/**
 * GitHubClient Tests
 *
 * axios is mocked; each test scripts the responses of the instance's
 * request() in call order.
 */

import axios from 'axios';

jest.mock('axios');

import { ExecutorUnavailableError, NotFoundError } from '../../../src/promotion/errors.js';
import { GitHubClient, toOutcome, webUrlFor } from '../../../src/providers/GitHubClient.js';
import type { GitHubClientOptions } from '../../../src/providers/GitHubClient.js';

const mockedAxios = jest.mocked(axios);

describe('GitHubClient', () => {
  let mockAxiosInstance: {
    request: jest.Mock;
    interceptors: { request: { use: jest.Mock } };
  };

  function createClient(overrides: Partial<GitHubClientOptions> = {}): GitHubClient {
    return new GitHubClient({
      repository: 'acme/shop',
      apiUrl: 'https://api.github.com',
      token: 'test-secret',
      timeoutMs: 5000,
      dispatchRef: 'main',
      ...overrides,
    });
  }

  function respond(status: number, data: unknown): void {
    mockAxiosInstance.request.mockResolvedValueOnce({ status, statusText: '', data });
  }

  beforeEach(() => {
    mockAxiosInstance = {
      request: jest.fn(),
      interceptors: { request: { use: jest.fn() } },
    };
    mockedAxios.create.mockReturnValue(mockAxiosInstance as unknown as ReturnType<typeof axios.create>);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should configure the API base URL and bearer token', () => {
    createClient();

    expect(mockedAxios.create).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://api.github.com',
        timeout: 5000,
        headers: expect.objectContaining({ Authorization: 'Bearer test-secret' }),
      })
    );
  });

  describe('listRuns', () => {
    it('should map workflow runs addressed by file name', async () => {
      respond(200, {
        workflow_runs: [
          {
            id: 11,
            run_number: 7,
            created_at: '2026-03-01T10:00:00Z',
            head_sha: 'ABC123',
            display_title: 'Deploy shop',
            status: 'completed',
            conclusion: 'success',
            html_url: 'https://github.com/acme/shop/actions/runs/11',
          },
          {
            id: 10,
            run_number: 6,
            created_at: '2026-02-28T10:00:00Z',
            head_sha: 'def456',
            name: 'CD',
            status: 'in_progress',
            conclusion: null,
          },
        ],
      });

      const runs = await createClient().listRuns('deploy-prod.yml', { status: 'success', limit: 5 });

      expect(mockAxiosInstance.request).toHaveBeenCalledWith({
        method: 'GET',
        url: '/repos/acme/shop/actions/workflows/deploy-prod.yml/runs',
        params: { per_page: 5, status: 'success' },
        data: undefined,
      });
      expect(runs).toEqual([
        {
          id: 11,
          runNumber: 7,
          createdAt: '2026-03-01T10:00:00Z',
          headSha: 'ABC123',
          title: 'Deploy shop',
          outcome: 'success',
          url: 'https://github.com/acme/shop/actions/runs/11',
        },
        {
          id: 10,
          runNumber: 6,
          createdAt: '2026-02-28T10:00:00Z',
          headSha: 'def456',
          title: 'CD',
          outcome: 'pending',
        },
      ]);
    });

    it('should resolve a workflow display name to its id', async () => {
      respond(200, {
        workflows: [
          { id: 41, name: 'CI', path: '.github/workflows/ci.yml' },
          { id: 42, name: 'CD • Production', path: '.github/workflows/prod.yml' },
        ],
      });
      respond(200, { workflow_runs: [] });
      const client = createClient();

      await client.listRuns('CD • Production', { limit: 3 });

      expect(mockAxiosInstance.request).toHaveBeenLastCalledWith({
        method: 'GET',
        url: '/repos/acme/shop/actions/workflows/42/runs',
        params: { per_page: 3 },
        data: undefined,
      });
      expect(client.workflowPageUrl('CD • Production')).toBe(
        'https://github.com/acme/shop/actions/workflows/prod.yml'
      );
    });

    it('should list workflows only once', async () => {
      respond(200, { workflows: [{ id: 42, name: 'CD', path: '.github/workflows/cd.yml' }] });
      const client = createClient();

      await client.resolveWorkflow('CD');
      await client.resolveWorkflow('cd.yml');
      const id = await client.resolveWorkflow('CD');

      expect(id).toBe('42');
      expect(mockAxiosInstance.request).toHaveBeenCalledTimes(1);
    });

    it('should reject an unknown workflow name', async () => {
      respond(200, { workflows: [] });

      await expect(createClient().listRuns('Nope', { limit: 3 })).rejects.toThrow(
        new NotFoundError('workflow', 'Nope', "Workflow 'Nope' not found in acme/shop")
      );
    });
  });

  describe('dispatch', () => {
    it('should post a workflow_dispatch with the configured ref', async () => {
      respond(204, '');

      await createClient().dispatch('deploy.yml', { commit: 'abc' });

      expect(mockAxiosInstance.request).toHaveBeenCalledWith({
        method: 'POST',
        url: '/repos/acme/shop/actions/workflows/deploy.yml/dispatches',
        params: undefined,
        data: { ref: 'main', inputs: { commit: 'abc' } },
      });
    });

    it('should refuse to dispatch without a token', async () => {
      const client = createClient({ token: undefined });

      await expect(client.dispatch('deploy.yml', {})).rejects.toBeInstanceOf(ExecutorUnavailableError);
      expect(mockAxiosInstance.request).not.toHaveBeenCalled();
    });

    it('should find the newest dispatched run URL', async () => {
      respond(200, {
        workflow_runs: [
          {
            id: 99,
            run_number: 12,
            created_at: '2026-03-02T09:00:00Z',
            head_sha: 'abc',
            status: 'queued',
            html_url: 'https://github.com/acme/shop/actions/runs/99',
          },
        ],
      });

      const url = await createClient().latestDispatchUrl('deploy.yml');

      expect(url).toBe('https://github.com/acme/shop/actions/runs/99');
      expect(mockAxiosInstance.request).toHaveBeenCalledWith(
        expect.objectContaining({ params: { event: 'workflow_dispatch', per_page: 1 } })
      );
    });

    it('should fall back to the actions page for unresolved names', () => {
      expect(createClient().workflowPageUrl('Deploy')).toBe('https://github.com/acme/shop/actions');
    });
  });

  describe('release mapping', () => {
    it('should list release tags up to the limit', async () => {
      respond(200, [{ tag_name: 'v1.2.0' }, { tag_name: 'v1.1.0' }, { tag_name: 'v1.0.0' }]);

      const tags = await createClient().listTags(2);

      expect(tags).toEqual(['v1.2.0', 'v1.1.0']);
      expect(mockAxiosInstance.request).toHaveBeenCalledWith(
        expect.objectContaining({ url: '/repos/acme/shop/releases', params: { per_page: 2 } })
      );
    });

    it('should follow an annotated tag to its commit', async () => {
      respond(200, { object: { sha: 'tagobject1', type: 'tag' } });
      respond(200, { object: { sha: 'ABCDEF0123', type: 'commit' } });

      const hash = await createClient().tagCommit('v1.2.0');

      expect(hash).toBe('abcdef0123');
      expect(mockAxiosInstance.request).toHaveBeenLastCalledWith(
        expect.objectContaining({ url: '/repos/acme/shop/git/tags/tagobject1' })
      );
    });

    it('should report a missing tag as a missing commit', async () => {
      respond(404, { message: 'Not Found' });

      await expect(createClient().tagCommit('v9')).rejects.toThrow("Tag 'v9' not found in acme/shop");
    });

    it('should reject a tag that does not point to a commit', async () => {
      respond(200, { object: { sha: 'tree1', type: 'tree' } });

      await expect(createClient().tagCommit('v1')).rejects.toThrow("Tag 'v1' does not point to a commit (tree)");
    });
  });

  describe('error mapping', () => {
    it('should report a server error with its status', async () => {
      respond(500, { message: 'Server Error' });

      const error = await createClient()
        .listTags(5)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ExecutorUnavailableError);
      expect(error).toMatchObject({
        message: 'GitHub API GET /repos/acme/shop/releases failed: 500 Server Error',
        statusCode: 500,
      });
    });

    it('should report a network failure as unavailable', async () => {
      mockAxiosInstance.request.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(createClient().listTags(5)).rejects.toThrow(
        'GitHub API unreachable (GET /repos/acme/shop/releases): socket hang up'
      );
    });

    it('should reject a malformed response', async () => {
      respond(200, { unexpected: true });

      await expect(createClient().listTags(5)).rejects.toBeInstanceOf(ExecutorUnavailableError);
    });
  });
});

describe('toOutcome', () => {
  it('should classify run states', () => {
    expect(toOutcome({ status: 'completed', conclusion: 'success' })).toBe('success');
    expect(toOutcome({ status: 'completed', conclusion: 'failure' })).toBe('failure');
    expect(toOutcome({ status: 'completed', conclusion: 'cancelled' })).toBe('failure');
    expect(toOutcome({ status: 'queued', conclusion: null })).toBe('pending');
  });
});

describe('webUrlFor', () => {
  it('should map API hosts to web hosts', () => {
    expect(webUrlFor('https://api.github.com')).toBe('https://github.com');
    expect(webUrlFor('https://api.github.com/')).toBe('https://github.com');
    expect(webUrlFor('https://git.example.test/api/v3')).toBe('https://git.example.test');
  });
});
