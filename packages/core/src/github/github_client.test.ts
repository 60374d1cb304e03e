import { GitHubClient } from './github_client';
import type { TokenSource } from './github_client';
import { GitHubApiError } from './github.types';
import { createFetchStub } from './github_test_helpers';
import type { StubReply } from './github_test_helpers';

const TREE_SHA = '2222222222222222222222222222222222222222';
const COMMIT_SHA = '3333333333333333333333333333333333333333';
const HEAD_SHA = '1111111111111111111111111111111111111111';

function createClient(replies: StubReply[]) {
  const stub = createFetchStub(replies);
  const tokenSource: TokenSource = {
    getAccessToken: jest.fn(async () => ({ value: 'test-installation-token' })),
  };
  const client = new GitHubClient({
    owner: 'acme',
    repo: 'widgets',
    apiBaseUrl: 'https://api.github.test/',
    fetchFn: stub.fetchFn,
    tokenSource,
  });
  return { client, stub, tokenSource };
}

describe('GitHubClient', () => {
  it('should authenticate every call with the current installation token', async () => {
    const { client, stub, tokenSource } = createClient([{ status: 201, json: { sha: TREE_SHA } }]);

    await client.createTree({ base_tree: HEAD_SHA, tree: [] });

    expect(tokenSource.getAccessToken).toHaveBeenCalledTimes(1);
    expect(stub.requests[0]?.headers['authorization']).toBe('Bearer test-installation-token');
  });

  it('should create a blob from base64 content', async () => {
    const { client, stub } = createClient([{ status: 201, json: { sha: TREE_SHA, url: 'ignored' } }]);

    await expect(client.createBlob({ content: 'gA==', encoding: 'base64' })).resolves.toBe(TREE_SHA);

    expect(stub.requests[0]).toMatchObject({
      url: 'https://api.github.test/repos/acme/widgets/git/blobs',
      method: 'POST',
      body: { content: 'gA==', encoding: 'base64' },
    });
  });

  it('should create a tree on top of a base tree', async () => {
    const { client, stub } = createClient([{ status: 201, json: { sha: TREE_SHA } }]);

    const tree = {
      base_tree: HEAD_SHA,
      tree: [
        { path: 'a.txt', mode: '100644' as const, type: 'blob' as const, content: 'hello' },
        { path: 'b.txt', mode: '100644' as const, type: 'blob' as const, sha: null },
      ],
    };

    await expect(client.createTree(tree)).resolves.toBe(TREE_SHA);
    expect(stub.requests[0]?.url).toBe('https://api.github.test/repos/acme/widgets/git/trees');
    expect(stub.requests[0]?.body).toEqual(tree);
  });

  it('should create a commit and return its id and html url', async () => {
    const { client, stub } = createClient([
      { status: 201, json: { sha: COMMIT_SHA, html_url: 'https://github.test/acme/widgets/commit/3333' } },
    ]);

    const commit = await client.createCommit({ message: 'Update', tree: TREE_SHA, parents: [HEAD_SHA] });

    expect(commit).toEqual({ sha: COMMIT_SHA, url: 'https://github.test/acme/widgets/commit/3333' });
    expect(stub.requests[0]?.body).toEqual({ message: 'Update', tree: TREE_SHA, parents: [HEAD_SHA] });
  });

  describe('references', () => {
    it('should report a missing branch as not found', async () => {
      const { client, stub } = createClient([{ status: 404, json: { message: 'Not Found' } }]);

      await expect(client.getReference('feature/x')).resolves.toEqual({ found: false });
      expect(stub.requests[0]).toMatchObject({
        url: 'https://api.github.test/repos/acme/widgets/git/ref/heads/feature/x',
        method: 'GET',
      });
    });

    it('should return the sha of an existing branch', async () => {
      const { client } = createClient([
        { status: 200, json: { ref: 'refs/heads/main', object: { sha: HEAD_SHA, type: 'commit' } } },
      ]);

      await expect(client.getReference('main')).resolves.toEqual({ found: true, ref: 'refs/heads/main', sha: HEAD_SHA });
    });

    it('should fail on other statuses', async () => {
      const { client } = createClient([{ status: 403, text: 'forbidden' }]);

      await expect(client.getReference('main')).rejects.toMatchObject({ code: 'UNEXPECTED_STATUS', statusCode: 403 });
    });

    it('should create a full branch ref', async () => {
      const { client, stub } = createClient([
        { status: 201, json: { ref: 'refs/heads/new', object: { sha: COMMIT_SHA } } },
      ]);

      await client.createReference('new', COMMIT_SHA);

      expect(stub.requests[0]).toMatchObject({
        url: 'https://api.github.test/repos/acme/widgets/git/refs',
        method: 'POST',
        body: { ref: 'refs/heads/new', sha: COMMIT_SHA },
      });
    });

    it.each([true, false])('should pass force=%s through on update', async (force) => {
      const { client, stub } = createClient([
        { status: 200, json: { ref: 'refs/heads/main', object: { sha: COMMIT_SHA } } },
      ]);

      await client.updateReference('main', COMMIT_SHA, force);

      expect(stub.requests[0]).toMatchObject({
        url: 'https://api.github.test/repos/acme/widgets/git/refs/heads/main',
        method: 'PATCH',
        body: { sha: COMMIT_SHA, force },
      });
    });

    it('should encode reserved characters in branch names', async () => {
      const { client, stub } = createClient([
        { status: 200, json: { ref: 'refs/heads/feature#1', object: { sha: HEAD_SHA } } },
        { status: 200, json: { ref: 'refs/heads/feature#1', object: { sha: COMMIT_SHA } } },
      ]);

      await client.getReference('team/feature#1%');
      await client.updateReference('team/feature#1%', COMMIT_SHA, true);

      expect(stub.requests.map((r) => r.url)).toEqual([
        'https://api.github.test/repos/acme/widgets/git/ref/heads/team/feature%231%25',
        'https://api.github.test/repos/acme/widgets/git/refs/heads/team/feature%231%25',
      ]);
    });

    it('should surface a rejected non-fast-forward update', async () => {
      const { client } = createClient([{ status: 422, text: '{"message":"Update is not a fast forward"}' }]);

      await expect(client.updateReference('main', COMMIT_SHA, false)).rejects.toThrow(
        'Unexpected status code 422 while updating reference heads/main: {"message":"Update is not a fast forward"}',
      );
    });
  });

  describe('createCommitOnBranch', () => {
    const input = {
      branch: { repositoryNameWithOwner: 'acme/widgets', branchName: 'main' },
      expectedHeadOid: HEAD_SHA,
      fileChanges: { additions: [{ path: 'a.txt', contents: 'aGVsbG8=' }], deletions: [] },
      message: { headline: 'Update' },
    };

    it('should post the mutation to the GraphQL endpoint', async () => {
      const { client, stub } = createClient([
        {
          status: 200,
          json: { data: { createCommitOnBranch: { commit: { url: 'https://github.test/c/1', oid: COMMIT_SHA } } } },
        },
      ]);

      await expect(client.createCommitOnBranch(input)).resolves.toEqual({ sha: COMMIT_SHA, url: 'https://github.test/c/1' });

      const sent = stub.requests[0];
      expect(sent?.url).toBe('https://api.github.test/graphql');
      expect(sent?.headers).not.toHaveProperty('x-github-api-version');
      expect(sent?.body).toEqual({
        query: expect.stringContaining('createCommitOnBranch(input: $input)'),
        variables: { input },
      });
    });

    it('should fail on GraphQL errors even with status 200', async () => {
      const { client } = createClient([
        { status: 200, json: { data: null, errors: [{ message: 'Expected branch to point to X' }, { message: 'second' }] } },
      ]);

      const error = await client.createCommitOnBranch(input).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitHubApiError);
      expect(error).toMatchObject({
        code: 'REMOTE_ERRORS',
        message: 'GraphQL errors while creating commit on branch: Expected branch to point to X; second',
      });
    });

    it('should fail when no commit comes back', async () => {
      const { client } = createClient([{ status: 200, json: { data: { createCommitOnBranch: null } } }]);

      await expect(client.createCommitOnBranch(input)).rejects.toMatchObject({ code: 'INVALID_RESPONSE' });
    });
  });
});
