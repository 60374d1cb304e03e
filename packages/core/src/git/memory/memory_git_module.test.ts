/**
 * MemoryGitModule Tests
 *
 * The in-memory repository backs most pipeline tests, so its ids and
 * staging defaults have to match what git itself reports.
 */

import { MemoryGitModule, ZERO_OBJECT_ID, hashObject } from './memory_git_module';
import { BranchNotFoundError, GitCommandError } from '../errors';

describe('hashObject', () => {
  it('should compute the same blob ids as git hash-object', () => {
    expect(hashObject('blob', Buffer.from('hello'))).toBe('b6fc4c620b67d95f953a5c1c1230aaab5db5a1b0');
    expect(hashObject('blob', Buffer.alloc(0))).toBe('e69de29bb2d1d6434b8b29ae775ad8c2e48c5391');
  });
});

describe('MemoryGitModule', () => {
  let git: MemoryGitModule;

  beforeEach(() => {
    git = new MemoryGitModule('/test/repo');
  });

  describe('metadata helpers', () => {
    it('should report the repo root and current branch', async () => {
      git.setBranch('feature-branch');

      await expect(git.getRepoRoot()).resolves.toBe('/test/repo');
      await expect(git.getCurrentBranch()).resolves.toBe('feature-branch');
    });

    it('should reject a detached HEAD', async () => {
      git.detachHead();

      await expect(git.getCurrentBranch()).rejects.toBeInstanceOf(BranchNotFoundError);
    });

    it('should resolve HEAD only once it is set', async () => {
      await expect(git.getCommitHash()).rejects.toBeInstanceOf(GitCommandError);

      git.setHead('1111111111111111111111111111111111111111');

      await expect(git.getCommitHash('HEAD')).resolves.toBe('1111111111111111111111111111111111111111');
    });

    it('should return remote URLs by name', async () => {
      git.setRemoteUrl('origin', 'git@github.com:acme/widgets.git');

      await expect(git.getRemoteUrl()).resolves.toBe('git@github.com:acme/widgets.git');
      await expect(git.getRemoteUrl('upstream')).resolves.toBeNull();
    });
  });

  describe('objects', () => {
    it('should store blobs under their content id', async () => {
      const id = git.addBlob('hello');

      const object = await git.readObject(id);

      expect(object?.type).toBe('blob');
      expect(object?.content.toString('utf8')).toBe('hello');
    });

    it('should return null for unknown ids', async () => {
      await expect(git.readObject('d'.repeat(40))).resolves.toBeNull();
    });
  });

  describe('stage', () => {
    it('should default modes and ids by status', async () => {
      git.stage({ status: 'A', path: 'new.txt' });
      git.stage({ status: 'D', path: 'gone.txt' });

      await expect(git.diffHeadToIndex()).resolves.toEqual([
        { status: 'A', sourceMode: '000000', destinationMode: '100644', sourceId: ZERO_OBJECT_ID, destinationId: ZERO_OBJECT_ID, path: 'new.txt' },
        { status: 'D', sourceMode: '100644', destinationMode: '000000', sourceId: ZERO_OBJECT_ID, destinationId: ZERO_OBJECT_ID, path: 'gone.txt' },
      ]);
    });

    it('should add a stage-0 index entry for everything but deletions', async () => {
      const id = git.addBlob('x');
      git.stage({ status: 'R', path: 'b.txt', originalPath: 'a.txt', destinationId: id, score: 100 });
      git.stage({ status: 'D', path: 'c.txt' });

      await expect(git.listIndexEntries()).resolves.toEqual([
        { mode: '100644', objectId: id, stage: 0, path: 'b.txt' },
      ]);
    });

    it('should hand out copies of its state', async () => {
      git.stage({ status: 'A', path: 'x' });

      const [entry] = await git.diffHeadToIndex();
      if (entry) {
        entry.path = 'changed';
      }

      await expect(git.diffHeadToIndex()).resolves.toMatchObject([{ path: 'x' }]);
    });
  });

  describe('conflicts', () => {
    it('should report conflicts from stages 1 to 3', async () => {
      await expect(git.indexHasConflicts()).resolves.toBe(false);

      git.setConflict('both.txt');

      await expect(git.indexHasConflicts()).resolves.toBe(true);
      expect((await git.listIndexEntries()).map((e) => e.stage)).toEqual([1, 2, 3]);
    });

    it('should forget staged state on clear', async () => {
      git.setConflict('both.txt');
      git.stage({ status: 'A', path: 'x', destinationId: git.addBlob('x') });

      git.clear();

      await expect(git.indexHasConflicts()).resolves.toBe(false);
      await expect(git.diffHeadToIndex()).resolves.toEqual([]);
    });
  });
});
