/**
 * MemoryGitModule - In-memory LocalRepository implementation for tests
 *
 * All state is kept in memory with no filesystem or process access.
 *
 * Test Helpers:
 * - setBranch(name) / detachHead(): control getCurrentBranch
 * - setHead(commitId): control getCommitHash
 * - setRemoteUrl(name, url): control getRemoteUrl
 * - addObject / addBlob: populate the object database
 * - stage(...): record a diff entry and its stage-0 index entry together
 * - setConflict(path): add stage 1-3 entries for a path
 *
 * @module git/memory
 */

import { createHash } from 'crypto';
import type { GitObject, GitObjectType, IndexEntry, LocalRepository, RawDiffEntry } from '../types';
import { BranchNotFoundError, GitCommandError } from '../errors';

export const ZERO_OBJECT_ID = '0000000000000000000000000000000000000000';

/** Same id `git hash-object` computes for the content */
export function hashObject(type: GitObjectType, content: Buffer): string {
  return createHash('sha1')
    .update(`${type} ${content.length}\0`)
    .update(content)
    .digest('hex');
}

export type StageOptions = {
  status: string;
  path: string;
  originalPath?: string;
  sourceMode?: string;
  destinationMode?: string;
  sourceId?: string;
  destinationId?: string;
  score?: number;
};

interface MemoryGitState {
  repoRoot: string;
  currentBranch: string | null;
  head: string | null;
  remotes: Map<string, string>;
  diff: RawDiffEntry[];
  index: IndexEntry[];
  objects: Map<string, GitObject>;
}

export class MemoryGitModule implements LocalRepository {
  private state: MemoryGitState;

  constructor(repoRoot: string = '/test/repo') {
    this.state = {
      repoRoot,
      currentBranch: 'main',
      head: null,
      remotes: new Map(),
      diff: [],
      index: [],
      objects: new Map(),
    };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // TEST HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  setBranch(name: string): void {
    this.state.currentBranch = name;
  }

  detachHead(): void {
    this.state.currentBranch = null;
  }

  setHead(commitId: string): void {
    this.state.head = commitId;
  }

  setRemoteUrl(remoteName: string, url: string): void {
    this.state.remotes.set(remoteName, url);
  }

  addObject(type: GitObjectType, content: Buffer): string {
    const id = hashObject(type, content);
    this.state.objects.set(id, { type, content });
    return id;
  }

  addBlob(content: string | Buffer): string {
    return this.addObject('blob', typeof content === 'string' ? Buffer.from(content, 'utf8') : content);
  }

  addIndexEntry(entry: IndexEntry): void {
    this.state.index.push(entry);
  }

  /**
   * Records a staged change. Non-deletions also get a stage-0 index entry
   * for the new path.
   */
  stage(options: StageOptions): RawDiffEntry {
    const entry: RawDiffEntry = {
      status: options.status,
      sourceMode: options.sourceMode ?? (options.status === 'A' ? '000000' : '100644'),
      destinationMode: options.destinationMode ?? (options.status === 'D' ? '000000' : '100644'),
      sourceId: options.sourceId ?? ZERO_OBJECT_ID,
      destinationId: options.destinationId ?? ZERO_OBJECT_ID,
      path: options.path,
    };
    if (options.originalPath !== undefined) {
      entry.originalPath = options.originalPath;
    }
    if (options.score !== undefined) {
      entry.score = options.score;
    }
    this.state.diff.push(entry);

    if (options.status !== 'D') {
      this.state.index.push({
        mode: entry.destinationMode,
        objectId: entry.destinationId,
        stage: 0,
        path: entry.path,
      });
    }
    return entry;
  }

  setConflict(path: string): void {
    for (const stage of [1, 2, 3]) {
      this.state.index.push({ mode: '100644', objectId: ZERO_OBJECT_ID, stage, path });
    }
  }

  clear(): void {
    this.state.diff = [];
    this.state.index = [];
    this.state.objects.clear();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // LocalRepository
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.state.repoRoot;
  }

  async getCurrentBranch(): Promise<string> {
    if (!this.state.currentBranch) {
      throw new BranchNotFoundError('HEAD');
    }
    return this.state.currentBranch;
  }

  async getCommitHash(ref: string = 'HEAD'): Promise<string> {
    if (ref !== 'HEAD' || !this.state.head) {
      throw new GitCommandError(`Could not resolve commit for ${ref}`);
    }
    return this.state.head;
  }

  async getRemoteUrl(remoteName: string = 'origin'): Promise<string | null> {
    return this.state.remotes.get(remoteName) ?? null;
  }

  async diffHeadToIndex(): Promise<RawDiffEntry[]> {
    return this.state.diff.map((entry) => ({ ...entry }));
  }

  async listIndexEntries(): Promise<IndexEntry[]> {
    return this.state.index.map((entry) => ({ ...entry }));
  }

  async indexHasConflicts(): Promise<boolean> {
    return this.state.index.some((entry) => entry.stage !== 0);
  }

  async readObject(objectId: string): Promise<GitObject | null> {
    return this.state.objects.get(objectId) ?? null;
  }
}
