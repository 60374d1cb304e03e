/**
 * LocalGitModule - Read access to the local repository through the git CLI
 *
 * Exposes semantic methods instead of raw Git commands: the HEAD-to-index
 * diff, the staged index entries, objects by id and branch metadata.
 * Parsing uses NUL-terminated output (-z) so paths never need unquoting.
 *
 * @module git/local
 */

import type {
  ExecCommand,
  ExecOptions,
  ExecResult,
  GitModuleDependencies,
  GitObject,
  GitObjectType,
  IndexEntry,
  LocalRepository,
  RawDiffEntry,
} from '../types';
import { BranchNotFoundError, GitCommandError } from '../errors';
import { createLogger } from '../../logger';

const logger = createLogger('[GitModule] ');

const OBJECT_TYPES: readonly GitObjectType[] = ['blob', 'tree', 'commit', 'tag'];

function isObjectType(value: string): value is GitObjectType {
  return OBJECT_TYPES.some((type) => type === value);
}

/**
 * Parses `git diff-index --raw -z` output.
 *
 * Each record is a header (`:srcMode dstMode srcId dstId status`) followed by
 * one path, or two (source, destination) for renames and copies.
 */
export function parseRawDiff(output: string): RawDiffEntry[] {
  const tokens = output.split('\0');
  const entries: RawDiffEntry[] = [];
  let i = 0;

  while (i < tokens.length) {
    const header = tokens[i++];
    if (header === undefined || header === '') {
      continue;
    }
    if (!header.startsWith(':')) {
      throw new GitCommandError(`Unexpected diff-index record: ${JSON.stringify(header)}`);
    }

    const [sourceMode, destinationMode, sourceId, destinationId, statusField] = header.slice(1).split(' ');
    if (!sourceMode || !destinationMode || !sourceId || !destinationId || !statusField) {
      throw new GitCommandError(`Malformed diff-index header: ${JSON.stringify(header)}`);
    }

    const status = statusField.charAt(0);
    const scoreText = statusField.slice(1);
    const hasTwoPaths = status === 'R' || status === 'C';

    const firstPath = tokens[i++];
    const secondPath = hasTwoPaths ? tokens[i++] : undefined;
    if (firstPath === undefined || (hasTwoPaths && secondPath === undefined)) {
      throw new GitCommandError(`diff-index record is missing its path: ${JSON.stringify(header)}`);
    }

    const entry: RawDiffEntry = {
      status,
      sourceMode,
      destinationMode,
      sourceId,
      destinationId,
      path: secondPath ?? firstPath,
    };
    if (scoreText) {
      entry.score = Number(scoreText);
    }
    if (secondPath !== undefined) {
      entry.originalPath = firstPath;
    }
    entries.push(entry);
  }

  return entries;
}

/**
 * Parses `git ls-files --stage -z` output (`mode id stage<TAB>path`).
 */
export function parseIndexEntries(output: string): IndexEntry[] {
  const entries: IndexEntry[] = [];

  for (const record of output.split('\0')) {
    if (!record) {
      continue;
    }
    const tab = record.indexOf('\t');
    const [mode, objectId, stage] = (tab === -1 ? '' : record.slice(0, tab)).split(' ');
    if (!mode || !objectId || stage === undefined || !/^[0-3]$/.test(stage)) {
      throw new GitCommandError(`Malformed ls-files record: ${JSON.stringify(record)}`);
    }
    entries.push({ mode, objectId, stage: Number(stage), path: record.slice(tab + 1) });
  }

  return entries;
}

/**
 * LocalGitModule class providing the read operations the commit pipeline needs
 *
 * All operations are async and use dependency injection for testability.
 * Failed git invocations surface as GitCommandError.
 */
export class LocalGitModule implements LocalRepository {
  private repoRoot: string;
  private execCommand: ExecCommand;

  constructor(dependencies: GitModuleDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for LocalGitModule');
    }

    this.execCommand = dependencies.execCommand;
    this.repoRoot = dependencies.repoRoot || '';
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PRIVATE HELPERS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Ensures that repoRoot is set, auto-detecting it if necessary
   *
   * @throws GitCommandError if not in a Git repository
   */
  private async ensureRepoRoot(): Promise<string> {
    if (!this.repoRoot) {
      const result = await this.execCommand('git', ['rev-parse', '--show-toplevel']);
      if (result.exitCode !== 0) {
        throw new GitCommandError('Not in a Git repository', result.stderr);
      }
      this.repoRoot = result.stdout.trim();
    }
    return this.repoRoot;
  }

  private async execGit(args: string[], options?: ExecOptions): Promise<ExecResult> {
    const cwd = options?.cwd || await this.ensureRepoRoot();
    logger.debug(`git ${args.join(' ')}`);
    return this.execCommand('git', args, { ...options, cwd });
  }

  private async execGitOrThrow(args: string[], failureMessage: string): Promise<ExecResult> {
    const result = await this.execGit(args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(failureMessage, result.stderr, `git ${args.join(' ')}`);
    }
    return result;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // REPOSITORY METADATA
  // ═══════════════════════════════════════════════════════════════════════

  async getRepoRoot(): Promise<string> {
    return this.ensureRepoRoot();
  }

  /**
   * Returns the short name of the branch HEAD points at
   *
   * @throws BranchNotFoundError when HEAD is detached
   */
  async getCurrentBranch(): Promise<string> {
    const result = await this.execGit(['symbolic-ref', '--quiet', '--short', 'HEAD']);
    const branch = result.stdout.trim();

    if (result.exitCode !== 0 || !branch) {
      throw new BranchNotFoundError('HEAD');
    }

    return branch;
  }

  /**
   * Resolves a ref to the commit id it points at
   *
   * @example
   * const head = await gitModule.getCommitHash();
   * // => "a1b2c3..."
   */
  async getCommitHash(ref: string = 'HEAD'): Promise<string> {
    const result = await this.execGit(['rev-parse', '--verify', '--quiet', `${ref}^{commit}`]);

    if (result.exitCode !== 0 || !result.stdout.trim()) {
      throw new GitCommandError(`Could not resolve commit for ${ref}`, result.stderr);
    }

    return result.stdout.trim();
  }

  /**
   * Returns the push URL of a remote, falling back to its fetch URL
   */
  async getRemoteUrl(remoteName: string = 'origin'): Promise<string | null> {
    const push = await this.execGit(['remote', 'get-url', '--push', remoteName]);
    if (push.exitCode === 0 && push.stdout.trim()) {
      return push.stdout.trim();
    }

    const fetchUrl = await this.execGit(['remote', 'get-url', remoteName]);
    if (fetchUrl.exitCode === 0 && fetchUrl.stdout.trim()) {
      return fetchUrl.stdout.trim();
    }

    return null;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INDEX & DIFF
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Diffs the HEAD tree against the index with rename, copy and
   * type-change detection
   */
  async diffHeadToIndex(): Promise<RawDiffEntry[]> {
    const result = await this.execGitOrThrow(
      ['diff-index', '--cached', '--raw', '-z', '--no-abbrev', '--find-renames', '--find-copies', 'HEAD'],
      'Unable to create diff between head tree and index'
    );
    return parseRawDiff(result.stdout);
  }

  async listIndexEntries(): Promise<IndexEntry[]> {
    const result = await this.execGitOrThrow(['ls-files', '--stage', '-z'], 'Unable to read git index');
    return parseIndexEntries(result.stdout);
  }

  async indexHasConflicts(): Promise<boolean> {
    const entries = await this.listIndexEntries();
    return entries.some((entry) => entry.stage !== 0);
  }

  // ═══════════════════════════════════════════════════════════════════════
  // OBJECTS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Reads an object from the object database by id, never from the
   * working tree
   *
   * @returns The object, or null if the id is unknown
   */
  async readObject(objectId: string): Promise<GitObject | null> {
    const typeResult = await this.execGit(['cat-file', '-t', objectId]);
    if (typeResult.exitCode !== 0) {
      return null;
    }

    const type = typeResult.stdout.trim();
    if (!isObjectType(type)) {
      throw new GitCommandError(`Unknown object type ${JSON.stringify(type)} for ${objectId}`);
    }

    const contentResult = await this.execGitOrThrow(
      ['cat-file', type, objectId],
      `Unable to read object ${objectId}`
    );

    return { type, content: contentResult.rawStdout };
  }
}
