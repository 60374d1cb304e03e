/**
 * Type Definitions for the local git module
 *
 * These types define the contracts for reading the local repository:
 * command execution, raw diff and index records, and stored objects.
 */

/**
 * Options for executing shell commands
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Additional environment variables */
  env?: Record<string, string>;
  /** Timeout in milliseconds */
  timeout?: number;
};

/**
 * Result of executing a shell command
 */
export type ExecResult = {
  /** Exit code (0 = success) */
  exitCode: number;
  /** Standard output decoded as UTF-8 */
  stdout: string;
  /** Standard error output */
  stderr: string;
  /** Standard output bytes, untouched (object contents may be binary) */
  rawStdout: Buffer;
};

export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;

/**
 * Dependencies required by LocalGitModule
 *
 * This module uses dependency injection to allow testing with mocks
 * and support different execution environments.
 */
export type GitModuleDependencies = {
  /** Path to the Git repository root (optional, auto-detected if not provided) */
  repoRoot?: string;
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
};

/**
 * One record of `git diff-index --raw`, HEAD tree against the index.
 */
export type RawDiffEntry = {
  /** Status letter (A, C, D, M, R, T, U, X) */
  status: string;
  /** Similarity score for renames and copies */
  score?: number;
  /** Octal mode on the HEAD side ("000000" when absent) */
  sourceMode: string;
  /** Octal mode on the index side ("000000" when absent) */
  destinationMode: string;
  /** Object id on the HEAD side */
  sourceId: string;
  /** Object id on the index side (all zeros when absent) */
  destinationId: string;
  /** Path on the index side */
  path: string;
  /** Path on the HEAD side, for renames and copies */
  originalPath?: string;
};

/**
 * One record of `git ls-files --stage`.
 */
export type IndexEntry = {
  mode: string;
  objectId: string;
  /** 0 for resolved entries, 1-3 for the sides of an unresolved conflict */
  stage: number;
  path: string;
};

export type GitObjectType = 'blob' | 'tree' | 'commit' | 'tag';

export type GitObject = {
  type: GitObjectType;
  content: Buffer;
};

/**
 * Read-only view of the local repository consumed by the commit pipeline.
 */
export interface LocalRepository {
  getRepoRoot(): Promise<string>;
  getCurrentBranch(): Promise<string>;
  getCommitHash(ref?: string): Promise<string>;
  getRemoteUrl(remoteName?: string): Promise<string | null>;
  diffHeadToIndex(): Promise<RawDiffEntry[]>;
  listIndexEntries(): Promise<IndexEntry[]>;
  indexHasConflicts(): Promise<boolean>;
  /** Reads an object by id; null when the object database does not have it */
  readObject(objectId: string): Promise<GitObject | null>;
}
