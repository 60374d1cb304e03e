/**
 * Git module - read access to the local repository
 *
 * @module git
 */

export { LocalGitModule, parseRawDiff, parseIndexEntries } from './local';
export { MemoryGitModule, hashObject, ZERO_OBJECT_ID } from './memory';
export type { StageOptions } from './memory';

export type {
  GitModuleDependencies,
  ExecCommand,
  ExecOptions,
  ExecResult,
  RawDiffEntry,
  IndexEntry,
  GitObject,
  GitObjectType,
  LocalRepository,
} from './types';

export {
  GitError,
  GitCommandError,
  BranchNotFoundError,
  MergeConflictError,
} from './errors';
