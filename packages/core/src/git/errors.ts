/**
 * Custom Error Classes for the local git module
 *
 * Raised by LocalRepository implementations and the change-set reader.
 */

/**
 * Base error class for all Git-related errors
 */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
    Object.setPrototypeOf(this, GitError.prototype);
  }
}

/**
 * Error thrown when a Git command fails
 */
export class GitCommandError extends GitError {
  public readonly stderr: string;
  public readonly command?: string | undefined;

  constructor(message: string, stderr: string = '', command?: string) {
    super(stderr.trim() ? `${message}: ${stderr.trim()}` : message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.command = command;
    Object.setPrototypeOf(this, GitCommandError.prototype);
  }
}

/**
 * Error thrown when HEAD does not point at a branch
 */
export class BranchNotFoundError extends GitError {
  public readonly ref: string;

  constructor(ref: string) {
    super(`Git repository HEAD branch name doesn't exist or is invalid: ${ref}`);
    this.name = 'BranchNotFoundError';
    this.ref = ref;
    Object.setPrototypeOf(this, BranchNotFoundError.prototype);
  }
}

/**
 * Error thrown when the index holds unresolved merge conflicts
 */
export class MergeConflictError extends GitError {
  public readonly conflictedFiles: string[];

  constructor(conflictedFiles: string[]) {
    super(
      `Unresolved merge conflicts in the index (${conflictedFiles.length} file(s)): ${conflictedFiles.join(', ')}`
    );
    this.name = 'MergeConflictError';
    this.conflictedFiles = conflictedFiles;
    Object.setPrototypeOf(this, MergeConflictError.prototype);
  }
}
