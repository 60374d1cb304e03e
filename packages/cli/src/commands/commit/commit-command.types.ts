import type { CommitStrategy } from '@app-commit/core';
import type { BaseCommandOptions } from '../../interfaces/command';

/**
 * Commit Command Options interface
 */
export interface CommitCommandOptions extends BaseCommandOptions {
  message: string;
  force?: boolean;
  /** Validated against the known strategies at run time */
  strategy?: string;
  owner?: string;
  repo?: string;
  apiUrl?: string;
}

/** Data printed by --json on success */
export interface CommitCommandResult {
  commitUrl: string;
  commitSha: string;
  branch: string;
  repository: string;
  strategy: CommitStrategy;
}
