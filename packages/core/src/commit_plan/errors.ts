/**
 * Error codes for failures while turning a change set into a commit payload.
 */
export type CommitPlanErrorCode =
  | 'NO_CHANGES'
  | 'UNSUPPORTED_CHANGE'
  | 'MISSING_ORIGINAL_PATH'
  | 'UNSUPPORTED_FILE_MODE'
  | 'UNSUPPORTED_OBJECT_KIND'
  | 'CONTENT_NOT_FOUND'
  | 'NOT_A_BLOB'
  | 'DUPLICATE_PATH'
  | 'ADD_DELETE_CONFLICT'
  | 'EMPTY_MESSAGE';

/**
 * Typed error for planning failures. Always terminal for the run.
 */
export class CommitPlanError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: CommitPlanErrorCode,
    /** Path the failure is about, when there is one */
    public readonly path?: string,
  ) {
    super(message);
    this.name = 'CommitPlanError';
    Object.setPrototypeOf(this, CommitPlanError.prototype);
  }
}
