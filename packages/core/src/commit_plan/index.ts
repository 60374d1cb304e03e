/**
 * Commit plan - actions and content derived from a change set
 *
 * @module commit_plan
 */

export { CHANGE_KIND_ACTIONS, actionsFor, planActions } from './action_resolver';
export { ContentResolver, decodeContent } from './content_resolver';
export { CommitPlanError } from './errors';
export type { CommitPlanErrorCode } from './errors';
export type {
  CommitAction,
  PlannedAction,
  AddAction,
  DeleteAction,
  ResolvedContent,
  AddSource,
  ResolvedAction,
} from './commit_plan.types';
