import type { ChangeKind, PathChange } from '../change_set/change_set.types';
import type { CommitAction, PlannedAction } from './commit_plan.types';
import { CommitPlanError } from './errors';

const ADD_PATH: readonly CommitAction[] = Object.freeze(['add-path']);
const ADD_PATH_AND_DELETE_ORIGINAL_PATH: readonly CommitAction[] = Object.freeze(['add-path', 'delete-original-path']);
const DELETE_PATH: readonly CommitAction[] = Object.freeze(['delete-path']);
const NOP: readonly CommitAction[] = Object.freeze(['nop']);
const UNSUPPORTED: readonly CommitAction[] = Object.freeze(['unsupported']);

/**
 * Fixed mapping from change kind to the actions it expands to.
 */
export const CHANGE_KIND_ACTIONS: Readonly<Record<ChangeKind, readonly CommitAction[]>> = Object.freeze({
  'modified': ADD_PATH,
  'added': ADD_PATH,
  'copied': ADD_PATH,
  'type-changed': ADD_PATH,
  'renamed': ADD_PATH_AND_DELETE_ORIGINAL_PATH,
  'deleted': DELETE_PATH,
  'unmodified': NOP,
  'ignored': NOP,
  'untracked': NOP,
  'unreadable': UNSUPPORTED,
  'conflicted': UNSUPPORTED,
});

export function actionsFor(kind: ChangeKind): readonly CommitAction[] {
  return CHANGE_KIND_ACTIONS[kind];
}

/**
 * Binds every action of every change to its target path.
 *
 * @throws CommitPlanError UNSUPPORTED_CHANGE for unreadable/conflicted changes
 * @throws CommitPlanError MISSING_ORIGINAL_PATH when a rename lacks its source path
 */
export function planActions(changes: readonly PathChange[]): PlannedAction[] {
  const planned: PlannedAction[] = [];

  for (const change of changes) {
    for (const action of actionsFor(change.kind)) {
      switch (action) {
        case 'add-path':
          planned.push({ type: 'add', path: change.path, change });
          break;
        case 'delete-original-path':
          if (!change.originalPath) {
            throw new CommitPlanError(
              `Expected an original path, but none was found for ${change.kind} path ${JSON.stringify(change.path)}`,
              'MISSING_ORIGINAL_PATH',
              change.path,
            );
          }
          planned.push({ type: 'delete', path: change.originalPath, change });
          break;
        case 'delete-path':
          planned.push({ type: 'delete', path: change.path, change });
          break;
        case 'nop':
          break;
        case 'unsupported':
          throw new CommitPlanError(
            `Unsupported change kind ${change.kind} for path ${JSON.stringify(change.path)}`,
            'UNSUPPORTED_CHANGE',
            change.path,
          );
        default: {
          const exhaustive: never = action;
          throw new Error(`Unhandled commit action: ${String(exhaustive)}`);
        }
      }
    }
  }

  return planned;
}
