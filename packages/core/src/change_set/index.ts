/**
 * Change set - path-level changes between HEAD and the staged index
 *
 * @module change_set
 */

export { ChangeSetReader, statusToChangeKind, octalToFileMode, indexModeToObjectKind } from './change_set_reader';
export { CHANGE_KINDS } from './change_set.types';
export type { ChangeKind, FileMode, ObjectKind, PathChange } from './change_set.types';
