/**
 * Types for the change set between the last commit and the staged index.
 */

export const CHANGE_KINDS = [
  'added',
  'modified',
  'deleted',
  'renamed',
  'copied',
  'type-changed',
  'unmodified',
  'ignored',
  'untracked',
  'unreadable',
  'conflicted',
] as const;

export type ChangeKind = (typeof CHANGE_KINDS)[number];

/**
 * Local file mode of the staged entry. `group-writable` and `unreadable`
 * exist locally but have no GitHub counterpart.
 */
export type FileMode =
  | 'regular'
  | 'executable'
  | 'symlink'
  | 'submodule'
  | 'tree'
  | 'group-writable'
  | 'unreadable';

export type ObjectKind = 'blob' | 'tree' | 'commit';

/**
 * One changed path. Created fresh per run and never mutated.
 */
export type PathChange = Readonly<{
  kind: ChangeKind;
  mode: FileMode;
  /** Id of the staged object; absent for deletions */
  contentId?: string;
  /** Kind of the staged object per stage 0 of the index */
  objectKind?: ObjectKind;
  path: string;
  /** Path before a rename or copy */
  originalPath?: string;
}>;
