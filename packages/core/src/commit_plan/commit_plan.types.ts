import type { PathChange } from '../change_set/change_set.types';

/**
 * Abstract action a single path change expands to.
 */
export type CommitAction =
  | 'add-path'
  | 'delete-original-path'
  | 'delete-path'
  | 'nop'
  | 'unsupported';

/**
 * An action bound to the path it touches.
 */
export type PlannedAction =
  | { readonly type: 'add'; readonly path: string; readonly change: PathChange }
  | { readonly type: 'delete'; readonly path: string; readonly change: PathChange };

export type AddAction = Extract<PlannedAction, { type: 'add' }>;
export type DeleteAction = Extract<PlannedAction, { type: 'delete' }>;

/**
 * Content of a staged blob, read by object id.
 */
export type ResolvedContent =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'binary'; readonly base64: string };

/**
 * What an add action writes: literal content, or an existing object
 * (submodule gitlinks point at commits the local object store does not hold).
 */
export type AddSource = ResolvedContent | { readonly kind: 'object'; readonly objectId: string };

export type ResolvedAction =
  | (AddAction & { readonly source: AddSource })
  | DeleteAction;
