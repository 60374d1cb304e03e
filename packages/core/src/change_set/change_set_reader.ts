import type { IndexEntry, LocalRepository, RawDiffEntry } from '../git/types';
import { MergeConflictError } from '../git/errors';
import { createLogger } from '../logger';
import type { ChangeKind, FileMode, ObjectKind, PathChange } from './change_set.types';

const logger = createLogger('[ChangeSetReader] ');

const ZERO_ID = /^0+$/;

const STATUS_KINDS: Readonly<Record<string, ChangeKind>> = Object.freeze({
  A: 'added',
  C: 'copied',
  D: 'deleted',
  M: 'modified',
  R: 'renamed',
  T: 'type-changed',
  U: 'conflicted',
  X: 'unreadable',
});

const MODES: Readonly<Record<string, FileMode>> = Object.freeze({
  '100644': 'regular',
  '100755': 'executable',
  '120000': 'symlink',
  '160000': 'submodule',
  '040000': 'tree',
  '100664': 'group-writable',
});

export function statusToChangeKind(status: string): ChangeKind {
  return STATUS_KINDS[status] ?? 'unreadable';
}

export function octalToFileMode(mode: string): FileMode {
  return MODES[mode] ?? 'unreadable';
}

export function indexModeToObjectKind(mode: string): ObjectKind {
  if (mode === '160000') {
    return 'commit';
  }
  if (mode === '040000') {
    return 'tree';
  }
  return 'blob';
}

/**
 * Computes the ordered list of path changes between HEAD and the index.
 *
 * Refuses to read anything while the index has unresolved conflicts:
 * picking a side silently would commit the wrong content.
 */
export class ChangeSetReader {
  constructor(private readonly repository: LocalRepository) {}

  async read(): Promise<PathChange[]> {
    const indexEntries = await this.repository.listIndexEntries();

    const conflicted = [...new Set(indexEntries.filter((e) => e.stage !== 0).map((e) => e.path))];
    if (conflicted.length > 0) {
      throw new MergeConflictError(conflicted);
    }

    const stageZero = new Map<string, IndexEntry>();
    for (const entry of indexEntries) {
      stageZero.set(entry.path, entry);
    }

    const diff = await this.repository.diffHeadToIndex();
    const changes = diff.map((entry) => toPathChange(entry, stageZero.get(entry.path)));

    logger.debug(`${changes.length} staged change(s)`);
    return changes;
  }
}

function toPathChange(entry: RawDiffEntry, staged: IndexEntry | undefined): PathChange {
  const change: {
    kind: ChangeKind;
    mode: FileMode;
    path: string;
    contentId?: string;
    objectKind?: ObjectKind;
    originalPath?: string;
  } = {
    kind: statusToChangeKind(entry.status),
    mode: octalToFileMode(entry.destinationMode),
    path: entry.path,
  };

  if (!ZERO_ID.test(entry.destinationId)) {
    change.contentId = entry.destinationId;
  }
  if (staged) {
    change.objectKind = indexModeToObjectKind(staged.mode);
  }
  if (entry.originalPath !== undefined) {
    change.originalPath = entry.originalPath;
  }

  return Object.freeze(change);
}
