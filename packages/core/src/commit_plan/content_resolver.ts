import type { LocalRepository } from '../git/types';
import type { AddAction, AddSource, PlannedAction, ResolvedAction, ResolvedContent } from './commit_plan.types';
import { CommitPlanError } from './errors';
import { createLogger } from '../logger';

const logger = createLogger('[ContentResolver] ');

/**
 * Classifies blob bytes: valid UTF-8 is text (a leading BOM is kept),
 * anything else is base64-encoded binary.
 */
export function decodeContent(bytes: Uint8Array): ResolvedContent {
  const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
  try {
    return { kind: 'text', text: decoder.decode(bytes) };
  } catch {
    return { kind: 'binary', base64: Buffer.from(bytes).toString('base64') };
  }
}

/**
 * Reads the staged content of every add action from the object database.
 */
export class ContentResolver {
  constructor(private readonly repository: LocalRepository) {}

  async resolve(actions: readonly PlannedAction[]): Promise<ResolvedAction[]> {
    const resolved: ResolvedAction[] = [];

    for (const action of actions) {
      if (action.type === 'delete') {
        resolved.push(action);
        continue;
      }
      resolved.push({ ...action, source: await this.resolveSource(action) });
    }

    return resolved;
  }

  private async resolveSource(action: AddAction): Promise<AddSource> {
    const { change } = action;

    if (!change.contentId) {
      throw new CommitPlanError(
        `No staged object id for ${JSON.stringify(action.path)}`,
        'CONTENT_NOT_FOUND',
        action.path,
      );
    }

    // Gitlinks point at commits in another repository
    if (change.objectKind === 'commit') {
      return { kind: 'object', objectId: change.contentId };
    }

    const object = await this.repository.readObject(change.contentId);
    if (!object) {
      throw new CommitPlanError(
        `Object ${change.contentId} for ${JSON.stringify(action.path)} was not found`,
        'CONTENT_NOT_FOUND',
        action.path,
      );
    }
    if (object.type !== 'blob') {
      throw new CommitPlanError(
        `Object ${change.contentId} for ${JSON.stringify(action.path)} is a ${object.type}, expected a blob`,
        'NOT_A_BLOB',
        action.path,
      );
    }

    const content = decodeContent(object.content);
    logger.debug(`${action.path}: ${content.kind}, ${object.content.length} bytes`);
    return content;
  }
}
