/**
 * MutationPayloadAssembler - input for the GraphQL createCommitOnBranch mutation
 *
 * @module payload/mutation
 */

import type { AddSource, ResolvedAction } from '../commit_plan/commit_plan.types';
import { CommitPlanError } from '../commit_plan/errors';
import type { CommitMessage, FileAddition, FileDeletion } from '../github/github.types';
import type { AssembledPayload, PayloadAssembler, PayloadTarget } from './payload.types';

/**
 * First line is the headline, kept as written; the remaining lines, after
 * any blank separator lines, are the body.
 *
 * @throws CommitPlanError EMPTY_MESSAGE for a blank message
 */
export function splitCommitMessage(message: string): CommitMessage {
  if (!message.trim()) {
    throw new CommitPlanError('Commit message must not be empty', 'EMPTY_MESSAGE');
  }
  const [headline = '', ...rest] = message.split(/\r?\n/);
  const body = rest.join('\n').replace(/^(\s*\n)+/, '').trimEnd();
  return body ? { headline, body } : { headline };
}

function toBase64Contents(path: string, source: AddSource): string {
  switch (source.kind) {
    case 'text':
      return Buffer.from(source.text, 'utf8').toString('base64');
    case 'binary':
      return source.base64;
    case 'object':
      throw new CommitPlanError(
        `Submodule path ${JSON.stringify(path)} cannot be committed with createCommitOnBranch`,
        'UNSUPPORTED_OBJECT_KIND',
        path,
      );
  }
}

/** createCommitOnBranch has no file mode, so only regular files map onto it */
function assertRegularFile(action: Extract<ResolvedAction, { type: 'add' }>): void {
  if (action.change.mode !== 'regular') {
    throw new CommitPlanError(
      `Unsupported file mode ${action.change.mode} for path ${JSON.stringify(action.path)} with createCommitOnBranch`,
      'UNSUPPORTED_FILE_MODE',
      action.path,
    );
  }
}

function assertUniquePaths(entries: ReadonlyArray<{ path: string }>, list: string): void {
  const seen = new Set<string>();
  for (const { path } of entries) {
    if (seen.has(path)) {
      throw new CommitPlanError(`Duplicate path ${JSON.stringify(path)} in ${list}`, 'DUPLICATE_PATH', path);
    }
    seen.add(path);
  }
}

export class MutationPayloadAssembler implements PayloadAssembler {
  readonly strategy = 'mutation' as const;

  async assemble(actions: readonly ResolvedAction[], target: PayloadTarget): Promise<AssembledPayload> {
    const additions: FileAddition[] = [];
    const deletions: FileDeletion[] = [];

    for (const action of actions) {
      if (action.type === 'add') {
        const contents = toBase64Contents(action.path, action.source);
        assertRegularFile(action);
        additions.push({ path: action.path, contents });
      } else {
        deletions.push({ path: action.path });
      }
    }

    if (additions.length === 0 && deletions.length === 0) {
      throw new CommitPlanError('No changes to commit', 'NO_CHANGES');
    }
    assertUniquePaths(additions, 'additions');
    assertUniquePaths(deletions, 'deletions');

    const added = new Set(additions.map((addition) => addition.path));
    const conflict = deletions.find((deletion) => added.has(deletion.path));
    if (conflict) {
      throw new CommitPlanError(
        `Path ${JSON.stringify(conflict.path)} is both added and deleted`,
        'ADD_DELETE_CONFLICT',
        conflict.path,
      );
    }

    return {
      strategy: 'mutation',
      input: {
        branch: {
          repositoryNameWithOwner: target.repositoryNameWithOwner,
          branchName: target.branchName,
        },
        expectedHeadOid: target.headCommitId,
        fileChanges: { additions, deletions },
        message: splitCommitMessage(target.commitMessage),
      },
    };
  }
}
