/**
 * TreePayloadAssembler - create-tree request for the REST Git Data API
 *
 * @module payload/tree
 */

import type { FileMode, ObjectKind } from '../change_set/change_set.types';
import type { AddAction, AddSource, ResolvedAction } from '../commit_plan/commit_plan.types';
import { CommitPlanError } from '../commit_plan/errors';
import type { GitHubFileMode, GitHubNodeType, TreeEntryPayload } from '../github/github.types';
import type { AssembledPayload, BlobUploader, PayloadAssembler, PayloadTarget, TreeNode, TreeNodeSource } from './payload.types';
import { createLogger } from '../logger';

const logger = createLogger('[TreePayload] ');

const GITHUB_FILE_MODES: Readonly<Record<FileMode, GitHubFileMode | null>> = Object.freeze({
  'regular': '100644',
  'executable': '100755',
  'symlink': '120000',
  'submodule': '160000',
  'tree': '040000',
  'group-writable': null,
  'unreadable': null,
});

const GITHUB_NODE_TYPES: Readonly<Record<ObjectKind, GitHubNodeType>> = Object.freeze({
  blob: 'blob',
  tree: 'tree',
  commit: 'commit',
});

/** Mode and type sent for deletions; GitHub ignores both when sha is null */
export const DELETION_MODE: GitHubFileMode = '100644';
export const DELETION_TYPE: GitHubNodeType = 'blob';

export function toGitHubFileMode(mode: FileMode, path: string): GitHubFileMode {
  const githubMode = GITHUB_FILE_MODES[mode];
  if (githubMode === null) {
    throw new CommitPlanError(
      `Unsupported file mode ${mode} for path ${JSON.stringify(path)}`,
      'UNSUPPORTED_FILE_MODE',
      path,
    );
  }
  return githubMode;
}

export function toGitHubNodeType(objectKind: ObjectKind | undefined, path: string): GitHubNodeType {
  if (objectKind === undefined) {
    throw new CommitPlanError(
      `Unknown object kind for path ${JSON.stringify(path)}`,
      'UNSUPPORTED_OBJECT_KIND',
      path,
    );
  }
  return GITHUB_NODE_TYPES[objectKind];
}

/**
 * Wire form of a node: exactly one of `content` and `sha`.
 */
export function serializeTreeNode(node: TreeNode): TreeEntryPayload {
  const { path, mode, type, source } = node;
  switch (source.kind) {
    case 'content':
      return { path, mode, type, content: source.content };
    case 'sha':
      return { path, mode, type, sha: source.sha };
  }
}

type PendingNode = Omit<TreeNode, 'source'> & { add: AddSource };

export class TreePayloadAssembler implements PayloadAssembler {
  readonly strategy = 'tree' as const;

  constructor(private readonly blobs: BlobUploader) {}

  async assemble(actions: readonly ResolvedAction[], target: PayloadTarget): Promise<AssembledPayload> {
    if (actions.length === 0) {
      throw new CommitPlanError('No changes to commit', 'NO_CHANGES');
    }

    // Every node is checked before the first blob upload
    const pending: Array<PendingNode | TreeNode> = actions.map((action) =>
      action.type === 'add' ? this.describeAddition(action) : this.describeDeletion(action.path),
    );

    const nodes: TreeNode[] = [];
    for (const node of pending) {
      nodes.push('add' in node ? { path: node.path, mode: node.mode, type: node.type, source: await this.upload(node) } : node);
    }

    logger.debug(`Assembled ${nodes.length} tree entries on ${target.headCommitId}`);

    return {
      strategy: 'tree',
      request: {
        base_tree: target.headCommitId,
        tree: nodes.map(serializeTreeNode),
      },
    };
  }

  private describeAddition(action: AddAction & { source: AddSource }): PendingNode {
    return {
      path: action.path,
      mode: toGitHubFileMode(action.change.mode, action.path),
      type: toGitHubNodeType(action.change.objectKind, action.path),
      add: action.source,
    };
  }

  private describeDeletion(path: string): TreeNode {
    return { path, mode: DELETION_MODE, type: DELETION_TYPE, source: { kind: 'sha', sha: null } };
  }

  private async upload(node: PendingNode): Promise<TreeNodeSource> {
    const source = node.add;
    switch (source.kind) {
      case 'text':
        return { kind: 'content', content: source.text };
      case 'binary': {
        const sha = await this.blobs.createBlob({ content: source.base64, encoding: 'base64' });
        logger.debug(`Uploaded binary blob for ${node.path}: ${sha}`);
        return { kind: 'sha', sha };
      }
      case 'object':
        return { kind: 'sha', sha: source.objectId };
    }
  }
}
