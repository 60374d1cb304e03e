/**
 * Payload assembly - resolved actions to GitHub request bodies
 *
 * @module payload
 */

export {
  TreePayloadAssembler,
  serializeTreeNode,
  toGitHubFileMode,
  toGitHubNodeType,
  DELETION_MODE,
  DELETION_TYPE,
} from './tree_payload_assembler';
export { MutationPayloadAssembler, splitCommitMessage } from './mutation_payload_assembler';
export { COMMIT_STRATEGIES } from './payload.types';
export type {
  CommitStrategy,
  PayloadTarget,
  AssembledPayload,
  PayloadAssembler,
  BlobUploader,
  TreeNode,
  TreeNodeSource,
} from './payload.types';
