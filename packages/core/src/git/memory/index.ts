/**
 * @module git/memory
 */

export { MemoryGitModule, hashObject, ZERO_OBJECT_ID } from './memory_git_module';
export type { StageOptions } from './memory_git_module';
