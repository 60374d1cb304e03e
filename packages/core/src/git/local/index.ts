/**
 * Local Git Module - CLI-based implementation
 *
 * Uses execCommand to run git CLI commands.
 *
 * @module git/local
 */

export { LocalGitModule, parseRawDiff, parseIndexEntries } from './local_git_module';
