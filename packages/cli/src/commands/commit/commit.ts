import { Command } from 'commander';
import { CommitCommand } from './commit-command';

/**
 * Registers the commit command (also the default command)
 */
export function registerCommitCommands(program: Command): void {
  const commitCommand = new CommitCommand();
  commitCommand.register(program);
}
