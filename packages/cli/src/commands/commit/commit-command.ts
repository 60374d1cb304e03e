import { Command } from 'commander';
import { commitStagedChanges, Payload } from '@app-commit/core';
import type { CommitStrategy } from '@app-commit/core';
import { BaseCommand } from '../../base/base-command';
import { loadDotEnv, readAppConfig, readGitConfig } from '../../config/config';
import type { CommitCommandOptions, CommitCommandResult } from './commit-command.types';

function isCommitStrategy(value: string): value is CommitStrategy {
  return Payload.COMMIT_STRATEGIES.some((strategy) => strategy === value);
}

/**
 * CommitCommand - commit the staged changes through the GitHub API
 *
 * Reads the branch, HEAD and remote from the local repository and the
 * GitHub App credentials from the environment, then hands everything to
 * the core commit pipeline.
 */
export class CommitCommand extends BaseCommand<CommitCommandOptions> {

  register(program: Command): void {
    program
      .command('commit', { isDefault: true })
      .description('Commit staged changes to the current branch on GitHub as a GitHub App')
      .requiredOption('-m, --message <message>', 'Commit message')
      .option('-f, --force', 'Force-update the remote branch', false)
      .option('--strategy <strategy>', 'Commit through "tree" (REST Git Data API) or "mutation" (GraphQL)', 'tree')
      .option('--owner <owner>', 'Repository owner (defaults to the origin remote)')
      .option('--repo <repo>', 'Repository name (defaults to the origin remote)')
      .option('--api-url <url>', 'GitHub API base URL')
      .option('--json', 'Output results in JSON format')
      .option('-v, --verbose', 'Enable verbose output with detailed information')
      .option('-q, --quiet', 'Suppress non-essential output')
      .action(async (options: CommitCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: CommitCommandOptions): Promise<void> {
    this.applyLogLevel(options);

    const strategy = options.strategy ?? 'tree';
    if (!isCommitStrategy(strategy)) {
      this.handleError(`Unknown strategy ${JSON.stringify(strategy)}; expected "tree" or "mutation"`, options);
      return;
    }

    try {
      const data = await this.commit(options, strategy);
      this.handleSuccess(data, options, `Commit created: ${data.commitUrl}`);
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  private async commit(options: CommitCommandOptions, strategy: CommitStrategy): Promise<CommitCommandResult> {
    loadDotEnv();
    const app = readAppConfig();
    const repository = this.dependencyService.getLocalRepository();
    const git = await readGitConfig(repository, { owner: options.owner, repo: options.repo });

    const outcome = await commitStagedChanges({
      commitMessage: options.message,
      forcePush: options.force ?? false,
      repoOwner: git.owner,
      repoName: git.repo,
      branchName: git.branchName,
      headCommitId: git.headCommitId,
      appId: app.appId,
      installationId: app.installationId,
      privateKey: app.privateKey,
      repository,
      strategy,
      apiBaseUrl: options.apiUrl ?? app.apiBaseUrl,
    });

    if (!outcome.ok) {
      throw new Error(outcome.error);
    }

    return {
      commitUrl: outcome.commitUrl,
      commitSha: outcome.commitSha,
      branch: git.branchName,
      repository: `${git.owner}/${git.repo}`,
      strategy,
    };
  }
}
