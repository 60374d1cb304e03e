/**
 * CommitOrchestrator - staged changes to a commit on GitHub
 *
 * Runs the stages in order: read the change set, plan actions, resolve
 * content, assemble the payload for the configured strategy and submit it.
 * Nothing reaches the network when there is nothing to commit.
 *
 * @module commit
 */

import { ChangeSetReader } from '../change_set/change_set_reader';
import { planActions } from '../commit_plan/action_resolver';
import { ContentResolver } from '../commit_plan/content_resolver';
import { CommitPlanError } from '../commit_plan/errors';
import { AccessTokenProvider } from '../github/access_token_provider';
import { GitHubClient } from '../github/github_client';
import type { CreatedCommit } from '../github/github.types';
import { MutationPayloadAssembler } from '../payload/mutation_payload_assembler';
import { TreePayloadAssembler } from '../payload/tree_payload_assembler';
import type { AssembledPayload, CommitStrategy, PayloadAssembler } from '../payload/payload.types';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type {
  CommitOrchestratorDependencies,
  CommitOutcome,
  CommitRequest,
  CommitResult,
  CommitStagedChangesOptions,
  RemoteCommitApi,
} from './commit.types';

export class CommitOrchestrator {
  private readonly reader: ChangeSetReader;
  private readonly contentResolver: ContentResolver;
  private readonly github: RemoteCommitApi;
  private readonly strategy: CommitStrategy;
  private readonly logger: Logger;

  constructor(dependencies: CommitOrchestratorDependencies) {
    this.reader = new ChangeSetReader(dependencies.repository);
    this.contentResolver = new ContentResolver(dependencies.repository);
    this.github = dependencies.github;
    this.strategy = dependencies.strategy ?? 'tree';
    this.logger = dependencies.logger ?? createLogger('[Commit] ');
  }

  async run(request: CommitRequest): Promise<CommitResult> {
    if (!request.commitMessage.trim()) {
      throw new CommitPlanError('Commit message must not be empty', 'EMPTY_MESSAGE');
    }

    const changes = await this.reader.read();
    if (changes.length === 0) {
      throw new CommitPlanError('No changes to commit', 'NO_CHANGES');
    }
    this.logger.info(`Found ${changes.length} staged change(s)`);

    const planned = planActions(changes);
    if (planned.length === 0) {
      throw new CommitPlanError('No changes to commit', 'NO_CHANGES');
    }

    const resolved = await this.contentResolver.resolve(planned);
    this.logger.debug(`Resolved content for ${resolved.filter((a) => a.type === 'add').length} addition(s)`);

    const payload = await this.createAssembler().assemble(resolved, {
      repositoryNameWithOwner: `${request.repoOwner}/${request.repoName}`,
      branchName: request.branchName,
      headCommitId: request.headCommitId,
      commitMessage: request.commitMessage,
    });

    const commit = await this.submit(payload, request);
    this.logger.info(`Created commit ${commit.sha} on ${request.branchName}`);

    return { commitUrl: commit.url, commitSha: commit.sha, strategy: payload.strategy };
  }

  private createAssembler(): PayloadAssembler {
    switch (this.strategy) {
      case 'tree':
        return new TreePayloadAssembler(this.github);
      case 'mutation':
        return new MutationPayloadAssembler();
    }
  }

  private async submit(payload: AssembledPayload, request: CommitRequest): Promise<CreatedCommit> {
    switch (payload.strategy) {
      case 'tree':
        return this.submitTree(payload.request, request);
      case 'mutation':
        this.logger.debug('Submitting createCommitOnBranch');
        return this.github.createCommitOnBranch(payload.input);
    }
  }

  private async submitTree(
    tree: Extract<AssembledPayload, { strategy: 'tree' }>['request'],
    request: CommitRequest,
  ): Promise<CreatedCommit> {
    const treeSha = await this.github.createTree(tree);
    this.logger.debug(`Created tree ${treeSha}`);

    const commit = await this.github.createCommit({
      message: request.commitMessage,
      tree: treeSha,
      parents: [request.headCommitId],
    });

    const reference = await this.github.getReference(request.branchName);
    if (reference.found) {
      this.logger.debug(`Updating heads/${request.branchName} (force: ${request.forcePush})`);
      await this.github.updateReference(request.branchName, commit.sha, request.forcePush);
    } else {
      this.logger.debug(`Creating refs/heads/${request.branchName}`);
      await this.github.createReference(request.branchName, commit.sha);
    }

    return commit;
  }
}

/**
 * Commits the staged changes of `repository` to GitHub as the app
 * installation. Never throws; failures come back as `{ ok: false }`.
 */
export async function commitStagedChanges(options: CommitStagedChangesOptions): Promise<CommitOutcome> {
  const logger = options.logger ?? createLogger('[Commit] ');

  try {
    const tokenSource = new AccessTokenProvider({
      appId: options.appId,
      installationId: options.installationId,
      privateKey: options.privateKey,
      apiBaseUrl: options.apiBaseUrl,
      fetchFn: options.fetchFn,
    });
    const github = new GitHubClient({
      owner: options.repoOwner,
      repo: options.repoName,
      tokenSource,
      apiBaseUrl: options.apiBaseUrl,
      fetchFn: options.fetchFn,
    });
    const orchestrator = new CommitOrchestrator({
      repository: options.repository,
      github,
      strategy: options.strategy,
      logger,
    });

    const result = await orchestrator.run({
      commitMessage: options.commitMessage,
      forcePush: options.forcePush,
      repoOwner: options.repoOwner,
      repoName: options.repoName,
      branchName: options.branchName,
      headCommitId: options.headCommitId,
    });

    return { ok: true, commitUrl: result.commitUrl, commitSha: result.commitSha };
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    logger.debug(`Commit failed: ${message}`);
    return { ok: false, error: message };
  }
}
