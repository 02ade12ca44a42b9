import { permits } from '@/farm/capabilities';
import type { GitInvocation, GitRunner } from '@/farm/git';
import type { Logger } from '@/farm/logger';
import type { RepoKind, RepoOperation, Repository, StepResult } from '@/farm/types';

export type ActionContext = {
  git: GitRunner;
  logger: Logger;
  timeoutMs?: number;
};

type GitCommand = {
  step: string;
  operation: RepoOperation;
  args: string[];
  /** Clone runs in the parent directory, everything else inside the checkout. */
  inParent?: boolean;
};

export const workingDirectory = (repository: Repository): string =>
  `${repository.path}${repository.name}`;

export const repositoryKind = (repository: Repository): RepoKind => repository.kind ?? 'GitRepo';

const supportsGit = (kind: RepoKind): boolean => {
  switch (kind) {
    case 'GitRepo':
      return true;
    case 'GitHubRepo':
    case 'GitLabRepo':
    case 'GiteaRepo':
    case 'UrlRepo':
    case 'Link':
      return false;
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
};

const runGitCommand = async (
  repository: Repository,
  command: GitCommand,
  context: ActionContext,
): Promise<StepResult> => {
  if (!permits(repository, command.operation)) {
    context.logger.info(
      `${repository.name}: ${command.operation} is not permitted by its flags, ${command.step} not performed`,
    );
    return { step: command.step, status: 'denied' };
  }

  const kind = repositoryKind(repository);
  if (!supportsGit(kind)) {
    const error = `repository kind ${kind} cannot run git commands`;
    context.logger.error(`${repository.name}: ${error}`);
    return { step: command.step, status: 'failed', exitCode: null, error };
  }

  const invocation: GitInvocation = {
    cwd: command.inParent ? repository.path : workingDirectory(repository),
    args: command.args,
    timeoutMs: context.timeoutMs,
  };

  context.logger.trace(`git ${invocation.args.join(' ')} (in ${invocation.cwd})`);
  const outcome = await context.git(invocation);

  if (outcome.ok) {
    return { step: command.step, status: 'succeeded', exitCode: 0 };
  }

  const reason = outcome.timedOut ? `timed out after ${context.timeoutMs}ms` : outcome.error;
  context.logger.warn(`${repository.name}: git ${command.args[0]} failed: ${reason}`);
  return { step: command.step, status: 'failed', exitCode: outcome.exitCode, error: reason };
};

export const cloneRepository = (repository: Repository, context: ActionContext) =>
  runGitCommand(
    repository,
    {
      step: 'clone',
      operation: 'clone',
      args: ['clone', repository.url, repository.name],
      inParent: true,
    },
    context,
  );

export const pullRepository = (repository: Repository, context: ActionContext) =>
  runGitCommand(repository, { step: 'pull', operation: 'pull', args: ['pull'] }, context);

export const addAllInRepository = (repository: Repository, context: ActionContext) =>
  runGitCommand(repository, { step: 'add', operation: 'add', args: ['add', '.'] }, context);

export const commitRepository = (repository: Repository, context: ActionContext) =>
  runGitCommand(repository, { step: 'commit', operation: 'commit', args: ['commit'] }, context);

export const commitRepositoryWithMessage = (
  repository: Repository,
  message: string,
  context: ActionContext,
) =>
  runGitCommand(
    repository,
    { step: 'commit', operation: 'commit', args: ['commit', '-m', message] },
    context,
  );

export const pushRepository = (repository: Repository, context: ActionContext) =>
  runGitCommand(repository, { step: 'push', operation: 'push', args: ['push'] }, context);

export const isSuccess = (result: StepResult): boolean => result.status === 'succeeded';
