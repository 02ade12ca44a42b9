import {
  type ActionContext,
  addAllInRepository,
  cloneRepository,
  commitRepository,
  commitRepositoryWithMessage,
  pullRepository,
  pushRepository,
  workingDirectory,
} from '@/farm/actions';
import { findLink, findRepository } from '@/farm/config';
import { isLinkSuccess, resolveLink } from '@/farm/links';
import { type RepositoryStep, runAllOnAll, runSeriesOnAll } from '@/farm/pipeline';
import {
  type Config,
  type FarmReporter,
  type LinkReport,
  type LinkResult,
  type PipelineReport,
  silentReporter,
} from '@/farm/types';

export const DEFAULT_QUICK_MESSAGE = 'repofarm: quick commit';
export const DEFAULT_FAST_MESSAGE = 'repofarm: fast commit';
export const DEFAULT_COMMIT_MESSAGE = 'repofarm: commit';

export type FarmRuntime = ActionContext & {
  reporter?: FarmReporter;
  signal?: AbortSignal;
  concurrency?: number;
  force?: boolean;
  backup?: boolean;
  cwd?: string;
};

export type FarmOperation =
  | { name: 'link' }
  | { name: 'quick'; message: string }
  | { name: 'fast'; message: string }
  | { name: 'clone' }
  | { name: 'pull' }
  | { name: 'add' }
  | { name: 'commit' }
  | { name: 'commit-msg'; message: string }
  | { name: 'push' };

export type FarmReport = PipelineReport | LinkReport;

const cloneStep: RepositoryStep = { name: 'clone', run: cloneRepository };
const pullStep: RepositoryStep = { name: 'pull', run: pullRepository };
const addStep: RepositoryStep = { name: 'add', run: addAllInRepository };
const commitStep: RepositoryStep = { name: 'commit', run: commitRepository };
const pushStep: RepositoryStep = { name: 'push', run: pushRepository };

const commitWithMessageStep = (message: string): RepositoryStep => ({
  name: 'commit',
  run: (repository, context) => commitRepositoryWithMessage(repository, message, context),
});

const syncSteps = (message: string): RepositoryStep[] => [
  pullStep,
  addStep,
  commitWithMessageStep(message),
  pushStep,
];

export const cloneAll = (config: Config, runtime: FarmRuntime) => {
  runtime.logger.debug('executing clone on all repositories');
  return runAllOnAll('clone', config, [cloneStep], runtime);
};

export const pullAll = (config: Config, runtime: FarmRuntime) => {
  runtime.logger.debug('executing pull on all repositories');
  return runAllOnAll('pull', config, [pullStep], runtime);
};

export const addAll = (config: Config, runtime: FarmRuntime) => {
  runtime.logger.debug('executing add on all repositories');
  return runAllOnAll('add', config, [addStep], runtime);
};

export const commitAll = (config: Config, runtime: FarmRuntime) => {
  runtime.logger.debug('executing commit on all repositories');
  return runAllOnAll('commit', config, [commitStep], runtime);
};

export const commitAllWithMessage = (config: Config, message: string, runtime: FarmRuntime) => {
  runtime.logger.debug('executing commit with message on all repositories');
  return runAllOnAll('commit-msg', config, [commitWithMessageStep(message)], runtime);
};

export const pushAll = (config: Config, runtime: FarmRuntime) => {
  runtime.logger.debug('executing push on all repositories');
  return runAllOnAll('push', config, [pushStep], runtime);
};

/** pull, add, commit and push every repository, attempting every step. */
export const quick = (config: Config, message: string, runtime: FarmRuntime) => {
  runtime.logger.debug('executing quick');
  return runAllOnAll('quick', config, syncSteps(message), runtime);
};

/** Like {@link quick}, but a repository stops at its first unsuccessful step. */
export const fast = (config: Config, message: string, runtime: FarmRuntime) => {
  runtime.logger.debug('executing fast');
  return runSeriesOnAll('fast', config, syncSteps(message), runtime);
};

export const linkAll = async (config: Config, runtime: FarmRuntime): Promise<LinkReport> => {
  runtime.logger.debug('executing link on all links');
  const reporter = runtime.reporter ?? silentReporter;
  const results: LinkResult[] = [];

  for (const [category, entry] of config.categories) {
    if (!entry.links) {
      continue;
    }

    for (const [key, link] of entry.links) {
      if (runtime.signal?.aborted) {
        return { operation: 'link', results, cancelled: true };
      }

      const outcome = await resolveLink(link, {
        logger: runtime.logger,
        force: runtime.force,
        backup: runtime.backup,
        cwd: runtime.cwd,
      });
      const result: LinkResult = { category, key, link, ...outcome };
      results.push(result);
      reporter.emit({ type: 'link-finished', result });
    }
  }

  return { operation: 'link', results, cancelled: false };
};

export const runFarmOperation = (
  config: Config,
  operation: FarmOperation,
  runtime: FarmRuntime,
): Promise<FarmReport> => {
  switch (operation.name) {
    case 'link':
      return linkAll(config, runtime);
    case 'quick':
      return quick(config, operation.message, runtime);
    case 'fast':
      return fast(config, operation.message, runtime);
    case 'clone':
      return cloneAll(config, runtime);
    case 'pull':
      return pullAll(config, runtime);
    case 'add':
      return addAll(config, runtime);
    case 'commit':
      return commitAll(config, runtime);
    case 'commit-msg':
      return commitAllWithMessage(config, operation.message, runtime);
    case 'push':
      return pushAll(config, runtime);
    default: {
      const unreachable: never = operation;
      return unreachable;
    }
  }
};

export type FarmSummary = {
  succeeded: number;
  failed: number;
  denied: number;
  cancelled: boolean;
};

export const summarizeReport = (report: FarmReport): FarmSummary => {
  if ('results' in report) {
    const succeeded = report.results.filter((result) => isLinkSuccess(result.status)).length;
    return {
      succeeded,
      failed: report.results.length - succeeded,
      denied: 0,
      cancelled: report.cancelled,
    };
  }

  const summary: FarmSummary = { succeeded: 0, failed: 0, denied: 0, cancelled: report.cancelled };

  for (const run of report.runs) {
    for (const step of run.steps) {
      if (step.status === 'succeeded') {
        summary.succeeded += 1;
      } else if (step.status === 'failed') {
        summary.failed += 1;
      } else {
        summary.denied += 1;
      }
    }
  }
  return summary;
};

export type JumpTarget = 'repo' | 'link';

export const resolveJumpPath = (
  config: Config,
  target: JumpTarget,
  category: string,
  name: string,
): string | undefined => {
  if (target === 'repo') {
    const repository = findRepository(config, category, name);
    return repository ? workingDirectory(repository) : undefined;
  }

  return findLink(config, category, name)?.tx;
};
