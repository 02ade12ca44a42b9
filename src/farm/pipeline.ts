import { type ActionContext, isSuccess } from '@/farm/actions';
import { errorMessage } from '@/farm/errors';
import {
  type Config,
  type FailurePolicy,
  type FarmReporter,
  type PipelineReport,
  type Repository,
  type RepositoryRun,
  type StepResult,
  silentReporter,
} from '@/farm/types';

export type RepositoryStep = {
  name: string;
  run: (repository: Repository, context: ActionContext) => Promise<StepResult>;
};

export type PipelineOptions = ActionContext & {
  policy: FailurePolicy;
  reporter?: FarmReporter;
  /** Checked between steps; a running git process is never interrupted. */
  signal?: AbortSignal;
  /** Repositories processed at once. Steps of one repository always run in order. */
  concurrency?: number;
};

export type RepositoryTarget = {
  category: string;
  key: string;
  repository: Repository;
};

export const listRepositories = (config: Config): RepositoryTarget[] => {
  const targets: RepositoryTarget[] = [];

  for (const [category, entry] of config.categories) {
    if (!entry.repos) {
      continue;
    }
    for (const [key, repository] of entry.repos) {
      targets.push({ category, key, repository });
    }
  }

  return targets;
};

const runStep = async (
  step: RepositoryStep,
  target: RepositoryTarget,
  options: PipelineOptions,
): Promise<StepResult> => {
  try {
    return await step.run(target.repository, options);
  } catch (error) {
    const message = errorMessage(error);
    options.logger.error(`${target.repository.name}: ${step.name} crashed: ${message}`);
    return { step: step.name, status: 'failed', exitCode: null, error: message };
  }
};

const runRepository = async (
  target: RepositoryTarget,
  steps: RepositoryStep[],
  options: PipelineOptions,
): Promise<RepositoryRun> => {
  const reporter = options.reporter ?? silentReporter;
  const run: RepositoryRun = {
    category: target.category,
    key: target.key,
    repository: target.repository,
    steps: [],
  };

  for (let index = 0; index < steps.length; index += 1) {
    const step = steps[index];
    if (!step) {
      continue;
    }

    if (options.signal?.aborted) {
      run.aborted = 'cancelled';
      break;
    }

    reporter.emit({
      type: 'step-started',
      category: target.category,
      repository: target.repository.name,
      step: step.name,
    });

    const result = await runStep(step, target, options);
    run.steps.push(result);

    reporter.emit({
      type: 'step-finished',
      category: target.category,
      repository: target.repository.name,
      ...result,
    });

    if (options.policy === 'stop' && !isSuccess(result)) {
      if (index < steps.length - 1) {
        run.aborted = 'failure';
        options.logger.debug(
          `${target.repository.name}: ${step.name} did not succeed, skipping remaining steps`,
        );
      }
      break;
    }
  }

  return run;
};

export const runPipeline = async (
  operation: string,
  config: Config,
  steps: RepositoryStep[],
  options: PipelineOptions,
): Promise<PipelineReport> => {
  const targets = listRepositories(config);
  const runs: RepositoryRun[] = [];
  const workerCount = Math.max(1, Math.min(options.concurrency ?? 1, targets.length));

  let cursor = 0;
  const worker = async (): Promise<void> => {
    while (cursor < targets.length) {
      const index = cursor;
      cursor += 1;

      const target = targets[index];
      if (!target) {
        return;
      }
      runs[index] = await runRepository(target, steps, options);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return {
    operation,
    policy: options.policy,
    runs,
    cancelled: options.signal?.aborted ?? false,
  };
};

/** Runs every step on every repository regardless of earlier failures. */
export const runAllOnAll = (
  operation: string,
  config: Config,
  steps: RepositoryStep[],
  options: Omit<PipelineOptions, 'policy'>,
) => runPipeline(operation, config, steps, { ...options, policy: 'continue' });

/** Stops a repository's remaining steps at its first unsuccessful one. */
export const runSeriesOnAll = (
  operation: string,
  config: Config,
  steps: RepositoryStep[],
  options: Omit<PipelineOptions, 'policy'>,
) => runPipeline(operation, config, steps, { ...options, policy: 'stop' });
