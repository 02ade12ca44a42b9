import { LOG_LEVEL_ENV, type LogLevel, parseLogLevel } from '@/farm/logger';

export const DEFAULT_JOBS = 1;

export type FarmCliOptionsInput = {
  config?: string;
  quiet?: boolean;
  emoji?: boolean;
  force?: boolean;
  backup?: boolean;
  jobs?: string;
  timeout?: string;
};

export type FarmCliOptions = {
  config?: string;
  quiet: boolean;
  emoji: boolean;
  force: boolean;
  backup: boolean;
  jobs: number;
  timeoutMs?: number;
};

export type FarmContext = FarmCliOptions & {
  logLevel: LogLevel;
  cwd: string;
  env: NodeJS.ProcessEnv;
};

const parseJobs = (value: string | undefined): number => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return DEFAULT_JOBS;
  }

  const jobs = Number(trimmed);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new Error(`--jobs expects a positive integer, got "${trimmed}".`);
  }
  return jobs;
};

const parseTimeout = (value: string | undefined): number | undefined => {
  const trimmed = value?.trim();
  if (!trimmed) {
    return undefined;
  }

  const seconds = Number(trimmed);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new Error(`--timeout expects a number of seconds, got "${trimmed}".`);
  }
  return seconds === 0 ? undefined : Math.round(seconds * 1000);
};

export const normalizeFarmCliOptions = (options: FarmCliOptionsInput): FarmCliOptions => ({
  config: options.config?.trim() || undefined,
  quiet: Boolean(options.quiet),
  emoji: options.emoji ?? true,
  force: Boolean(options.force),
  backup: options.backup ?? true,
  jobs: parseJobs(options.jobs),
  timeoutMs: parseTimeout(options.timeout),
});

export const toFarmContext = (
  options: FarmCliOptions,
  cwd: string,
  env: NodeJS.ProcessEnv,
): FarmContext => ({
  ...options,
  logLevel: options.quiet ? 'error' : parseLogLevel(env[LOG_LEVEL_ENV]),
  cwd,
  env,
});
