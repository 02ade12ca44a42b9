import type { GitInvocation, GitOutcome, GitRunner } from '@/farm/git';
import { type LogLevel, createLogger } from '@/farm/logger';
import type { Category, Config, Link, Repository } from '@/farm/types';

export const createFakeGit = (
  decide: (invocation: GitInvocation) => GitOutcome | Promise<GitOutcome> = () => ({
    ok: true,
    stdout: '',
  }),
) => {
  const calls: GitInvocation[] = [];
  const git: GitRunner = async (invocation) => {
    calls.push(invocation);
    return decide(invocation);
  };
  return { calls, git };
};

export const failWith = (exitCode: number, error: string): GitOutcome => ({
  ok: false,
  exitCode,
  timedOut: false,
  error,
});

export const createRecordingLogger = (level: LogLevel = 'trace') => {
  const lines: string[] = [];
  const logger = createLogger({ level, color: false, write: (line) => lines.push(line) });
  return { lines, logger };
};

export const repository = (overrides: Partial<Repository> & { name: string }): Repository => ({
  path: '/srv/checkouts/',
  url: `git@example.com:team/${overrides.name}.git`,
  ...overrides,
});

export const configOf = (
  categories: Record<
    string,
    { flags?: Category['flags']; repos?: Repository[]; links?: Array<Link & { key?: string }> }
  >,
): Config => ({
  categories: new Map(
    Object.entries(categories).map(([name, category]) => {
      const entry: Category = {};
      if (category.flags) {
        entry.flags = category.flags;
      }
      if (category.repos) {
        entry.repos = new Map(category.repos.map((repo) => [repo.name, repo]));
      }
      if (category.links) {
        entry.links = new Map(
          category.links.map(({ key, ...link }) => [key ?? link.name, link]),
        );
      }
      return [name, entry];
    }),
  ),
});
