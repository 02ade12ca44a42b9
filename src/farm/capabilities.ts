import type { RepoFlag, RepoOperation, Repository } from '@/farm/types';

const GRANTED_BY: Record<RepoOperation, readonly RepoFlag[]> = {
  clone: ['Clone'],
  pull: ['Pull', 'Fast'],
  add: ['Add', 'Quick', 'Fast'],
  commit: ['Commit', 'Quick', 'Fast'],
  push: ['Push', 'Quick', 'Fast'],
};

export const permits = (repository: Pick<Repository, 'flags'>, operation: RepoOperation): boolean => {
  const flags = repository.flags;
  if (!flags) {
    return false;
  }

  return GRANTED_BY[operation].some((flag) => flags.includes(flag));
};
