export const REPO_FLAGS = ['Clone', 'Pull', 'Add', 'Commit', 'Push', 'Quick', 'Fast'] as const;

export type RepoFlag = (typeof REPO_FLAGS)[number];

export const REPO_KINDS = [
  'GitRepo',
  'GitHubRepo',
  'GitLabRepo',
  'GiteaRepo',
  'UrlRepo',
  'Link',
] as const;

export type RepoKind = (typeof REPO_KINDS)[number];

export type RepoOperation = 'clone' | 'pull' | 'add' | 'commit' | 'push';

export type Repository = {
  name: string;
  /** Parent directory, ending in a path separator. */
  path: string;
  url: string;
  flags?: RepoFlag[];
  kind?: RepoKind;
};

export type Link = {
  name: string;
  /** The existing file or directory. */
  tx: string;
  /** Where the symlink pointing at `tx` goes. */
  rx: string;
};

export type Category = {
  flags?: RepoFlag[];
  repos?: Map<string, Repository>;
  links?: Map<string, Link>;
};

export type Config = {
  categories: Map<string, Category>;
};

export type StepStatus = 'succeeded' | 'failed' | 'denied';

export type StepResult = {
  step: string;
  status: StepStatus;
  exitCode?: number | null;
  error?: string;
};

export type FailurePolicy = 'continue' | 'stop';

export type RepositoryRun = {
  category: string;
  key: string;
  repository: Repository;
  steps: StepResult[];
  /** Set when the policy or a cancellation left steps unexecuted. */
  aborted?: 'failure' | 'cancelled';
};

export type PipelineReport = {
  operation: string;
  policy: FailurePolicy;
  runs: RepositoryRun[];
  cancelled: boolean;
};

export type LinkStatus =
  | 'created'
  | 'already-linked'
  | 'replaced'
  | 'different-link'
  | 'broken-symlink'
  | 'file-exists'
  | 'failed-creating-link'
  | 'io-error';

export type LinkResult = {
  category: string;
  key: string;
  link: Link;
  status: LinkStatus;
  /** Where the previous receiver was moved when `force` replaced it. */
  backupPath?: string;
  error?: string;
};

export type LinkReport = {
  operation: 'link';
  results: LinkResult[];
  /** True when the signal fired before every link was resolved. */
  cancelled: boolean;
};

export type FarmEvent =
  | { type: 'step-started'; category: string; repository: string; step: string }
  | ({ type: 'step-finished'; category: string; repository: string } & StepResult)
  | { type: 'link-finished'; result: LinkResult };

export type FarmReporter = {
  emit: (event: FarmEvent) => void;
};

export const silentReporter: FarmReporter = {
  emit: () => undefined,
};
