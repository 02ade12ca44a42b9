import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type GitInvocation = {
  cwd: string;
  args: string[];
  /** Kills the subprocess after this many milliseconds. */
  timeoutMs?: number;
};

export type GitOutcome =
  | { ok: true; stdout: string }
  | { ok: false; exitCode: number | null; timedOut: boolean; error: string };

export type GitRunner = (invocation: GitInvocation) => Promise<GitOutcome>;

export const summarizeGitError = (error: unknown): string => {
  if (!error || typeof error !== 'object') {
    return 'unknown git error';
  }

  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr.trim() : '';
  if (stderr) {
    const lines = stderr.split(/\r?\n/).slice(0, 6);
    return lines.join('\n');
  }

  const message = 'message' in error && typeof error.message === 'string' ? error.message : '';
  return message || 'unknown git error';
};

const exitCodeOf = (error: unknown): number | null => {
  if (!error || typeof error !== 'object' || !('code' in error)) {
    return null;
  }
  // spawn failures carry a string code such as ENOENT
  return typeof error.code === 'number' ? error.code : null;
};

const wasKilled = (error: unknown): boolean =>
  Boolean(error && typeof error === 'object' && 'killed' in error && error.killed === true);

export const execGit: GitRunner = async ({ cwd, args, timeoutMs }) => {
  try {
    const { stdout } = await execFileAsync('git', args, {
      cwd,
      timeout: timeoutMs ?? 0,
      killSignal: 'SIGTERM',
      env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
    });
    return { ok: true, stdout };
  } catch (error) {
    return {
      ok: false,
      exitCode: exitCodeOf(error),
      timedOut: wasKilled(error) && timeoutMs !== undefined && timeoutMs > 0,
      error: summarizeGitError(error),
    };
  }
};
