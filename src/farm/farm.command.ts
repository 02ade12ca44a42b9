import { loadConfig } from '@/farm/config';
import { errorMessage } from '@/farm/errors';
import { type GitRunner, execGit } from '@/farm/git';
import { type Logger, createLogger } from '@/farm/logger';
import {
  type FarmOperation,
  type FarmReport,
  type FarmRuntime,
  type JumpTarget,
  resolveJumpPath,
  runFarmOperation,
  summarizeReport,
} from '@/farm/operations';
import { type FarmCliOptionsInput, normalizeFarmCliOptions, toFarmContext } from '@/farm/options';
import { resolveConfigPath } from '@/farm/paths';
import { runFarmInkApplication } from '@/farm/ui';

export type FarmCommand =
  | FarmOperation
  | { name: 'jump'; target: JumpTarget; category: string; entry: string };

export type FarmCommandRuntime = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  git?: GitRunner;
  stdout?: (text: string) => void;
};

const logQuietReport = (name: string, report: FarmReport, logger: Logger) => {
  if ('runs' in report) {
    for (const run of report.runs) {
      for (const step of run.steps) {
        if (step.status === 'failed') {
          logger.error(`${run.repository.name}: ${step.step} failed: ${step.error ?? 'unknown error'}`);
        }
      }
    }
  }

  const summary = summarizeReport(report);
  if (summary.failed > 0 || summary.denied > 0) {
    logger.error(
      `${name}: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.denied} not permitted`,
    );
  }
};

export const farmCommandHandler = async (
  command: FarmCommand,
  rawOptions: FarmCliOptionsInput,
  runtime?: FarmCommandRuntime,
): Promise<number> => {
  try {
    const options = normalizeFarmCliOptions(rawOptions);
    const context = toFarmContext(
      options,
      runtime?.cwd ?? process.cwd(),
      runtime?.env ?? process.env,
    );
    const logger = createLogger({ level: context.logLevel, color: Boolean(process.stderr.isTTY) });

    const configPath = resolveConfigPath(context.config, context.cwd, context.env);
    const config = await loadConfig(configPath);
    logger.debug(`loaded config from ${configPath}`);

    if (command.name === 'jump') {
      const target = resolveJumpPath(config, command.target, command.category, command.entry);
      if (!target) {
        throw new Error(`no ${command.target} "${command.entry}" in category "${command.category}"`);
      }
      const write = runtime?.stdout ?? ((text: string) => process.stdout.write(text));
      write(`${target}\n`);
      return 0;
    }

    const farmRuntime: FarmRuntime = {
      git: runtime?.git ?? execGit,
      logger,
      timeoutMs: context.timeoutMs,
      concurrency: context.jobs,
      force: context.force,
      backup: context.backup,
      cwd: context.cwd,
    };

    if (context.quiet) {
      const report = await runFarmOperation(config, command, farmRuntime);
      logQuietReport(command.name, report, logger);
      return 0;
    }

    const code = await runFarmInkApplication({
      title: command.name,
      configPath,
      emoji: context.emoji,
      run: (reporter, signal) =>
        runFarmOperation(config, command, { ...farmRuntime, reporter, signal }),
    });
    if (code !== 0) {
      process.exitCode = code;
    }
    return code;
  } catch (error) {
    console.error(`repofarm ${command.name} failed: ${errorMessage(error)}`);
    process.exitCode = 1;
    return 1;
  }
};
