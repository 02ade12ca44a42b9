import { Argument, Command } from 'commander';

import { type FarmCommand, farmCommandHandler } from '@/farm/farm.command';
import {
  DEFAULT_COMMIT_MESSAGE,
  DEFAULT_FAST_MESSAGE,
  DEFAULT_QUICK_MESSAGE,
} from '@/farm/operations';
import type { FarmCliOptionsInput } from '@/farm/options';

export type Package = {
  name: string;
  version: string;
  description: string;
};

export const parse = ({ argv, pkg }: { argv: string[]; pkg: Package }): (() => Promise<void>) => {
  const program = new Command();

  program
    .name('repofarm')
    .description(pkg.description)
    .version(pkg.version, '-v, --version', 'output the current version')
    .option('-c, --config <path>', 'config file to use (defaults to $XDG_CONFIG_HOME/repofarm/config.yaml)')
    .option('-q, --quiet', 'hide progress output and log only errors')
    .option('--no-emoji', 'use plain text status markers')
    .option('--force', 'replace files or foreign links where a link should go')
    .option('--no-backup', 'with --force, delete replaced files instead of keeping a .bak copy')
    .option('-j, --jobs <n>', 'number of repositories processed in parallel')
    .option('--timeout <seconds>', 'kill a git command after this many seconds')
    .showSuggestionAfterError()
    .showHelpAfterError();

  const register = (
    name: string,
    alias: string,
    description: string,
    toCommand: (message?: string) => FarmCommand,
    takesMessage = false,
  ) => {
    const command = program.command(takesMessage ? `${name} [msg]` : name);
    command
      .alias(alias)
      .description(description)
      .action(async (message: string | undefined) => {
        await farmCommandHandler(
          toCommand(takesMessage ? message : undefined),
          command.optsWithGlobals<FarmCliOptionsInput>(),
        );
      });
  };

  register('link', 'l', 'Create every configured link', () => ({ name: 'link' }));
  register(
    'quick',
    'q',
    'Pull, add, commit with msg and push every repository, continuing past failures',
    (message) => ({ name: 'quick', message: message ?? DEFAULT_QUICK_MESSAGE }),
    true,
  );
  register(
    'fast',
    'f',
    'Pull, add, commit with msg and push every repository, stopping a repository at its first failure',
    (message) => ({ name: 'fast', message: message ?? DEFAULT_FAST_MESSAGE }),
    true,
  );
  register('clone', 'c', 'Clone all repositories', () => ({ name: 'clone' }));
  register('pull', 'p', 'Pull all repositories', () => ({ name: 'pull' }));
  register('add', 'a', 'Add all files in repositories', () => ({ name: 'add' }));
  register('commit', 'ct', 'Perform a git commit in all repositories', () => ({ name: 'commit' }));
  register(
    'commit-msg',
    'm',
    'Perform a git commit in all repositories with msg',
    (message) => ({ name: 'commit-msg', message: message ?? DEFAULT_COMMIT_MESSAGE }),
    true,
  );
  register('push', 'ps', 'Push all repositories', () => ({ name: 'push' }));

  const jump = program
    .command('jump')
    .alias('j')
    .description('Print the path of a repository or link');

  jump
    .addArgument(new Argument('<target>', 'what to look up').choices(['repo', 'link']))
    .argument('<category>', 'category the entry belongs to')
    .argument('<name>', 'repository or link key')
    .action(async (target: 'repo' | 'link', category: string, entry: string) => {
      await farmCommandHandler(
        { name: 'jump', target, category, entry },
        jump.optsWithGlobals<FarmCliOptionsInput>(),
      );
    });

  return async () => {
    if (argv.length <= 2) {
      program.outputHelp();
      return;
    }

    await program.parseAsync(argv);
  };
};
