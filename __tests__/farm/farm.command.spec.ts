import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, expect, it, vi } from 'vitest';

import { farmCommandHandler } from '@/farm/farm.command';

import { createFakeGit, failWith } from './helpers';

const tempRoots: string[] = [];
let root = '';
let configFile = '';

beforeEach(async () => {
  root = await mkdtemp(path.join(os.tmpdir(), 'repofarm-command-'));
  tempRoots.push(root);
  configFile = path.join(root, 'config.yaml');
  await writeFile(
    configFile,
    [
      'categories:',
      '  dots:',
      '    repos:',
      '      toolbox:',
      '        name: toolbox',
      `        path: ${root}${path.sep}`,
      '        url: https://example.com/toolbox.git',
      '        flags: [Clone]',
    ].join('\n'),
    'utf8',
  );
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  while (tempRoots.length > 0) {
    const dir = tempRoots.pop();
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  }
});

it('runs an operation quietly against the configured repositories', async () => {
  const { calls, git } = createFakeGit();

  const code = await farmCommandHandler(
    { name: 'clone' },
    { config: configFile, quiet: true },
    { cwd: root, env: {}, git },
  );

  expect(code).toBe(0);
  expect(calls).toEqual([
    { cwd: `${root}${path.sep}`, args: ['clone', 'https://example.com/toolbox.git', 'toolbox'], timeoutMs: undefined },
  ]);
});

it('keeps exit code zero when repositories are not permitted to run the operation', async () => {
  const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const { calls, git } = createFakeGit();

  const code = await farmCommandHandler(
    { name: 'quick', message: 'msg' },
    { config: 'config.yaml', quiet: true },
    { cwd: root, env: {}, git },
  );

  expect(code).toBe(0);
  expect(calls).toHaveLength(0);
  expect(errors).toHaveBeenCalledTimes(1);
  expect(errors).toHaveBeenCalledWith(
    expect.stringContaining('quick: 0 succeeded, 0 failed, 4 not permitted'),
  );
});

it('reports failed git steps on stderr in quiet mode', async () => {
  const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const { git } = createFakeGit(() => failWith(1, 'fatal: no upstream configured'));
  await writeFile(
    configFile,
    [
      'categories:',
      '  dots:',
      '    repos:',
      '      toolbox:',
      '        name: toolbox',
      `        path: ${root}${path.sep}`,
      '        url: https://example.com/toolbox.git',
      '        flags: [Pull]',
    ].join('\n'),
    'utf8',
  );

  const code = await farmCommandHandler(
    { name: 'pull' },
    { config: configFile, quiet: true },
    { cwd: root, env: {}, git },
  );

  expect(code).toBe(0);
  expect(errors).toHaveBeenCalledTimes(2);
  expect(errors).toHaveBeenNthCalledWith(
    1,
    expect.stringContaining('toolbox: pull failed: fatal: no upstream configured'),
  );
  expect(errors).toHaveBeenNthCalledWith(2, expect.stringContaining('pull: 0 succeeded, 1 failed, 0 not permitted'));
});

it('prints the working directory of a repository for jump', async () => {
  const output: string[] = [];

  const code = await farmCommandHandler(
    { name: 'jump', target: 'repo', category: 'dots', entry: 'toolbox' },
    { config: configFile },
    { cwd: root, env: {}, stdout: (text) => output.push(text) },
  );

  expect(code).toBe(0);
  expect(output).toEqual([`${root}${path.sep}toolbox\n`]);
});

it('fails jump for an unknown entry', async () => {
  const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

  const code = await farmCommandHandler(
    { name: 'jump', target: 'repo', category: 'dots', entry: 'missing' },
    { config: configFile },
    { cwd: root, env: {}, stdout: () => undefined },
  );

  expect(code).toBe(1);
  expect(errors).toHaveBeenCalledWith('repofarm jump failed: no repo "missing" in category "dots"');
});

it('exits with 1 before any work when the config cannot be loaded', async () => {
  const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  const { calls, git } = createFakeGit();
  const missing = path.join(root, 'absent.yaml');

  const code = await farmCommandHandler(
    { name: 'pull' },
    { config: missing, quiet: true },
    { cwd: root, env: {}, git },
  );

  expect(code).toBe(1);
  expect(process.exitCode).toBe(1);
  expect(calls).toHaveLength(0);
  expect(errors).toHaveBeenCalledWith(
    expect.stringContaining(`repofarm pull failed: unable to read config file ${missing}`),
  );
});

it('rejects invalid numeric options', async () => {
  const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);

  const code = await farmCommandHandler({ name: 'pull' }, { config: configFile, jobs: '0' }, { cwd: root, env: {} });

  expect(code).toBe(1);
  expect(errors).toHaveBeenCalledWith('repofarm pull failed: --jobs expects a positive integer, got "0".');
});
