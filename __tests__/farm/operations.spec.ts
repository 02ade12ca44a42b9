import { mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, expect, it } from 'vitest';

import {
  addAll,
  cloneAll,
  commitAll,
  commitAllWithMessage,
  fast,
  linkAll,
  pullAll,
  pushAll,
  quick,
  resolveJumpPath,
  runFarmOperation,
  summarizeReport,
} from '@/farm/operations';
import type { FarmEvent } from '@/farm/types';

import { configOf, createFakeGit, createRecordingLogger, failWith, repository } from './helpers';

const tempRoots: string[] = [];

afterEach(async () => {
  while (tempRoots.length > 0) {
    const root = tempRoots.pop();
    if (root) {
      await rm(root, { recursive: true, force: true });
    }
  }
});

const cloneOnly = () =>
  configOf({
    dots: {
      repos: [repository({ name: 'toolbox', path: '/tmp/', url: 'https://example.com/toolbox.git', flags: ['Clone'] })],
    },
  });

it('clone-all runs exactly one git clone for a clone-only repository', async () => {
  const { calls, git } = createFakeGit();
  const { logger } = createRecordingLogger();

  const report = await cloneAll(cloneOnly(), { git, logger });

  expect(calls).toEqual([
    { cwd: '/tmp/', args: ['clone', 'https://example.com/toolbox.git', 'toolbox'], timeoutMs: undefined },
  ]);
  expect(summarizeReport(report)).toEqual({ succeeded: 1, failed: 0, denied: 0, cancelled: false });
});

it('pull, add, commit and push spawn nothing for a clone-only repository and report one miss each', async () => {
  const { calls, git } = createFakeGit();
  const { logger } = createRecordingLogger();
  const config = cloneOnly();
  const runtime = { git, logger };

  const reports = [
    await pullAll(config, runtime),
    await addAll(config, runtime),
    await commitAll(config, runtime),
    await commitAllWithMessage(config, 'msg', runtime),
    await pushAll(config, runtime),
  ];

  expect(calls).toHaveLength(0);
  expect(reports.map((report) => report.operation)).toEqual(['pull', 'add', 'commit', 'commit-msg', 'push']);
  for (const report of reports) {
    expect(report.runs).toHaveLength(1);
    expect(summarizeReport(report)).toEqual({ succeeded: 0, failed: 0, denied: 1, cancelled: false });
  }
});

it('commit-msg passes the message to git commit -m', async () => {
  const { calls, git } = createFakeGit();
  const { logger } = createRecordingLogger();
  const config = configOf({ notes: { repos: [repository({ name: 'wiki', flags: ['Commit'] })] } });

  await commitAllWithMessage(config, 'nightly', { git, logger });

  expect(calls.map((call) => call.args)).toEqual([['commit', '-m', 'nightly']]);
});

it('fast never commits or pushes a repository whose add failed, quick still tries', async () => {
  const decide = (invocation: { args: string[] }) =>
    invocation.args[0] === 'add' ? failWith(128, 'fatal: cannot change to directory') : { ok: true as const, stdout: '' };
  const config = configOf({ dots: { repos: [repository({ name: 'gone', flags: ['Fast'] })] } });
  const { logger } = createRecordingLogger();

  const fastGit = createFakeGit(decide);
  const fastReport = await fast(config, 'msg', { git: fastGit.git, logger });

  const quickGit = createFakeGit(decide);
  const quickReport = await quick(config, 'msg', { git: quickGit.git, logger });

  expect(fastGit.calls.map((call) => call.args[0])).toEqual(['pull', 'add']);
  expect(quickGit.calls.map((call) => call.args)).toEqual([
    ['pull'],
    ['add', '.'],
    ['commit', '-m', 'msg'],
    ['push'],
  ]);
  expect(fastReport.policy).toBe('stop');
  expect(quickReport.policy).toBe('continue');
  expect(summarizeReport(quickReport)).toEqual({ succeeded: 3, failed: 1, denied: 0, cancelled: false });
});

it('quick with Quick flags skips the pull and keeps going', async () => {
  const { calls, git } = createFakeGit();
  const { logger } = createRecordingLogger();
  const config = configOf({ dots: { repos: [repository({ name: 'dots', flags: ['Quick'] })] } });

  const report = await quick(config, 'msg', { git, logger });

  expect(calls.map((call) => call.args[0])).toEqual(['add', 'commit', 'push']);
  expect(report.runs[0]?.steps.map((step) => step.status)).toEqual([
    'denied',
    'succeeded',
    'succeeded',
    'succeeded',
  ]);
});

it('links every configured link and leaves the receiver pointing at the source', async () => {
  const root = await realpath(await mkdtemp(path.join(os.tmpdir(), 'repofarm-ops-')));
  tempRoots.push(root);
  await mkdir(path.join(root, 'a/real'), { recursive: true });
  await mkdir(path.join(root, 'a/new'), { recursive: true });
  const tx = path.join(root, 'a/real/file');
  const rx = path.join(root, 'a/new/link');
  await writeFile(tx, 'payload', 'utf8');
  const occupied = path.join(root, 'a/new/occupied');
  await writeFile(occupied, 'keep', 'utf8');

  const config = configOf({
    dots: {
      links: [
        { name: 'file', tx, rx },
        { name: 'occupied', tx, rx: occupied },
      ],
    },
    other: {},
  });
  const { git } = createFakeGit();
  const { logger } = createRecordingLogger('error');
  const events: FarmEvent[] = [];

  const first = await linkAll(config, { git, logger, reporter: { emit: (event) => events.push(event) } });
  const second = await linkAll(config, { git, logger });

  expect(await realpath(rx)).toBe(tx);
  expect(first.results.map((result) => result.status)).toEqual(['created', 'file-exists']);
  expect(second.results.map((result) => result.status)).toEqual(['already-linked', 'file-exists']);
  expect(events.map((event) => event.type)).toEqual(['link-finished', 'link-finished']);
  expect(summarizeReport(second)).toEqual({ succeeded: 1, failed: 1, denied: 0, cancelled: false });
});

it('marks a link run cancelled when the signal fired before it finished', async () => {
  const controller = new AbortController();
  controller.abort();
  const config = configOf({ dots: { links: [{ name: 'vimrc', tx: '/home/tester/.dots/vimrc', rx: '/home/tester/.vimrc' }] } });
  const { git } = createFakeGit();
  const { logger } = createRecordingLogger();

  const report = await linkAll(config, { git, logger, signal: controller.signal });

  expect(report.results).toEqual([]);
  expect(report.cancelled).toBe(true);
  expect(summarizeReport(report)).toEqual({ succeeded: 0, failed: 0, denied: 0, cancelled: true });
});

it('dispatches named operations', async () => {
  const { calls, git } = createFakeGit();
  const { logger } = createRecordingLogger();
  const config = configOf({ dots: { repos: [repository({ name: 'toolbox', flags: ['Push'] })] } });

  const report = await runFarmOperation(config, { name: 'push' }, { git, logger });

  expect(report.operation).toBe('push');
  expect(calls.map((call) => call.args)).toEqual([['push']]);
});

it('resolves jump paths for repositories and links', () => {
  const config = configOf({
    dots: {
      repos: [repository({ name: 'toolbox', path: '/home/tester/.dots/' })],
      links: [{ name: 'starship', tx: '/home/tester/.dots/starship.toml', rx: '/home/tester/.config/starship.toml' }],
    },
  });

  expect(resolveJumpPath(config, 'repo', 'dots', 'toolbox')).toBe('/home/tester/.dots/toolbox');
  expect(resolveJumpPath(config, 'link', 'dots', 'starship')).toBe('/home/tester/.dots/starship.toml');
  expect(resolveJumpPath(config, 'repo', 'dots', 'starship')).toBeUndefined();
  expect(resolveJumpPath(config, 'link', 'nope', 'starship')).toBeUndefined();
});
