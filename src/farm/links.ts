import { lstat, realpath, rename, rm, symlink } from 'node:fs/promises';
import path from 'node:path';

import { errorCode, errorMessage } from '@/farm/errors';
import type { Logger } from '@/farm/logger';
import type { Link, LinkStatus } from '@/farm/types';

export type LinkOptions = {
  logger: Logger;
  /** Replace a receiver that is a regular file, a directory or a link elsewhere. */
  force?: boolean;
  /** With `force`, move the old receiver aside instead of deleting it. */
  backup?: boolean;
  /** Base for relative `tx` and `rx` paths. */
  cwd?: string;
};

export type ReceiverState =
  | { kind: 'absent' }
  | { kind: 'already-linked' }
  | { kind: 'different-link'; target: string }
  | { kind: 'broken-symlink' }
  | { kind: 'file-exists' }
  | { kind: 'io-error'; error: string };

export type LinkOutcome = {
  status: LinkStatus;
  backupPath?: string;
  error?: string;
};

const LINK_STATUS_MESSAGES: Record<LinkStatus, string> = {
  created: 'link created',
  'already-linked': 'file already linked',
  replaced: 'existing file replaced by link',
  'different-link': 'link to different file exists',
  'broken-symlink': 'broken symlink exists',
  'file-exists': 'file exists',
  'failed-creating-link': 'failed creating link',
  'io-error': 'could not inspect link location',
};

export const describeLinkStatus = (status: LinkStatus): string => LINK_STATUS_MESSAGES[status];

export const isLinkSuccess = (status: LinkStatus): boolean =>
  status === 'created' || status === 'already-linked' || status === 'replaced';

const resolvePaths = (link: Link, cwd: string | undefined) => {
  const base = cwd ?? process.cwd();
  return { tx: path.resolve(base, link.tx), rx: path.resolve(base, link.rx) };
};

export const inspectReceiver = async (link: Link, cwd?: string): Promise<ReceiverState> => {
  const paths = resolvePaths(link, cwd);

  let isSymlink: boolean;
  try {
    isSymlink = (await lstat(paths.rx)).isSymbolicLink();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return { kind: 'absent' };
    }
    return { kind: 'io-error', error: errorMessage(error) };
  }

  if (!isSymlink) {
    return { kind: 'file-exists' };
  }

  let receiverTarget: string;
  try {
    receiverTarget = await realpath(paths.rx);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT' || code === 'ELOOP' || code === 'ENOTDIR') {
      return { kind: 'broken-symlink' };
    }
    return { kind: 'io-error', error: errorMessage(error) };
  }

  let sourceTarget: string;
  try {
    sourceTarget = await realpath(paths.tx);
  } catch (error) {
    return { kind: 'io-error', error: `cannot resolve ${link.tx}: ${errorMessage(error)}` };
  }

  if (receiverTarget === sourceTarget) {
    return { kind: 'already-linked' };
  }

  return { kind: 'different-link', target: receiverTarget };
};

const pathTaken = async (value: string): Promise<boolean> => {
  try {
    await lstat(value);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
};

export const nextBackupPath = async (receiver: string): Promise<string> => {
  let candidate = `${receiver}.bak`;
  for (let attempt = 1; await pathTaken(candidate); attempt += 1) {
    candidate = `${receiver}.bak.${attempt}`;
  }
  return candidate;
};

const unresolvableSource = async (tx: string, label: string): Promise<string | undefined> => {
  try {
    await realpath(tx);
    return undefined;
  } catch (error) {
    return `cannot resolve ${label}: ${errorMessage(error)}`;
  }
};

const createLink = async (tx: string, rx: string): Promise<LinkOutcome> => {
  try {
    await symlink(tx, rx);
    return { status: 'created' };
  } catch (error) {
    return { status: 'failed-creating-link', error: errorMessage(error) };
  }
};

const replaceReceiver = async (
  tx: string,
  rx: string,
  backup: boolean,
): Promise<LinkOutcome> => {
  let backupPath: string | undefined;
  try {
    if (backup) {
      backupPath = await nextBackupPath(rx);
      await rename(rx, backupPath);
    } else {
      await rm(rx, { recursive: true, force: true });
    }
  } catch (error) {
    return { status: 'failed-creating-link', error: errorMessage(error) };
  }

  const created = await createLink(tx, rx);
  if (created.status !== 'created') {
    return { ...created, backupPath };
  }
  return { status: 'replaced', backupPath };
};

export const resolveLink = async (link: Link, options: LinkOptions): Promise<LinkOutcome> => {
  const { logger } = options;
  const paths = resolvePaths(link, options.cwd);
  const label = `Linking ${link.tx} -> ${link.rx}`;
  const state = await inspectReceiver(link, options.cwd);

  switch (state.kind) {
    case 'absent': {
      const missing = await unresolvableSource(paths.tx, link.tx);
      if (missing) {
        logger.error(`${label} failed: ${missing}`);
        return { status: 'io-error', error: missing };
      }
      const outcome = await createLink(paths.tx, paths.rx);
      if (outcome.error) {
        logger.error(`${label} failed: ${describeLinkStatus(outcome.status)}: ${outcome.error}`);
      } else {
        logger.debug(`${label}: ${describeLinkStatus(outcome.status)}`);
      }
      return outcome;
    }
    case 'already-linked':
      logger.debug(`${label}: ${describeLinkStatus(state.kind)}`);
      return { status: state.kind };
    case 'different-link':
    case 'file-exists': {
      if (options.force) {
        // nothing is moved aside unless the source can be linked to
        const missing = await unresolvableSource(paths.tx, link.tx);
        if (missing) {
          logger.error(`${label} failed: ${missing}`);
          return { status: 'io-error', error: missing };
        }
        const outcome = await replaceReceiver(paths.tx, paths.rx, options.backup ?? true);
        if (outcome.error) {
          logger.error(`${label} failed: ${describeLinkStatus(outcome.status)}: ${outcome.error}`);
        } else {
          logger.info(
            outcome.backupPath
              ? `${label}: ${describeLinkStatus(outcome.status)}, previous kept at ${outcome.backupPath}`
              : `${label}: ${describeLinkStatus(outcome.status)}`,
          );
        }
        return outcome;
      }
      logger.error(`${label} failed: ${describeLinkStatus(state.kind)}`);
      return { status: state.kind };
    }
    case 'broken-symlink':
      logger.error(`${label} failed: ${describeLinkStatus(state.kind)}`);
      return { status: state.kind };
    case 'io-error':
      logger.error(`${label} failed: ${state.error}`);
      return { status: state.kind, error: state.error };
    default: {
      const unreachable: never = state;
      return unreachable;
    }
  }
};
