import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse, stringify } from 'yaml';

import { ConfigError, UnsupportedRepoKindError, errorMessage } from '@/farm/errors';
import {
  type Category,
  type Config,
  type Link,
  REPO_FLAGS,
  REPO_KINDS,
  type RepoFlag,
  type RepoKind,
  type Repository,
} from '@/farm/types';

const isRepoFlag = (value: unknown): value is RepoFlag =>
  REPO_FLAGS.some((flag) => flag === value);

const isRepoKind = (value: unknown): value is RepoKind =>
  REPO_KINDS.some((kind) => kind === value);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toMapping = (value: unknown, keyPath: string): Map<string, unknown> => {
  const mapping = new Map<string, unknown>();

  if (value instanceof Map) {
    for (const [key, entry] of value) {
      mapping.set(String(key), entry);
    }
    return mapping;
  }

  if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      mapping.set(key, entry);
    }
    return mapping;
  }

  throw new ConfigError('expected a mapping', keyPath);
};

const optionalMapping = (value: unknown, keyPath: string): Map<string, unknown> | undefined =>
  value === undefined || value === null ? undefined : toMapping(value, keyPath);

const readString = (fields: Map<string, unknown>, key: string, keyPath: string): string => {
  const value = fields.get(key);
  if (typeof value !== 'string') {
    throw new ConfigError('expected a string', `${keyPath}.${key}`);
  }
  return value;
};

const readFlags = (value: unknown, keyPath: string): RepoFlag[] | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError('expected a list of flags', keyPath);
  }

  return value.map((flag: unknown, index) => {
    if (!isRepoFlag(flag)) {
      throw new ConfigError(
        `unknown flag ${String(flag)} (expected one of ${REPO_FLAGS.join(', ')})`,
        `${keyPath}[${index}]`,
      );
    }
    return flag;
  });
};

const readKind = (value: unknown, keyPath: string): RepoKind | undefined => {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isRepoKind(value)) {
    throw new ConfigError(
      `unknown repository kind ${String(value)} (expected one of ${REPO_KINDS.join(', ')})`,
      keyPath,
    );
  }
  return value;
};

const readRepository = (value: unknown, keyPath: string): Repository => {
  const fields = toMapping(value, keyPath);
  const repository: Repository = {
    name: readString(fields, 'name', keyPath),
    path: readString(fields, 'path', keyPath),
    url: readString(fields, 'url', keyPath),
  };

  const flags = readFlags(fields.get('flags'), `${keyPath}.flags`);
  if (flags) {
    repository.flags = flags;
  }
  const kind = readKind(fields.get('kind'), `${keyPath}.kind`);
  if (kind) {
    repository.kind = kind;
  }

  return repository;
};

const readLink = (value: unknown, keyPath: string): Link => {
  const fields = toMapping(value, keyPath);
  return {
    name: readString(fields, 'name', keyPath),
    rx: readString(fields, 'rx', keyPath),
    tx: readString(fields, 'tx', keyPath),
  };
};

const readCategory = (value: unknown, keyPath: string): Category => {
  const category: Category = {};
  if (value === undefined || value === null) {
    return category;
  }

  const fields = toMapping(value, keyPath);

  const flags = readFlags(fields.get('flags'), `${keyPath}.flags`);
  if (flags) {
    category.flags = flags;
  }

  const repos = optionalMapping(fields.get('repos'), `${keyPath}.repos`);
  if (repos) {
    category.repos = new Map(
      [...repos].map(([key, entry]) => [key, readRepository(entry, `${keyPath}.repos.${key}`)]),
    );
  }

  const links = optionalMapping(fields.get('links'), `${keyPath}.links`);
  if (links) {
    category.links = new Map(
      [...links].map(([key, entry]) => [key, readLink(entry, `${keyPath}.links.${key}`)]),
    );
  }

  return category;
};

export const parseConfig = (content: string, source = '<config>'): Config => {
  let document: unknown;
  try {
    document = parse(content, { mapAsMap: true });
  } catch (error) {
    throw new ConfigError(`invalid YAML in ${source}: ${errorMessage(error)}`);
  }

  if (document === undefined || document === null) {
    return { categories: new Map() };
  }

  const root = toMapping(document, '<root>');
  const categories = optionalMapping(root.get('categories'), 'categories') ?? new Map();

  return {
    categories: new Map(
      [...categories].map(([key, entry]) => [key, readCategory(entry, `categories.${key}`)]),
    ),
  };
};

const requireText = (value: string, keyPath: string) => {
  if (value.trim() === '') {
    throw new ConfigError('expected a non-empty string', keyPath);
  }
};

const validateGitRepository = (repository: Repository, keyPath: string) => {
  if (!repository.path.endsWith('/') && !repository.path.endsWith(path.sep)) {
    throw new ConfigError('must end with a path separator', `${keyPath}.path`);
  }
};

const validateRepository = (repository: Repository, keyPath: string) => {
  requireText(repository.name, `${keyPath}.name`);
  requireText(repository.path, `${keyPath}.path`);
  requireText(repository.url, `${keyPath}.url`);

  const kind = repository.kind ?? 'GitRepo';
  switch (kind) {
    case 'GitRepo':
      validateGitRepository(repository, keyPath);
      return;
    case 'GitHubRepo':
    case 'GitLabRepo':
    case 'GiteaRepo':
    case 'UrlRepo':
    case 'Link':
      throw new UnsupportedRepoKindError(kind, `${keyPath}.kind`);
    default: {
      const unreachable: never = kind;
      return unreachable;
    }
  }
};

/**
 * Checks what parsing leaves open: non-empty fields, a runnable repository kind
 * and a trailing separator on git repository paths. Returns the config unchanged.
 */
export const validateConfig = (config: Config): Config => {
  for (const [categoryKey, category] of config.categories) {
    const keyPath = `categories.${categoryKey}`;
    for (const [key, repository] of category.repos ?? []) {
      validateRepository(repository, `${keyPath}.repos.${key}`);
    }
    for (const [key, link] of category.links ?? []) {
      requireText(link.name, `${keyPath}.links.${key}.name`);
      requireText(link.rx, `${keyPath}.links.${key}.rx`);
      requireText(link.tx, `${keyPath}.links.${key}.tx`);
    }
  }
  return config;
};

export const loadConfig = async (file: string): Promise<Config> => {
  let content: string;
  try {
    content = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError(`unable to read config file ${file}: ${errorMessage(error)}`);
  }

  return validateConfig(parseConfig(content, file));
};

const repositoryToDocument = (repository: Repository) => ({
  name: repository.name,
  path: repository.path,
  url: repository.url,
  ...(repository.kind ? { kind: repository.kind } : {}),
  ...(repository.flags ? { flags: repository.flags } : {}),
});

const categoryToDocument = (category: Category) => ({
  ...(category.flags ? { flags: category.flags } : {}),
  ...(category.repos
    ? {
        repos: new Map(
          [...category.repos].map(([key, repository]) => [key, repositoryToDocument(repository)]),
        ),
      }
    : {}),
  ...(category.links
    ? {
        links: new Map(
          [...category.links].map(([key, link]) => [
            key,
            { name: link.name, rx: link.rx, tx: link.tx },
          ]),
        ),
      }
    : {}),
});

export const serializeConfig = (config: Config): string =>
  stringify({
    categories: new Map(
      [...config.categories].map(([key, category]) => [key, categoryToDocument(category)]),
    ),
  });

export const findRepository = (
  config: Config,
  category: string,
  key: string,
): Repository | undefined => config.categories.get(category)?.repos?.get(key);

export const findLink = (config: Config, category: string, key: string): Link | undefined =>
  config.categories.get(category)?.links?.get(key);
