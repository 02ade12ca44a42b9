import { readFile } from 'node:fs/promises';

import { type Package, parse } from '@/parser';

const readPackage = async (): Promise<Package> => {
  const raw: unknown = JSON.parse(
    await readFile(new URL('../package.json', import.meta.url), 'utf8'),
  );

  if (
    typeof raw !== 'object' ||
    raw === null ||
    !('name' in raw) ||
    !('version' in raw) ||
    typeof raw.name !== 'string' ||
    typeof raw.version !== 'string'
  ) {
    throw new Error('package.json is missing a name or version');
  }

  const description = 'description' in raw && typeof raw.description === 'string' ? raw.description : '';
  return { name: raw.name, version: raw.version, description };
};

const run = parse({ argv: process.argv, pkg: await readPackage() });
await run();
