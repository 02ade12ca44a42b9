import path from 'node:path';

import { ConfigError } from '@/farm/errors';

export const CONFIG_DIRECTORY_NAME = 'repofarm';
export const CONFIG_FILE_NAME = 'config.yaml';

export const resolveDefaultConfigPath = (env: NodeJS.ProcessEnv): string => {
  const xdgConfigHome = env.XDG_CONFIG_HOME?.trim();
  if (xdgConfigHome) {
    return path.resolve(xdgConfigHome, CONFIG_DIRECTORY_NAME, CONFIG_FILE_NAME);
  }

  const home = env.HOME?.trim();
  if (!home) {
    throw new ConfigError(
      'Unable to resolve config path: neither XDG_CONFIG_HOME nor HOME is set.',
    );
  }

  return path.resolve(home, '.config', CONFIG_DIRECTORY_NAME, CONFIG_FILE_NAME);
};

export const resolveConfigPath = (
  explicit: string | undefined,
  cwd: string,
  env: NodeJS.ProcessEnv,
): string => {
  if (explicit) {
    return path.resolve(cwd, explicit);
  }

  return resolveDefaultConfigPath(env);
};
