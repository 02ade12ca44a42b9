import { expect, it } from 'vitest';

import { ConfigError } from '@/farm/errors';
import { resolveConfigPath, resolveDefaultConfigPath } from '@/farm/paths';

it('uses XDG_CONFIG_HOME for the default config when available', () => {
  const file = resolveDefaultConfigPath({ XDG_CONFIG_HOME: '/workspace/config', HOME: '/Users/tester' });
  expect(file).toBe('/workspace/config/repofarm/config.yaml');
});

it('falls back to HOME when XDG_CONFIG_HOME is absent', () => {
  const file = resolveDefaultConfigPath({ HOME: '/Users/tester' });
  expect(file).toBe('/Users/tester/.config/repofarm/config.yaml');
});

it('fails with a config error when no home can be found', () => {
  expect(() => resolveDefaultConfigPath({})).toThrow(ConfigError);
});

it('resolves an explicit config path against cwd', () => {
  expect(resolveConfigPath('farm.yaml', '/repo/project', {})).toBe('/repo/project/farm.yaml');
  expect(resolveConfigPath('/etc/farm.yaml', '/repo/project', {})).toBe('/etc/farm.yaml');
  expect(resolveConfigPath(undefined, '/repo/project', { HOME: '/Users/tester' })).toBe(
    '/Users/tester/.config/repofarm/config.yaml',
  );
});
