import { homedir } from 'node:os';
import { join, resolve } from 'node:path';

export const STATE_DIR_ENV = 'SF_STATE_DIR';

/**
 * Local state root: `$SF_STATE_DIR`, else `~/.sf`.
 */
export function resolveStateRoot(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env[STATE_DIR_ENV]?.trim();
  if (configured) {
    return resolve(configured);
  }
  return join(homedir(), '.sf');
}

export interface StatePaths {
  root: string;
  configFile: string;
  featuresDir: string;
  locksDir: string;
  logsDir: string;
}

export function statePaths(root: string): StatePaths {
  return {
    root,
    configFile: join(root, 'config.yml'),
    featuresDir: join(root, 'features'),
    locksDir: join(root, 'locks'),
    logsDir: join(root, 'logs'),
  };
}
