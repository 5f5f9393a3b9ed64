import { isAbsolute, join, resolve } from 'node:path';

/** Environment variable that overrides the default store location */
export const STORE_PATH_ENV = 'TASKJAR_DB';

export interface StorePathOptions {
  /** Path given on the command line; wins over everything else */
  explicitPath?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/** Returns the default store path: `data/tasks.json` under the working directory */
export function getDefaultStorePath(cwd?: string): string {
  return join(cwd ?? process.cwd(), 'data', 'tasks.json');
}

/**
 * Resolve the JSON store location.
 * Priority: explicit path > TASKJAR_DB > default. Relative paths resolve against `cwd`.
 */
export function resolveStorePath(options: StorePathOptions = {}): string {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const chosen = options.explicitPath || env[STORE_PATH_ENV];

  if (!chosen) return getDefaultStorePath(cwd);
  return isAbsolute(chosen) ? chosen : resolve(cwd, chosen);
}
