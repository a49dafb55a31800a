import os from 'node:os';
import path from 'node:path';

export const APP_DIR_NAME = 'newsdesk';
export const BOOKMARKS_DB_FILE = 'bookmarks.db';

/**
 * Per-user application data directory, following each platform's convention.
 */
export const resolveAppDataDir = (
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  homeDir: string = os.homedir(),
): string => {
  if (platform === 'win32') {
    const base = env.APPDATA || path.join(homeDir, 'AppData', 'Roaming');
    return path.join(base, APP_DIR_NAME);
  }

  if (platform === 'darwin') {
    return path.join(homeDir, 'Library', 'Application Support', APP_DIR_NAME);
  }

  const base = env.XDG_DATA_HOME || path.join(homeDir, '.local', 'share');
  return path.join(base, APP_DIR_NAME);
};

export const defaultBookmarksDbPath = (env: NodeJS.ProcessEnv = process.env): string =>
  path.join(resolveAppDataDir(env), BOOKMARKS_DB_FILE);
