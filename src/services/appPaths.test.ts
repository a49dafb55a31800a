import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { resolveAppDataDir } from './appPaths';

describe('resolveAppDataDir', () => {
  it('prefers XDG_DATA_HOME on linux', () => {
    expect(resolveAppDataDir({ XDG_DATA_HOME: '/xdg' }, 'linux', '/home/reader')).toBe(
      path.join('/xdg', 'newsdesk'),
    );
  });

  it('falls back to ~/.local/share on linux', () => {
    expect(resolveAppDataDir({}, 'linux', '/home/reader')).toBe(
      path.join('/home/reader', '.local', 'share', 'newsdesk'),
    );
  });

  it('uses Application Support on macOS', () => {
    expect(resolveAppDataDir({}, 'darwin', '/Users/reader')).toBe(
      path.join('/Users/reader', 'Library', 'Application Support', 'newsdesk'),
    );
  });

  it('uses APPDATA on windows', () => {
    expect(resolveAppDataDir({ APPDATA: 'C:/Users/reader/AppData/Roaming' }, 'win32', 'C:/Users/reader')).toBe(
      path.join('C:/Users/reader/AppData/Roaming', 'newsdesk'),
    );
  });
});
