/**
 * dotfold Runtime Host — Settings Path Resolution
 *
 * Resolves the two paths a settings load starts from:
 *
 *   resolveConfigPath()    <config dir>/dotfold.toml
 *   resolveDotfilesRoot()  the user's dotfiles directory, which must exist
 *
 * The dotfiles-root existence check is the only guarantee the symlink
 * engine gets that its source directory is there.
 */

import { statSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import {
  configDirNotFound,
  dotfilesDirMissing,
  homeNotFound,
  type LoadResult,
  type RootSettings,
} from '@dotfold/settings';
import type { HostEnvironment } from '../host/environment.js';

/** Fixed basename of the root settings file. */
export const CONFIG_FILENAME = 'dotfold.toml';

/**
 * Resolve the root settings file path.
 *
 * @param host - Source of the standard configuration directory
 * @param configDir - Overrides the host's configuration directory
 */
export function resolveConfigPath(
  host: HostEnvironment,
  configDir?: string | undefined,
): LoadResult<string> {
  const dir = configDir ?? host.configDir();
  if (dir === null) {
    return { ok: false, error: configDirNotFound(CONFIG_FILENAME) };
  }
  return { ok: true, value: join(dir, CONFIG_FILENAME) };
}

/**
 * Resolve `settings.dotfiles_dir` to an existing directory.
 *
 * An absolute path is used as-is. `~` and `~/...` expand to the home
 * directory; any other relative path is joined onto the home directory.
 * The home directory is only required in those relative branches.
 */
export function resolveDotfilesRoot(
  settings: Pick<RootSettings, 'dotfiles_dir'>,
  host: HostEnvironment,
): LoadResult<string> {
  const dotfilesDir = settings.dotfiles_dir;
  let candidate: string;

  if (isAbsolute(dotfilesDir)) {
    candidate = dotfilesDir;
  } else {
    const home = host.homeDir();
    if (home === null) {
      return { ok: false, error: homeNotFound() };
    }
    candidate = join(home, stripTilde(dotfilesDir));
  }

  if (!isDirectory(candidate)) {
    return { ok: false, error: dotfilesDirMissing(candidate) };
  }
  return { ok: true, value: candidate };
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function stripTilde(path: string): string {
  if (path === '~') return '';
  if (path.startsWith('~/')) return path.slice(2);
  return path;
}

/** Any stat failure (ENOENT, ELOOP, EACCES) counts as not a directory. */
function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}
