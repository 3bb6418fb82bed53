/**
 * dotfold Runtime Host — Host Environment
 *
 * Supplies the two host directories the settings load depends on: the
 * user's home directory and the standard per-user configuration directory.
 *
 * Settings code never reads process.env or os.homedir() directly; it takes
 * a HostEnvironment. The Node implementation is the default, and tests
 * pass a static one so no test has to mutate the process environment.
 *
 * Configuration directory by platform:
 *   Linux/Unix: $XDG_CONFIG_HOME (when absolute), else ~/.config
 *   macOS:      ~/Library/Application Support
 *   Windows:    %APPDATA%
 */

import { homedir as osHomedir } from 'node:os';
import { isAbsolute, join } from 'node:path';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

/**
 * Host directories used for path resolution.
 *
 * Each method returns null when the host cannot supply the directory.
 */
export interface HostEnvironment {
  homeDir(): string | null;
  configDir(): string | null;
}

// ---------------------------------------------------------------------------
// Node implementation
// ---------------------------------------------------------------------------

/**
 * Inputs of the Node host environment. Every field defaults to the live
 * process value.
 */
export interface NodeHostEnvironmentOptions {
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly platform?: NodeJS.Platform | undefined;
  readonly homedir?: (() => string) | undefined;
}

export function createNodeHostEnvironment(
  opts?: NodeHostEnvironmentOptions,
): HostEnvironment {
  const env = opts?.env ?? process.env;
  const platform = opts?.platform ?? process.platform;
  const homedir = opts?.homedir ?? osHomedir;

  const homeDir = (): string | null => {
    const home = homedir();
    return home !== '' ? home : null;
  };

  const configDir = (): string | null => {
    switch (platform) {
      case 'win32': {
        const appData = env['APPDATA'];
        return typeof appData === 'string' && appData !== '' ? appData : null;
      }
      case 'darwin': {
        const home = homeDir();
        return home !== null ? join(home, 'Library', 'Application Support') : null;
      }
      default: {
        const xdg = env['XDG_CONFIG_HOME'];
        if (typeof xdg === 'string' && isAbsolute(xdg)) {
          return xdg;
        }
        const home = homeDir();
        return home !== null ? join(home, '.config') : null;
      }
    }
  };

  return { homeDir, configDir };
}

// ---------------------------------------------------------------------------
// Static implementation
// ---------------------------------------------------------------------------

/**
 * A host environment with fixed directories. An omitted directory is
 * reported as unavailable.
 */
export function createStaticHostEnvironment(dirs: {
  readonly home?: string | null | undefined;
  readonly config?: string | null | undefined;
}): HostEnvironment {
  return {
    homeDir: () => dirs.home ?? null,
    configDir: () => dirs.config ?? null,
  };
}
