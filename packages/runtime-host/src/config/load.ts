/**
 * dotfold Runtime Host — Settings Load
 *
 * The single entry point that produces a fully merged settings value:
 *
 *   1. resolveConfigPath()    <config dir>/dotfold.toml
 *   2. parseRootSettings()    strict root schema
 *   3. resolveDotfilesRoot()  must be an existing directory
 *   4. resolveImports()       one pass over the root's import list
 *
 * Steps 1-3 abort the load on failure and return the error. Step 4 never
 * fails; skipped imports go to the diagnostic sink.
 *
 * Nothing here reads process-wide state directly: the host environment,
 * the configuration directory and the diagnostic sink are all options.
 */

import type { LoadResult, RootSettings, DiagnosticSink } from '@dotfold/settings';
import { createNodeHostEnvironment, type HostEnvironment } from '../host/environment.js';
import { ConsoleDiagnosticSink } from '../logging/diagnostic-sinks.js';
import { resolveImports, type ImportReport } from './imports.js';
import { parseRootSettings } from './parser.js';
import { resolveConfigPath, resolveDotfilesRoot } from './paths.js';

export interface LoadSettingsOptions {
  /**
   * Directory holding `dotfold.toml`.
   * Overrides the host's standard configuration directory.
   */
  readonly configDir?: string | undefined;
  /** Default: the live Node host environment. */
  readonly host?: HostEnvironment | undefined;
  /** Default: a ConsoleDiagnosticSink on stderr. */
  readonly diagnostics?: DiagnosticSink | undefined;
}

export interface LoadedSettings {
  readonly configPath: string;
  readonly dotfilesRoot: string;
  readonly settings: RootSettings;
  readonly imports: ImportReport;
}

/**
 * Load `dotfold.toml` and merge its imports.
 */
export function loadSettings(opts?: LoadSettingsOptions): LoadResult<LoadedSettings> {
  const host = opts?.host ?? createNodeHostEnvironment();
  const diagnostics = opts?.diagnostics ?? new ConsoleDiagnosticSink();

  const configPath = resolveConfigPath(host, opts?.configDir);
  if (!configPath.ok) return configPath;

  const parsed = parseRootSettings(configPath.value);
  if (!parsed.ok) return parsed;

  const dotfilesRoot = resolveDotfilesRoot(parsed.value, host);
  if (!dotfilesRoot.ok) return dotfilesRoot;

  const settings = parsed.value;
  const imports = resolveImports(settings, dotfilesRoot.value, diagnostics);

  return {
    ok: true,
    value: {
      configPath: configPath.value,
      dotfilesRoot: dotfilesRoot.value,
      settings,
      imports,
    },
  };
}
