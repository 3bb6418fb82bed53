/**
 * dotfold settings — Inspect the resolved settings
 *
 * Subcommands:
 *   dotfold settings path       — print the resolved config file path
 *   dotfold settings show       — load and summarize the merged settings
 *   dotfold settings profiles   — list profiles and the profiles they pull in
 *
 * Every subcommand takes --config-dir <dir> to read dotfold.toml from a
 * directory other than the standard configuration directory.
 *
 * A settings error is printed in red on stderr and sets exit code 1.
 */

import { Command } from 'commander';
import {
  createNodeHostEnvironment,
  loadSettings,
  resolveConfigPath,
  type LoadedSettings,
} from '@dotfold/runtime-host';
import { formatSettingsError, type SettingsError } from '@dotfold/settings';
import { renderProfiles, renderSettings, toSettingsView } from '../output/settings.js';
import { t } from '../output/theme.js';

interface CommonOptions {
  configDir?: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function reportError(error: SettingsError): void {
  process.stderr.write(t.error(formatSettingsError(error)) + '\n');
  process.exitCode = 1;
}

function load(options: CommonOptions): LoadedSettings | null {
  const result = loadSettings({ configDir: options.configDir });
  if (!result.ok) {
    reportError(result.error);
    return null;
  }
  return result.value;
}

// ---------------------------------------------------------------------------
// dotfold settings path
// ---------------------------------------------------------------------------

function createPathCommand(): Command {
  return new Command('path')
    .description('Print the path of dotfold.toml')
    .option('--config-dir <dir>', 'Directory holding dotfold.toml')
    .action((options: CommonOptions) => {
      const result = resolveConfigPath(createNodeHostEnvironment(), options.configDir);
      if (!result.ok) {
        reportError(result.error);
        return;
      }
      process.stdout.write(result.value + '\n');
    });
}

// ---------------------------------------------------------------------------
// dotfold settings show
// ---------------------------------------------------------------------------

function createShowCommand(): Command {
  return new Command('show')
    .description('Load dotfold.toml with its imports and summarize the result')
    .option('--config-dir <dir>', 'Directory holding dotfold.toml')
    .option('--json', 'Output as JSON')
    .action((options: CommonOptions & { json?: boolean }) => {
      const loaded = load(options);
      if (loaded === null) return;

      const view = toSettingsView(loaded);
      if (options.json === true) {
        process.stdout.write(JSON.stringify(view, null, 2) + '\n');
        return;
      }
      process.stdout.write(renderSettings(view));
    });
}

// ---------------------------------------------------------------------------
// dotfold settings profiles
// ---------------------------------------------------------------------------

function createProfilesCommand(): Command {
  return new Command('profiles')
    .description('List profiles defined by dotfold.toml and its imports')
    .option('--config-dir <dir>', 'Directory holding dotfold.toml')
    .action((options: CommonOptions) => {
      const loaded = load(options);
      if (loaded === null) return;
      process.stdout.write(renderProfiles(loaded.settings.profiles));
    });
}

/**
 * Build a fresh `settings` command tree. Commander keeps parsed option
 * values on the command, so each parse that must start clean needs its
 * own tree.
 */
export function createSettingsCommand(): Command {
  return new Command('settings')
    .description('Inspect dotfold settings')
    .addCommand(createPathCommand())
    .addCommand(createShowCommand())
    .addCommand(createProfilesCommand());
}

export const settingsCommand = createSettingsCommand();
