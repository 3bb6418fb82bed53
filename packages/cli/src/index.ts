/**
 * @dotfold/cli
 *
 * dotfold command-line interface. The executable lives in src/bin/dotfold.ts;
 * this entry exposes the configured program and the settings renderers.
 */

export { program } from './commands/index.js';
export { createSettingsCommand } from './commands/settings.js';
export type { SettingsView } from './output/settings.js';
export { renderProfiles, renderSettings, toSettingsView } from './output/settings.js';
