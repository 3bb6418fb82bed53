/**
 * @dotfold/settings
 *
 * dotfold settings model: the typed representation of `dotfold.toml`, the
 * result and error types of a settings load, the fragment merge, and the
 * diagnostic sink contract.
 *
 * This package is side-effect free. It contains no imports of node:fs or
 * any other I/O API. Path resolution, file parsing and import loading live
 * in @dotfold/runtime-host.
 */

// Types
export type { Dot, DotOverride } from './types/dot.js';

export type {
  ActiveProfile,
  ImportedFragment,
  ImportPath,
  Profile,
  RootSettings,
} from './types/settings.js';
export { createActiveProfile } from './types/settings.js';

export type { LoadResult, SettingsError, SettingsErrorCode } from './types/result.js';
export {
  configDirNotFound,
  configFormatError,
  configNotFound,
  configReadError,
  dotfilesDirMissing,
  formatSettingsError,
  homeNotFound,
} from './types/result.js';

// Merge
export { mergeFragment } from './merge/merge.js';

// Diagnostic sink interface (implementations live in runtime-host)
export type { DiagnosticSink, ImportDiagnostic } from './logging/diagnostic-sink.js';
export { formatDiagnostic } from './logging/diagnostic-sink.js';
