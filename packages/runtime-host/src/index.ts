/**
 * @dotfold/runtime-host
 *
 * dotfold runtime host: everything in a settings load that touches the host.
 * Host directory lookup, path resolution, TOML parsing and validation,
 * import resolution, and the diagnostic sink implementations.
 *
 * Depends on @dotfold/settings for the model, the merge and the result
 * types. No settings-package code imports from this package.
 */

// Host environment
export type { HostEnvironment, NodeHostEnvironmentOptions } from './host/environment.js';
export { createNodeHostEnvironment, createStaticHostEnvironment } from './host/environment.js';

// Paths
export { CONFIG_FILENAME, resolveConfigPath, resolveDotfilesRoot } from './config/paths.js';

// Parsing
export {
  formatIssues,
  parseImportedFragment,
  parseRootSettings,
  parseSettingsFile,
} from './config/parser.js';
export {
  ActiveProfileSchema,
  DotOverrideSchema,
  DotSchema,
  ImportedFragmentSchema,
  ImportPathSchema,
  ProfileSchema,
  RootSettingsSchema,
} from './config/schema.js';

// Imports
export type { ImportReport, SkippedImport } from './config/imports.js';
export { resolveImportPath, resolveImports } from './config/imports.js';

// Load
export type { LoadedSettings, LoadSettingsOptions } from './config/load.js';
export { loadSettings } from './config/load.js';

// Diagnostic sinks
export type { LineWriter } from './logging/diagnostic-sinks.js';
export { ConsoleDiagnosticSink, MemoryDiagnosticSink } from './logging/diagnostic-sinks.js';
