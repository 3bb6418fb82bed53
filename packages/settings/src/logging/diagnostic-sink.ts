/**
 * dotfold Settings — Diagnostic Sink Interface
 *
 * Import-level failures (a missing or malformed import file) do not abort a
 * settings load. They are reported to a DiagnosticSink and the import is
 * skipped.
 *
 * This package owns the contract and the message text. Concrete sinks live
 * in @dotfold/runtime-host; this package never writes to a stream.
 */

/**
 * One skipped import.
 *
 *   import_not_found    the resolved import path does not exist
 *   import_load_failed  the file exists but could not be read or parsed;
 *                       `detail` carries the underlying error message
 */
export type ImportDiagnostic =
  | { readonly kind: 'import_not_found'; readonly path: string }
  | { readonly kind: 'import_load_failed'; readonly path: string; readonly detail: string };

/**
 * Receives diagnostics in the order they occur.
 * Implementations must not throw and must not drop entries.
 */
export interface DiagnosticSink {
  report(diagnostic: ImportDiagnostic): void;
}

/** The literal diagnostic line for an import failure. */
export function formatDiagnostic(diagnostic: ImportDiagnostic): string {
  switch (diagnostic.kind) {
    case 'import_not_found':
      return `Unable to find dotfold import file: ${diagnostic.path}`;
    case 'import_load_failed':
      return `Error loading settings from: ${diagnostic.path} ${diagnostic.detail}`;
  }
}
