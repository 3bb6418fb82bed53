/**
 * dotfold Runtime Host — Import Resolution
 *
 * Walks the root settings' `[[import]]` list once, in order, and merges
 * every fragment that loads into the root as soon as it loads.
 *
 * A missing or malformed import is reported to the DiagnosticSink and
 * skipped; it never fails the load. The caller sees the root as it stands
 * after every successful merge.
 *
 * Imports listed inside a fragment are appended to `root.import` by the
 * merge but are not walked: only the entries present when resolution
 * starts are resolved.
 */

import { existsSync } from 'node:fs';
import { isAbsolute, join } from 'node:path';
import {
  mergeFragment,
  type DiagnosticSink,
  type ImportDiagnostic,
  type RootSettings,
} from '@dotfold/settings';
import { parseImportedFragment } from './parser.js';

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

export interface SkippedImport {
  readonly path: string;
  readonly reason: 'not_found' | 'load_failed';
}

/** Outcome of one resolution pass, in import order. */
export interface ImportReport {
  /** Absolute paths of fragments that were merged. */
  readonly merged: ReadonlyArray<string>;
  readonly skipped: ReadonlyArray<SkippedImport>;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Anchor an import path: absolute paths are kept, relative ones are joined
 * onto the dotfiles root.
 */
export function resolveImportPath(importPath: string, dotfilesRoot: string): string {
  return isAbsolute(importPath) ? importPath : join(dotfilesRoot, importPath);
}

/**
 * Load and merge every import of `root`, mutating `root` in place.
 *
 * @param root - Parsed root settings; receives each merged fragment
 * @param dotfilesRoot - Resolved dotfiles directory relative imports anchor on
 * @param diagnostics - Receives one diagnostic per skipped import
 */
export function resolveImports(
  root: RootSettings,
  dotfilesRoot: string,
  diagnostics: DiagnosticSink,
): ImportReport {
  const paths = root.import.map((entry) => resolveImportPath(entry.path, dotfilesRoot));
  const merged: string[] = [];
  const skipped: SkippedImport[] = [];

  const skip = (diagnostic: ImportDiagnostic): void => {
    diagnostics.report(diagnostic);
    skipped.push({
      path: diagnostic.path,
      reason: diagnostic.kind === 'import_not_found' ? 'not_found' : 'load_failed',
    });
  };

  for (const path of paths) {
    if (!existsSync(path)) {
      skip({ kind: 'import_not_found', path });
      continue;
    }

    const fragment = parseImportedFragment(path);
    if (!fragment.ok) {
      skip({ kind: 'import_load_failed', path, detail: fragment.error.message });
      continue;
    }

    mergeFragment(root, fragment.value);
    merged.push(path);
  }

  return { merged, skipped };
}
