/**
 * dotfold Runtime Host — Diagnostic Sinks
 *
 * Implementations of the DiagnosticSink interface from @dotfold/settings.
 *
 *   ConsoleDiagnosticSink  writes each diagnostic as one red line to stderr
 *   MemoryDiagnosticSink   records diagnostics for tests and embedded use
 */

import chalk from 'chalk';
import {
  formatDiagnostic,
  type DiagnosticSink,
  type ImportDiagnostic,
} from '@dotfold/settings';

/** The subset of a writable stream a console sink writes to. */
export interface LineWriter {
  write(chunk: string): unknown;
}

/**
 * Writes `formatDiagnostic(d)` in red, followed by a newline.
 * Colour follows chalk's detection of the terminal.
 */
export class ConsoleDiagnosticSink implements DiagnosticSink {
  constructor(private readonly stream: LineWriter = process.stderr) {}

  report(diagnostic: ImportDiagnostic): void {
    this.stream.write(chalk.red(formatDiagnostic(diagnostic)) + '\n');
  }
}

/**
 * Keeps every reported diagnostic in memory, in order.
 */
export class MemoryDiagnosticSink implements DiagnosticSink {
  private readonly entries: ImportDiagnostic[] = [];

  report(diagnostic: ImportDiagnostic): void {
    this.entries.push(diagnostic);
  }

  list(): ReadonlyArray<ImportDiagnostic> {
    return this.entries;
  }

  /** Formatted lines, as ConsoleDiagnosticSink would print them uncoloured. */
  messages(): ReadonlyArray<string> {
    return this.entries.map(formatDiagnostic);
  }
}
