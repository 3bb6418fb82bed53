/**
 * dotfold Runtime Host — Settings File Parser
 *
 * Reads one TOML file and validates it against a settings schema.
 *
 * Failure mapping:
 *   path does not exist           CONFIG_NOT_FOUND
 *   read fails (EISDIR, EACCES)   CONFIG_READ_ERROR
 *   TOML syntax error             CONFIG_FORMAT_ERROR, detail = parser message
 *   schema mismatch               CONFIG_FORMAT_ERROR, detail = zod issues
 *
 * Reads are synchronous: a settings load is a one-shot, in-order sequence
 * of file reads at process start.
 */

import { existsSync, readFileSync } from 'node:fs';
import { parse as parseToml } from 'smol-toml';
import type { z } from 'zod';
import {
  configFormatError,
  configNotFound,
  configReadError,
  type ImportedFragment,
  type LoadResult,
  type RootSettings,
} from '@dotfold/settings';
import { ImportedFragmentSchema, RootSettingsSchema } from './schema.js';

/** Parse the root settings file. Unknown top-level keys are rejected. */
export function parseRootSettings(path: string): LoadResult<RootSettings> {
  return parseSettingsFile(path, RootSettingsSchema);
}

/** Parse an imported fragment. Unknown top-level keys are dropped. */
export function parseImportedFragment(path: string): LoadResult<ImportedFragment> {
  return parseSettingsFile(path, ImportedFragmentSchema);
}

/**
 * Read `path` as TOML and validate it against `schema`.
 */
export function parseSettingsFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): LoadResult<T> {
  if (!existsSync(path)) {
    return { ok: false, error: configNotFound(path) };
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (cause: unknown) {
    return { ok: false, error: configReadError(path, toError(cause)) };
  }

  let document: unknown;
  try {
    document = parseToml(content);
  } catch (cause: unknown) {
    return { ok: false, error: configFormatError(path, toError(cause).message) };
  }

  const result = schema.safeParse(document);
  if (!result.success) {
    return { ok: false, error: configFormatError(path, formatIssues(result.error.issues)) };
  }
  return { ok: true, value: result.data };
}

/**
 * Render zod issues as `<dotted.path>: <message>` joined by `; `.
 * Top-level issues use `(root)` as their path.
 */
export function formatIssues(issues: ReadonlyArray<z.ZodIssue>): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    })
    .join('; ');
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function toError(cause: unknown): Error {
  return cause instanceof Error ? cause : new Error(String(cause));
}
