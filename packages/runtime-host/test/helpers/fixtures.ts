/**
 * Shared fixtures for runtime-host settings tests.
 *
 * Every helper works inside a fresh temp directory; nothing touches the
 * real home or configuration directory.
 */

import { mkdirSync, mkdtempSync, realpathSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/** Create a fresh temp directory with symlinks resolved (macOS /var). */
export function makeTempDir(label: string): string {
  return realpathSync(mkdtempSync(join(tmpdir(), `dotfold-${label}-`)));
}

/** Write `content` to `dir/name`, creating parent directories. */
export function writeFile(dir: string, name: string, content: string): string {
  const path = join(dir, name);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
  return path;
}

/** Quote a value as a TOML basic string. */
export function tomlString(value: string): string {
  return JSON.stringify(value);
}
