/**
 * dotfold Settings — Settings Model
 *
 * The in-memory form of `dotfold.toml` and of the fragments it imports.
 *
 * A RootSettings value is built once per invocation from the root file,
 * mutated in place while imports are merged, and then handed to the
 * symlink engine, hook runner and template engine. Nothing here writes
 * settings back to disk.
 *
 * Field names match the TOML keys.
 */

import type { Dot, DotOverride } from './dot.js';

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

/**
 * The unnamed, always-enabled profile (`[settings]` in TOML).
 *
 * Hook lists are order-significant and may contain duplicates.
 */
export interface ActiveProfile {
  dots: Record<string, Dot>;
  prehooks: string[];
  posthooks: string[];
  /** Paths to variable files used by the template engine. */
  vars: string[];
}

/**
 * A named, opt-in layer over the active profile (`[profiles.<name>]`).
 *
 * `extra_profiles` names further profiles to enable together with this one.
 * Following that chain, and guarding it against cycles, is up to the
 * consumer.
 */
export interface Profile {
  dots: Record<string, DotOverride>;
  extra_profiles: string[];
  prehooks: string[];
  posthooks: string[];
  vars: string[];
}

// ---------------------------------------------------------------------------
// Root settings and fragments
// ---------------------------------------------------------------------------

/** One `[[import]]` entry. Relative paths are anchored to the dotfiles root. */
export interface ImportPath {
  path: string;
}

/**
 * The top-level configuration parsed from `<config dir>/dotfold.toml`.
 */
export interface RootSettings {
  /** Dotfiles directory: absolute, or relative to the home directory. */
  dotfiles_dir: string;
  /** Identity used by the template engine to decrypt secrets. */
  gpg_user_id?: string | undefined;
  settings: ActiveProfile;
  profiles: Record<string, Profile>;
  import: ImportPath[];
}

/**
 * An imported configuration file.
 *
 * A fragment may contribute dots, hooks, vars, profiles and further import
 * entries, but can never redefine the dotfiles root or the gpg identity.
 */
export type ImportedFragment = Omit<RootSettings, 'dotfiles_dir' | 'gpg_user_id'>;

/** Returns an empty active profile. */
export function createActiveProfile(): ActiveProfile {
  return { dots: {}, prehooks: [], posthooks: [], vars: [] };
}
