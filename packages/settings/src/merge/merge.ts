/**
 * dotfold Settings — Fragment Merge
 *
 * Folds an imported fragment into the accumulating root settings, in place.
 *
 * Per-field policy:
 *   settings.prehooks / posthooks / vars  append, fragment entries after root's
 *   settings.dots                         key-wise union, fragment wins
 *   import                                append
 *   profiles                              key-wise union, fragment's profile
 *                                         replaces root's whole (no sub-merge)
 *
 * Lists always grow (no deduplication). On key collision the most recently
 * merged fragment wins, so merging A then B differs from B then A.
 * `dotfiles_dir` and `gpg_user_id` are never touched.
 */

import type { ImportedFragment, RootSettings } from '../types/settings.js';

export function mergeFragment(root: RootSettings, fragment: ImportedFragment): void {
  root.settings.prehooks.push(...fragment.settings.prehooks);
  root.settings.posthooks.push(...fragment.settings.posthooks);
  root.settings.vars.push(...fragment.settings.vars);
  root.import.push(...fragment.import);

  assignEntries(root.settings.dots, fragment.settings.dots);
  assignEntries(root.profiles, fragment.profiles);
}

/**
 * Copy every own entry of `source` onto `target`.
 *
 * Uses defineProperty so a TOML key such as `__proto__` lands as a plain
 * entry instead of replacing the target's prototype.
 */
function assignEntries<T>(target: Record<string, T>, source: Record<string, T>): void {
  for (const [key, value] of Object.entries(source)) {
    Object.defineProperty(target, key, {
      value,
      writable: true,
      enumerable: true,
      configurable: true,
    });
  }
}
