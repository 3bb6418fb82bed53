/**
 * dotfold Settings — Dot Entry Shapes
 *
 * A dot is one managed file or directory: a `source` inside the dotfiles
 * root and a `target` where the symlink engine places it. The settings core
 * only carries these values; linking, ignore matching and template rendering
 * belong to the symlink engine.
 */

/**
 * A dot entry of the active profile.
 *
 * `source` is relative to the dotfiles root unless absolute.
 * `target` is relative to the home directory unless absolute.
 */
export interface Dot {
  readonly source: string;
  readonly target: string;
  /** Glob patterns excluded when linking a directory source. */
  readonly ignore: ReadonlyArray<string>;
}

/**
 * A named profile's override of a dot entry.
 *
 * Every field is optional: an absent field keeps the value of the dot with
 * the same name in the active profile. A dot override without a matching
 * active dot must carry both `source` and `target` to be linkable; that
 * check is the symlink engine's.
 */
export interface DotOverride {
  readonly source?: string | undefined;
  readonly target?: string | undefined;
  readonly ignore?: ReadonlyArray<string> | undefined;
}
