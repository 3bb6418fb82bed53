/**
 * dotfold Runtime Host — Settings File Schemas
 *
 * Zod schemas for `dotfold.toml` and for imported fragments.
 *
 * The root schema is strict at the top level: an unknown key (a typo such
 * as `dotfile_dir`) is a format error. The fragment schema takes the same
 * fields but is not strict, so unknown keys, including `dotfiles_dir` and
 * `gpg_user_id`, are dropped. Nested tables are never strict.
 */

import { z } from 'zod';
import type {
  ActiveProfile,
  Dot,
  DotOverride,
  ImportedFragment,
  ImportPath,
  Profile,
  RootSettings,
} from '@dotfold/settings';

// ---------------------------------------------------------------------------
// Dots
// ---------------------------------------------------------------------------

export const DotSchema: z.ZodType<Dot, z.ZodTypeDef, unknown> = z.object({
  source: z.string(),
  target: z.string(),
  ignore: z.array(z.string()).default([]),
});

export const DotOverrideSchema: z.ZodType<DotOverride, z.ZodTypeDef, unknown> = z.object({
  source: z.string().optional(),
  target: z.string().optional(),
  ignore: z.array(z.string()).optional(),
});

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

const hookList = z.array(z.string()).default([]);

export const ActiveProfileSchema: z.ZodType<ActiveProfile, z.ZodTypeDef, unknown> = z.object({
  dots: z.record(z.string(), DotSchema).default({}),
  prehooks: hookList,
  posthooks: hookList,
  vars: z.array(z.string()).default([]),
});

export const ProfileSchema: z.ZodType<Profile, z.ZodTypeDef, unknown> = z.object({
  dots: z.record(z.string(), DotOverrideSchema).default({}),
  extra_profiles: z.array(z.string()).default([]),
  prehooks: hookList,
  posthooks: hookList,
  vars: z.array(z.string()).default([]),
});

export const ImportPathSchema: z.ZodType<ImportPath, z.ZodTypeDef, unknown> = z.object({
  path: z.string(),
});

// ---------------------------------------------------------------------------
// Root settings and fragments
// ---------------------------------------------------------------------------

const sharedFields = {
  settings: ActiveProfileSchema.default({}),
  profiles: z.record(z.string(), ProfileSchema).default({}),
  import: z.array(ImportPathSchema).default([]),
};

export const RootSettingsSchema: z.ZodType<RootSettings, z.ZodTypeDef, unknown> = z
  .object({
    dotfiles_dir: z.string(),
    gpg_user_id: z.string().optional(),
    ...sharedFields,
  })
  .strict();

export const ImportedFragmentSchema: z.ZodType<ImportedFragment, z.ZodTypeDef, unknown> =
  z.object(sharedFields);
