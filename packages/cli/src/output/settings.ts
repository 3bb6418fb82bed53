import type { LoadedSettings } from '@dotfold/runtime-host'
import type { Profile } from '@dotfold/settings'
import { t } from './theme.js'

/**
 * Plain, JSON-ready summary of a loaded settings value.
 * Used by `settings show --json` and as the source of the text rendering.
 */
export interface SettingsView {
  readonly config_path: string
  readonly dotfiles_root: string
  readonly gpg_user_id: string | null
  readonly dots: ReadonlyArray<string>
  readonly prehooks: ReadonlyArray<string>
  readonly posthooks: ReadonlyArray<string>
  readonly vars: ReadonlyArray<string>
  readonly profiles: ReadonlyArray<string>
  readonly imports: {
    readonly merged: ReadonlyArray<string>
    readonly skipped: ReadonlyArray<string>
  }
}

export function toSettingsView(loaded: LoadedSettings): SettingsView {
  const { settings } = loaded
  return {
    config_path:   loaded.configPath,
    dotfiles_root: loaded.dotfilesRoot,
    gpg_user_id:   settings.gpg_user_id ?? null,
    dots:          Object.keys(settings.settings.dots).sort(),
    prehooks:      [...settings.settings.prehooks],
    posthooks:     [...settings.settings.posthooks],
    vars:          [...settings.settings.vars],
    profiles:      Object.keys(settings.profiles).sort(),
    imports: {
      merged:  [...loaded.imports.merged],
      skipped: loaded.imports.skipped.map((s) => s.path),
    },
  }
}

const labelW = 16
const label = (s: string) => t.label(s + ' '.repeat(Math.max(1, labelW - s.length)))

const list = (items: ReadonlyArray<string>): string =>
  items.length === 0 ? t.faint('(none)') : t.value(items.join(', '))

/**
 * renderSettings — human-readable settings summary for `settings show`.
 */
export function renderSettings(view: SettingsView): string {
  let out = '\n'

  out += '  ' + label('config') + t.value(view.config_path) + '\n'
  out += '  ' + label('dotfiles') + t.value(view.dotfiles_root) + '\n'
  out += '  ' + label('gpg user') + (view.gpg_user_id !== null ? t.value(view.gpg_user_id) : t.faint('(none)')) + '\n'

  out += '\n'
  out += '  ' + label('dots') + t.value(String(view.dots.length)) + '  ' + t.faint(view.dots.join(' ')) + '\n'
  out += '  ' + label('prehooks') + list(view.prehooks) + '\n'
  out += '  ' + label('posthooks') + list(view.posthooks) + '\n'
  out += '  ' + label('vars') + list(view.vars) + '\n'
  out += '  ' + label('profiles') + list(view.profiles) + '\n'

  out += '\n'
  out += '  ' + label('imports') + t.ok(String(view.imports.merged.length) + ' merged')
  if (view.imports.skipped.length > 0) {
    out += '  ' + t.warn(String(view.imports.skipped.length) + ' skipped')
  }
  out += '\n'

  return out
}

/**
 * renderProfiles — one line per profile, with the profiles it pulls in.
 */
export function renderProfiles(profiles: Readonly<Record<string, Profile>>): string {
  const names = Object.keys(profiles).sort()
  if (names.length === 0) {
    return '  ' + t.faint('(no profiles)') + '\n'
  }

  let out = ''
  for (const name of names) {
    const profile = profiles[name]
    if (profile === undefined) continue
    const extra = profile.extra_profiles.length > 0
      ? '  ' + t.faint('+ ' + profile.extra_profiles.join(', '))
      : ''
    const dotCount = Object.keys(profile.dots).length
    out += '  ' + t.name(name) + '  ' + t.label(String(dotCount) + ' dots') + extra + '\n'
  }
  return out
}
