/**
 * dotfold Settings — Fragment Merge Tests
 *
 * Verifies the per-field merge policy of mergeFragment():
 *
 *   - hook and var lists append in order, without deduplication
 *   - dots and profiles are key-wise unions where the last merge wins
 *   - merge order matters on key collision
 *   - dotfiles_dir and gpg_user_id are never touched
 *
 * Tests are pure: no I/O.
 */

import { describe, it, expect } from 'vitest';
import { mergeFragment } from '../src/merge/merge.js';
import { createActiveProfile } from '../src/types/settings.js';
import type { ImportedFragment, Profile, RootSettings } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeRoot(): RootSettings {
  return {
    dotfiles_dir: '/home/test/dotfiles',
    gpg_user_id: 'test@example.com',
    settings: {
      dots: { zsh: { source: 'zsh/zshrc', target: '.zshrc', ignore: [] } },
      prehooks: ['echo root-pre'],
      posthooks: ['echo root-post'],
      vars: ['vars.toml'],
    },
    profiles: {},
    import: [{ path: 'base.toml' }],
  };
}

function makeProfile(overrides: Partial<Profile> = {}): Profile {
  return {
    dots: {},
    extra_profiles: [],
    prehooks: [],
    posthooks: [],
    vars: [],
    ...overrides,
  };
}

function makeFragment(overrides: Partial<ImportedFragment> = {}): ImportedFragment {
  return {
    settings: createActiveProfile(),
    profiles: {},
    import: [],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// List fields
// ---------------------------------------------------------------------------

describe('mergeFragment — list fields', () => {
  it('appends hooks, vars and imports after the root entries, in order', () => {
    const root = makeRoot();
    const fragment = makeFragment({
      settings: {
        dots: {},
        prehooks: ['echo a', 'echo b'],
        posthooks: ['echo c'],
        vars: ['more-vars.toml'],
      },
      import: [{ path: 'nested.toml' }],
    });

    mergeFragment(root, fragment);

    expect(root.settings.prehooks).toEqual(['echo root-pre', 'echo a', 'echo b']);
    expect(root.settings.posthooks).toEqual(['echo root-post', 'echo c']);
    expect(root.settings.vars).toEqual(['vars.toml', 'more-vars.toml']);
    expect(root.import).toEqual([{ path: 'base.toml' }, { path: 'nested.toml' }]);
  });

  it('keeps duplicates: the same hook twice stays twice', () => {
    const root = makeRoot();
    mergeFragment(root, makeFragment({
      settings: { ...createActiveProfile(), prehooks: ['echo root-pre'] },
    }));

    expect(root.settings.prehooks).toEqual(['echo root-pre', 'echo root-pre']);
  });

  it('merging the same fragment twice doubles list growth but not map size', () => {
    const root = makeRoot();
    const fragment = makeFragment({
      settings: {
        dots: { vim: { source: 'vim/vimrc', target: '.vimrc', ignore: [] } },
        prehooks: ['echo pre'],
        posthooks: ['echo post'],
        vars: ['fragment-vars.toml'],
      },
      profiles: { work: makeProfile() },
      import: [{ path: 'nested.toml' }],
    });

    mergeFragment(root, fragment);
    const dotsAfterFirst = Object.keys(root.settings.dots).length;
    const profilesAfterFirst = Object.keys(root.profiles).length;

    mergeFragment(root, fragment);

    expect(root.settings.prehooks).toHaveLength(3);
    expect(root.settings.posthooks).toHaveLength(3);
    expect(root.settings.vars).toHaveLength(3);
    expect(root.import).toHaveLength(3);
    expect(Object.keys(root.settings.dots)).toHaveLength(dotsAfterFirst);
    expect(Object.keys(root.profiles)).toHaveLength(profilesAfterFirst);
    expect(dotsAfterFirst).toBe(2);
    expect(profilesAfterFirst).toBe(1);
  });
});

// ---------------------------------------------------------------------------
// Map fields
// ---------------------------------------------------------------------------

describe('mergeFragment — map fields', () => {
  it('adds new dots and lets the fragment win on a key collision', () => {
    const root = makeRoot();
    mergeFragment(root, makeFragment({
      settings: {
        ...createActiveProfile(),
        dots: {
          zsh: { source: 'zsh/zshrc-alt', target: '.zshrc', ignore: ['*.bak'] },
          git: { source: 'git/gitconfig', target: '.gitconfig', ignore: [] },
        },
      },
    }));

    expect(root.settings.dots).toEqual({
      zsh: { source: 'zsh/zshrc-alt', target: '.zshrc', ignore: ['*.bak'] },
      git: { source: 'git/gitconfig', target: '.gitconfig', ignore: [] },
    });
  });

  it('replaces a colliding profile whole, without merging its fields', () => {
    const root = makeRoot();
    root.profiles['work'] = makeProfile({
      prehooks: ['echo root-work'],
      extra_profiles: ['corp'],
    });

    mergeFragment(root, makeFragment({
      profiles: { work: makeProfile({ posthooks: ['echo fragment-work'] }) },
    }));

    expect(root.profiles['work']).toEqual(makeProfile({ posthooks: ['echo fragment-work'] }));
  });

  it('the most recently merged fragment wins: A then B differs from B then A', () => {
    const fragmentA = makeFragment({
      settings: {
        ...createActiveProfile(),
        dots: { term: { source: 'a/term', target: '.term', ignore: [] } },
      },
    });
    const fragmentB = makeFragment({
      settings: {
        ...createActiveProfile(),
        dots: { term: { source: 'b/term', target: '.term', ignore: [] } },
      },
    });

    const first = makeRoot();
    mergeFragment(first, fragmentA);
    mergeFragment(first, fragmentB);

    const second = makeRoot();
    mergeFragment(second, fragmentB);
    mergeFragment(second, fragmentA);

    expect(first.settings.dots['term']?.source).toBe('b/term');
    expect(second.settings.dots['term']?.source).toBe('a/term');
  });

  it('stores a "__proto__" key as a plain entry', () => {
    const root = makeRoot();
    const dots = JSON.parse(
      '{"__proto__":{"source":"odd","target":".odd","ignore":[]}}',
    ) as ImportedFragment['settings']['dots'];

    mergeFragment(root, makeFragment({ settings: { ...createActiveProfile(), dots } }));

    expect(Object.keys(root.settings.dots)).toEqual(['zsh', '__proto__']);
    expect(Object.getPrototypeOf(root.settings.dots)).toBe(Object.prototype);
  });
});

// ---------------------------------------------------------------------------
// Untouched fields
// ---------------------------------------------------------------------------

describe('mergeFragment — root-only fields', () => {
  it('never changes dotfiles_dir or gpg_user_id', () => {
    const root = makeRoot();
    mergeFragment(root, makeFragment({
      settings: { ...createActiveProfile(), prehooks: ['echo x'] },
    }));

    expect(root.dotfiles_dir).toBe('/home/test/dotfiles');
    expect(root.gpg_user_id).toBe('test@example.com');
  });

  it('an empty fragment leaves the root equal to its previous state', () => {
    const root = makeRoot();
    mergeFragment(root, makeFragment());

    expect(root).toEqual(makeRoot());
  });
});
