/**
 * dotfold Settings — Load Result and Error Types
 *
 * Every settings operation that can fail returns a LoadResult instead of
 * throwing. Root-level failures abort a load and reach the caller as a
 * single SettingsError; import-level failures never become a SettingsError
 * (they are reported through a DiagnosticSink).
 */

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * A root-level settings failure, discriminated by `code`.
 *
 * `message` is always a complete, printable sentence.
 */
export type SettingsError =
  | { readonly code: 'CONFIG_DIR_NOT_FOUND'; readonly message: string }
  | { readonly code: 'HOME_NOT_FOUND'; readonly message: string }
  | { readonly code: 'CONFIG_NOT_FOUND'; readonly message: string; readonly path: string }
  | {
      readonly code: 'CONFIG_READ_ERROR';
      readonly message: string;
      readonly path: string;
      readonly cause: Error;
    }
  | {
      readonly code: 'CONFIG_FORMAT_ERROR';
      readonly message: string;
      readonly path: string;
      readonly detail: string;
    }
  | { readonly code: 'DOTFILES_DIR_MISSING'; readonly message: string; readonly path: string };

export type SettingsErrorCode = SettingsError['code'];

/**
 * Result of a settings operation.
 * A discriminated union: either the value or a structured error.
 */
export type LoadResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: SettingsError };

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function configDirNotFound(filename: string): SettingsError {
  return {
    code: 'CONFIG_DIR_NOT_FOUND',
    message: `Unable to find \`$XDG_CONFIG_HOME/${filename}\``,
  };
}

export function homeNotFound(): SettingsError {
  return { code: 'HOME_NOT_FOUND', message: '$HOME directory not found' };
}

export function configNotFound(path: string): SettingsError {
  return {
    code: 'CONFIG_NOT_FOUND',
    message: `Unable to find dotfold config file ${path}`,
    path,
  };
}

export function configReadError(path: string, cause: Error): SettingsError {
  return {
    code: 'CONFIG_READ_ERROR',
    message: `Unable to read config file ${path}: ${cause.message}`,
    path,
    cause,
  };
}

export function configFormatError(path: string, detail: string): SettingsError {
  return {
    code: 'CONFIG_FORMAT_ERROR',
    message: `Config format error : ${detail}`,
    path,
    detail,
  };
}

export function dotfilesDirMissing(path: string): SettingsError {
  return {
    code: 'DOTFILES_DIR_MISSING',
    message: `Dotfiles directory ${path} does not exist`,
    path,
  };
}

/** Printable form of a settings error. */
export function formatSettingsError(error: SettingsError): string {
  return error.message;
}
