/**
 * Errors raised while building gutter state: theme construction, config
 * resolution and renderer binding. Per-line rendering never throws.
 */

/** A theme lacks a scope that a renderer requires. */
export class MissingStyleError extends Error {
  readonly scope: string;

  constructor(scope: string, themeName?: string) {
    super(themeName
      ? `Theme "${themeName}" has no style for required scope "${scope}"`
      : `Theme has no style for required scope "${scope}"`);
    this.name = 'MissingStyleError';
    this.scope = scope;
  }
}

/** The breakpoint gutter was bound to a document that is not backed by a file. */
export class MissingDocumentPathError extends Error {
  constructor() {
    super('Breakpoint gutter requires a document with a file path');
    this.name = 'MissingDocumentPathError';
  }
}

/** Malformed theme definition (bad color, unknown modifier). */
export class ThemeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ThemeError';
  }
}

/** Invalid editor configuration value. */
export class ConfigError extends Error {
  readonly key: string;

  constructor(key: string, message: string) {
    super(`Invalid config "${key}": ${message}`);
    this.name = 'ConfigError';
    this.key = key;
  }
}
