/**
 * Theme system: named scopes resolved to styles.
 *
 * A theme is built from a plain definition (a palette plus scope entries)
 * and validated once, so renderers only ever see resolved styles.
 */

import { MissingStyleError, ThemeError } from '../core/errors';
import {
  EMPTY_STYLE,
  MODIFIER_NAMES,
  type Style,
  addModifier,
  parseColor,
  withBg,
  withFg,
} from '../core/graphics/style';

/** Scopes read by the gutter. */
export const Scopes = {
  gutter: 'ui.gutter',
  lineNumber: 'ui.linenr',
  lineNumberSelected: 'ui.linenr.selected',
  error: 'error',
  warning: 'warning',
  info: 'info',
  hint: 'hint',
} as const;

export interface ScopeDefinition {
  fg?: string;
  bg?: string;
  modifiers?: string[];
}

export interface ThemeDefinition {
  /** Named colors that scope entries may refer to. */
  palette?: Record<string, string>;
  /** A bare string is shorthand for `{ fg }`. */
  scopes: Record<string, string | ScopeDefinition>;
}

export class Theme {
  readonly name: string;
  private readonly styles: ReadonlyMap<string, Style>;

  constructor(name: string, styles: ReadonlyMap<string, Style>) {
    this.name = name;
    this.styles = styles;
  }

  static fromDefinition(name: string, definition: ThemeDefinition): Theme {
    const palette = definition.palette ?? {};
    const styles = new Map<string, Style>();

    for (const [scope, entry] of Object.entries(definition.scopes)) {
      try {
        styles.set(scope, resolveScope(entry, palette));
      } catch (err) {
        if (err instanceof ThemeError) {
          throw new ThemeError(`Theme "${name}", scope "${scope}": ${err.message}`);
        }
        throw err;
      }
    }

    return new Theme(name, styles);
  }

  /** Style of a required scope. */
  get(scope: string): Style {
    const style = this.styles.get(scope);
    if (!style) throw new MissingStyleError(scope, this.name);
    return style;
  }

  /** Style of an optional scope; exact match only. */
  tryGet(scope: string): Style | undefined {
    return this.styles.get(scope);
  }
}

function resolveScope(entry: string | ScopeDefinition, palette: Record<string, string>): Style {
  if (typeof entry === 'string') {
    return withFg(EMPTY_STYLE, parseColor(entry, palette));
  }

  let style = EMPTY_STYLE;
  if (entry.fg !== undefined) style = withFg(style, parseColor(entry.fg, palette));
  if (entry.bg !== undefined) style = withBg(style, parseColor(entry.bg, palette));
  for (const name of entry.modifiers ?? []) {
    if (!Object.prototype.hasOwnProperty.call(MODIFIER_NAMES, name)) {
      throw new ThemeError(`Unknown modifier "${name}"`);
    }
    style = addModifier(style, MODIFIER_NAMES[name]);
  }
  return style;
}

/** Dark theme (default, similar to One Dark Pro). */
export const DARK_THEME_DEFINITION: ThemeDefinition = {
  palette: {
    background: '#1e1e1e',
    foreground: '#d4d4d4',
    muted: '#858585',
    crimson: '#f44747',
    amber: '#cca700',
    azure: '#3794ff',
    slate: '#6e7681',
  },
  scopes: {
    'ui.background': { bg: 'background' },
    'ui.text': 'foreground',
    'ui.gutter': { bg: 'background' },
    'ui.linenr': 'muted',
    'ui.linenr.selected': { fg: 'foreground', modifiers: ['bold'] },
    'error': 'crimson',
    'warning': 'amber',
    'info': 'azure',
    'hint': 'slate',
  },
};

/** Light theme (similar to GitHub Light). */
export const LIGHT_THEME_DEFINITION: ThemeDefinition = {
  palette: {
    background: '#ffffff',
    foreground: '#24292e',
    muted: '#959da5',
    crimson: '#cb2431',
    orange: '#e36209',
    azure: '#0366d6',
    violet: '#6f42c1',
  },
  scopes: {
    'ui.background': { bg: 'background' },
    'ui.text': 'foreground',
    'ui.gutter': { bg: 'background' },
    'ui.linenr': 'muted',
    'ui.linenr.selected': 'foreground',
    'error': 'crimson',
    'warning': 'orange',
    'info': 'azure',
    'hint': 'violet',
  },
};

export const DARK_THEME = Theme.fromDefinition('dark', DARK_THEME_DEFINITION);
export const LIGHT_THEME = Theme.fromDefinition('light', LIGHT_THEME_DEFINITION);
