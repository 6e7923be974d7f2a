/**
 * Colors, text modifiers and styles shared by the theme and the gutter.
 *
 * Styles are plain immutable values; every operation returns a new style.
 */

import { ThemeError } from '../errors';

export const NAMED_COLORS = [
  'reset',
  'black', 'red', 'green', 'yellow', 'blue', 'magenta', 'cyan', 'gray',
  'lightRed', 'lightGreen', 'lightYellow', 'lightBlue', 'lightMagenta', 'lightCyan', 'lightGray',
  'white',
] as const;

export type NamedColor = typeof NAMED_COLORS[number];

export interface RgbColor {
  type: 'rgb';
  r: number;
  g: number;
  b: number;
}

export interface IndexedColor {
  type: 'indexed';
  index: number;
}

export type Color = NamedColor | RgbColor | IndexedColor;

export const Modifier = {
  BOLD: 1 << 0,
  DIM: 1 << 1,
  ITALIC: 1 << 2,
  UNDERLINED: 1 << 3,
  SLOW_BLINK: 1 << 4,
  RAPID_BLINK: 1 << 5,
  REVERSED: 1 << 6,
  HIDDEN: 1 << 7,
  CROSSED_OUT: 1 << 8,
} as const;

export type ModifierFlag = typeof Modifier[keyof typeof Modifier];

/** Theme-file spelling of each modifier. */
export const MODIFIER_NAMES: Record<string, ModifierFlag> = {
  bold: Modifier.BOLD,
  dim: Modifier.DIM,
  italic: Modifier.ITALIC,
  underlined: Modifier.UNDERLINED,
  slow_blink: Modifier.SLOW_BLINK,
  rapid_blink: Modifier.RAPID_BLINK,
  reversed: Modifier.REVERSED,
  hidden: Modifier.HIDDEN,
  crossed_out: Modifier.CROSSED_OUT,
};

export interface Style {
  readonly fg?: Color;
  readonly bg?: Color;
  /** Modifiers this style turns on. */
  readonly addModifier: number;
  /** Modifiers this style turns off when patched over another. */
  readonly subModifier: number;
}

export const EMPTY_STYLE: Style = { addModifier: 0, subModifier: 0 };

export function rgb(r: number, g: number, b: number): RgbColor {
  return { type: 'rgb', r, g, b };
}

export function indexed(index: number): IndexedColor {
  return { type: 'indexed', index };
}

export function isRgb(color: Color | undefined): color is RgbColor {
  return typeof color === 'object' && color.type === 'rgb';
}

export function withFg(style: Style, fg: Color): Style {
  return { ...style, fg };
}

export function withBg(style: Style, bg: Color): Style {
  return { ...style, bg };
}

export function addModifier(style: Style, modifier: number): Style {
  return {
    ...style,
    addModifier: style.addModifier | modifier,
    subModifier: style.subModifier & ~modifier,
  };
}

export function removeModifier(style: Style, modifier: number): Style {
  return {
    ...style,
    addModifier: style.addModifier & ~modifier,
    subModifier: style.subModifier | modifier,
  };
}

export function hasModifier(style: Style, modifier: number): boolean {
  return (style.addModifier & modifier) === modifier;
}

/**
 * Layer `other` on top of `base`: colors set in `other` win, modifiers
 * accumulate and `other`'s removals cancel `base`'s additions.
 */
export function patchStyle(base: Style, other: Style): Style {
  return {
    fg: other.fg ?? base.fg,
    bg: other.bg ?? base.bg,
    addModifier: (base.addModifier & ~other.subModifier) | other.addModifier,
    subModifier: (base.subModifier & ~other.addModifier) | other.subModifier,
  };
}

/**
 * Dim a foreground for inactive markers: rgb channels are scaled to 40%
 * (rounded down); any other representation becomes gray.
 */
export function fadeColor(color: Color | undefined): Color {
  if (isRgb(color)) {
    return rgb(
      Math.floor(color.r * 0.4),
      Math.floor(color.g * 0.4),
      Math.floor(color.b * 0.4),
    );
  }
  return 'gray';
}

function isNamedColor(value: string): value is NamedColor {
  return (NAMED_COLORS as readonly string[]).includes(value);
}

/**
 * Parse a theme color: `#rrggbb`, a named color, or a key of `palette`
 * (which may itself hold either form).
 */
export function parseColor(text: string, palette: Record<string, string> = {}): Color {
  const value = text.trim();

  if (value.startsWith('#')) {
    const match = /^#([0-9a-fA-F]{2})([0-9a-fA-F]{2})([0-9a-fA-F]{2})$/.exec(value);
    if (!match) throw new ThemeError(`Malformed hex color "${text}"`);
    return rgb(parseInt(match[1], 16), parseInt(match[2], 16), parseInt(match[3], 16));
  }

  if (isNamedColor(value)) return value;

  if (Object.prototype.hasOwnProperty.call(palette, value)) {
    return parseColor(palette[value]);
  }

  throw new ThemeError(`Unknown color "${text}"`);
}
