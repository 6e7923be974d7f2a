/**
 * Paint composed gutter rows as ANSI-styled strings for a terminal surface.
 *
 * The chalk instance is injected so the host decides the color level;
 * blink modifiers have no chalk counterpart and are not painted.
 */

import chalk, { type BackgroundColorName, type ChalkInstance, type ForegroundColorName } from 'chalk';
import { type Color, Modifier, type NamedColor, type Style, hasModifier } from '../core/graphics/style';
import type { GutterCell, GutterFrame, GutterRow } from './gutter-columns';

type PaintableColor = Exclude<NamedColor, 'reset'>;

const FOREGROUND: Record<PaintableColor, ForegroundColorName> = {
  black: 'black',
  red: 'red',
  green: 'green',
  yellow: 'yellow',
  blue: 'blue',
  magenta: 'magenta',
  cyan: 'cyan',
  gray: 'gray',
  lightRed: 'redBright',
  lightGreen: 'greenBright',
  lightYellow: 'yellowBright',
  lightBlue: 'blueBright',
  lightMagenta: 'magentaBright',
  lightCyan: 'cyanBright',
  lightGray: 'white',
  white: 'whiteBright',
};

const BACKGROUND: Record<PaintableColor, BackgroundColorName> = {
  black: 'bgBlack',
  red: 'bgRed',
  green: 'bgGreen',
  yellow: 'bgYellow',
  blue: 'bgBlue',
  magenta: 'bgMagenta',
  cyan: 'bgCyan',
  gray: 'bgGray',
  lightRed: 'bgRedBright',
  lightGreen: 'bgGreenBright',
  lightYellow: 'bgYellowBright',
  lightBlue: 'bgBlueBright',
  lightMagenta: 'bgMagentaBright',
  lightCyan: 'bgCyanBright',
  lightGray: 'bgWhite',
  white: 'bgWhiteBright',
};

function applyFg(painter: ChalkInstance, color: Color): ChalkInstance {
  if (typeof color === 'string') {
    return color === 'reset' ? painter : painter[FOREGROUND[color]];
  }
  return color.type === 'rgb' ? painter.rgb(color.r, color.g, color.b) : painter.ansi256(color.index);
}

function applyBg(painter: ChalkInstance, color: Color): ChalkInstance {
  if (typeof color === 'string') {
    return color === 'reset' ? painter : painter[BACKGROUND[color]];
  }
  return color.type === 'rgb' ? painter.bgRgb(color.r, color.g, color.b) : painter.bgAnsi256(color.index);
}

/** Chalk chain for a style: foreground, background, then modifiers. */
export function styleToChalk(style: Style, base: ChalkInstance = chalk): ChalkInstance {
  let painter = base;
  if (style.fg !== undefined) painter = applyFg(painter, style.fg);
  if (style.bg !== undefined) painter = applyBg(painter, style.bg);
  if (hasModifier(style, Modifier.BOLD)) painter = painter.bold;
  if (hasModifier(style, Modifier.DIM)) painter = painter.dim;
  if (hasModifier(style, Modifier.ITALIC)) painter = painter.italic;
  if (hasModifier(style, Modifier.UNDERLINED)) painter = painter.underline;
  if (hasModifier(style, Modifier.REVERSED)) painter = painter.inverse;
  if (hasModifier(style, Modifier.HIDDEN)) painter = painter.hidden;
  if (hasModifier(style, Modifier.CROSSED_OUT)) painter = painter.strikethrough;
  return painter;
}

export function paintCell(cell: GutterCell, base: ChalkInstance = chalk): string {
  return styleToChalk(cell.style, base)(cell.text);
}

export function paintRow(row: GutterRow, base: ChalkInstance = chalk): string {
  return row.cells.map(cell => paintCell(cell, base)).join('');
}

export function paintFrame(frame: GutterFrame, base: ChalkInstance = chalk): string[] {
  return frame.rows.map(row => paintRow(row, base));
}
