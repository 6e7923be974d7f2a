/**
 * Editor configuration consumed by the gutter: numbering mode and the
 * ordered list of gutter columns with their widths.
 */

import { ConfigError } from '../errors';
import { makeLogger } from '../logging/logger';

const log = makeLogger('config');

export type LineNumberMode = 'absolute' | 'relative';

export const GUTTER_TYPES = ['diagnostics', 'line-numbers', 'breakpoints'] as const;

export type GutterType = typeof GUTTER_TYPES[number];

export interface GutterColumnConfig {
  type: GutterType;
  /** Display columns reserved for this gutter. */
  width: number;
}

export interface EditorConfig {
  lineNumber: LineNumberMode;
  gutters: readonly GutterColumnConfig[];
}

export const DEFAULT_EDITOR_CONFIG: EditorConfig = {
  lineNumber: 'absolute',
  gutters: [
    { type: 'diagnostics', width: 1 },
    { type: 'line-numbers', width: 5 },
  ],
};

const KNOWN_KEYS = new Set<string>(['lineNumber', 'gutters']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isGutterType(value: unknown): value is GutterType {
  return typeof value === 'string' && (GUTTER_TYPES as readonly string[]).includes(value);
}

function parseLineNumber(value: unknown): LineNumberMode {
  if (value === 'absolute' || value === 'relative') return value;
  throw new ConfigError('lineNumber', `expected "absolute" or "relative", got ${JSON.stringify(value)}`);
}

function parseGutters(value: unknown): GutterColumnConfig[] {
  if (!Array.isArray(value)) {
    throw new ConfigError('gutters', 'expected an array');
  }

  return value.map((entry: unknown, i) => {
    const key = `gutters[${i}]`;
    if (!isRecord(entry)) {
      throw new ConfigError(key, 'expected an object with "type" and "width"');
    }
    if (!isGutterType(entry.type)) {
      throw new ConfigError(`${key}.type`, `expected one of ${GUTTER_TYPES.join(', ')}`);
    }
    const width = entry.width;
    if (typeof width !== 'number' || !Number.isInteger(width) || width < 1) {
      throw new ConfigError(`${key}.width`, 'expected a positive integer');
    }
    return { type: entry.type, width };
  });
}

/**
 * Merge a partial, untrusted config object over the defaults.
 * `undefined` or `null` yields the defaults.
 */
export function resolveEditorConfig(raw: unknown): EditorConfig {
  if (raw === undefined || raw === null) return DEFAULT_EDITOR_CONFIG;
  if (!isRecord(raw)) {
    throw new ConfigError('(root)', 'expected an object');
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) log.warn(`Ignoring unknown config key "${key}"`);
  }

  return {
    lineNumber: raw.lineNumber === undefined
      ? DEFAULT_EDITOR_CONFIG.lineNumber
      : parseLineNumber(raw.lineNumber),
    gutters: raw.gutters === undefined
      ? DEFAULT_EDITOR_CONFIG.gutters
      : parseGutters(raw.gutters),
  };
}
