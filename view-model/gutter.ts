/**
 * Gutter renderers: diagnostic markers, line numbers, breakpoint markers.
 *
 * Each gutter is a factory run once per draw cycle. It captures what it
 * needs from the editor, document, view and theme, and returns a line
 * renderer that is then called for every visible line. The line renderer
 * appends its glyphs to `out` and returns the style to draw them with, or
 * undefined to leave the column unstyled.
 */

import type { Editor } from '../core/editor/editor';
import type { EditorDocument } from '../core/document/document';
import type { EditorView } from '../core/viewport/view';
import type { Diagnostic } from '../core/diagnostics/diagnostic';
import type { Breakpoint } from '../core/breakpoints/breakpoint-store';
import { MissingDocumentPathError } from '../core/errors';
import { Modifier, type Style, addModifier, fadeColor, withFg } from '../core/graphics/style';
import { Scopes, type Theme } from './theme';

export const Glyphs = {
  diagnostic: '●',
  emptyLastLine: '~',
  breakpointVerified: '▲',
  breakpointUnverified: '⊚',
} as const;

/** Reusable text accumulator handed to line renderers. */
export class GutterOutput {
  private _text: string = '';

  write(text: string): void {
    this._text += text;
  }

  clear(): void {
    this._text = '';
  }

  get text(): string {
    return this._text;
  }
}

export type GutterLineRenderer = (line: number, selected: boolean, out: GutterOutput) => Style | undefined;

export type Gutter = (
  editor: Editor,
  doc: EditorDocument,
  view: EditorView,
  theme: Theme,
  isFocused: boolean,
  width: number,
) => GutterLineRenderer;

/** First mark per line, in collection order. */
function indexFirstByLine<T extends { line: number }>(marks: readonly T[]): Map<number, T> {
  const byLine = new Map<number, T>();
  for (const mark of marks) {
    if (!byLine.has(mark.line)) byLine.set(mark.line, mark);
  }
  return byLine;
}

export const diagnosticGutter: Gutter = (_editor, doc, _view, theme) => {
  const warning = theme.get(Scopes.warning);
  const error = theme.get(Scopes.error);
  const info = theme.get(Scopes.info);
  const hint = theme.get(Scopes.hint);
  const diagnostics: ReadonlyMap<number, Diagnostic> = indexFirstByLine(doc.diagnostics);

  return (line, _selected, out) => {
    const diagnostic = diagnostics.get(line);
    if (!diagnostic) return undefined;

    out.write(Glyphs.diagnostic);
    switch (diagnostic.severity) {
      case 'error':
        return error;
      case 'info':
        return info;
      case 'hint':
        return hint;
      case 'warning':
      case undefined:
        return warning;
    }
  };
};

export const lineNumberGutter: Gutter = (editor, doc, view, theme, isFocused, width) => {
  const buffer = doc.buffer;
  const lastLine = view.lastLine(doc);
  // The last line only gets a number when it has content.
  const drawLast = buffer.getLineByteOffset(lastLine) < buffer.getByteLength();

  const linenr = theme.get(Scopes.lineNumber);
  const linenrSelected = theme.tryGet(Scopes.lineNumberSelected) ?? linenr;

  const currentLine = doc.selection(view.id).primaryCursorLine(buffer);
  const mode = editor.config.lineNumber;

  return (line, selected, out) => {
    if (line === lastLine && !drawLast) {
      out.write(Glyphs.emptyLastLine.padStart(width));
      return linenr;
    }

    let display: number;
    if (mode === 'relative' && line !== currentLine) {
      display = Math.abs(currentLine - line);
    } else {
      display = line + 1;
    }

    out.write(String(display).padStart(width));
    return selected && isFocused ? linenrSelected : linenr;
  };
};

/**
 * Breakpoint markers for the document's file.
 *
 * Precondition: the document has a path. Binding against a scratch
 * buffer throws MissingDocumentPathError.
 */
export const breakpointGutter: Gutter = (editor, doc, _view, theme) => {
  const warning = theme.get(Scopes.warning);
  const error = theme.get(Scopes.error);
  const info = theme.get(Scopes.info);

  if (doc.path === null) throw new MissingDocumentPathError();
  const breakpoints: ReadonlyMap<number, Breakpoint> = indexFirstByLine(editor.breakpoints.get(doc.path) ?? []);

  return (line, _selected, out) => {
    const breakpoint = breakpoints.get(line);
    if (!breakpoint) return undefined;

    const hasCondition = breakpoint.condition !== undefined;
    const hasLogMessage = breakpoint.logMessage !== undefined;

    let style: Style;
    if (hasCondition && hasLogMessage) {
      style = addModifier(error, Modifier.UNDERLINED);
    } else if (hasCondition) {
      style = error;
    } else if (hasLogMessage) {
      style = info;
    } else {
      style = warning;
    }

    if (!breakpoint.verified) {
      style = withFg(style, fadeColor(style.fg));
    }

    out.write(breakpoint.verified ? Glyphs.breakpointVerified : Glyphs.breakpointUnverified);
    return style;
  };
};
