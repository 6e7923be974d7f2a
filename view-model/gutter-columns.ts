/**
 * Gutter composition: the ordered columns of a view's gutter and the
 * per-frame pass that binds them and renders every visible row.
 */

import type { EditorConfig, GutterType } from '../core/config/editor-config';
import type { EditorDocument } from '../core/document/document';
import type { Editor } from '../core/editor/editor';
import type { EditorView } from '../core/viewport/view';
import { fitToWidth } from '../core/graphics/char-width';
import { EMPTY_STYLE, type Style, patchStyle } from '../core/graphics/style';
import { makeLogger } from '../core/logging/logger';
import {
  type Gutter,
  GutterOutput,
  breakpointGutter,
  diagnosticGutter,
  lineNumberGutter,
} from './gutter';
import { Scopes, type Theme } from './theme';

const log = makeLogger('gutter');

export interface GutterColumn {
  name: string;
  gutter: Gutter;
  /** Display columns reserved for this gutter. */
  width: number;
}

export interface GutterCell {
  column: string;
  /** Exactly `width` display cells wide; graphemes are never split. */
  text: string;
  style: Style;
}

export interface GutterRow {
  line: number;
  /** A cursor sits on this line. */
  selected: boolean;
  cells: GutterCell[];
  text: string;
  /** First style any renderer returned for this row, else the gutter base style. */
  style: Style;
}

export interface GutterFrame {
  width: number;
  rows: GutterRow[];
}

export const GUTTERS: Record<GutterType, Gutter> = {
  'diagnostics': diagnosticGutter,
  'line-numbers': lineNumberGutter,
  'breakpoints': breakpointGutter,
};

export class GutterColumns {
  private _columns: GutterColumn[] = [];

  static fromConfig(config: EditorConfig): GutterColumns {
    const columns = new GutterColumns();
    for (const entry of config.gutters) {
      columns.add(entry.type, GUTTERS[entry.type], entry.width);
    }
    return columns;
  }

  get columns(): readonly GutterColumn[] {
    return this._columns;
  }

  get totalWidth(): number {
    return this._columns.reduce((sum, c) => sum + c.width, 0);
  }

  add(name: string, gutter: Gutter, width: number): void {
    if (!Number.isInteger(width) || width < 1) {
      throw new RangeError(`Gutter "${name}" width must be a positive integer, got ${width}`);
    }
    this._columns.push({ name, gutter, width });
  }

  /** Remove every column called `name`. */
  remove(name: string): boolean {
    const before = this._columns.length;
    this._columns = this._columns.filter(c => c.name !== name);
    return this._columns.length !== before;
  }

  /**
   * Render the gutter for every visible line of `view`. Binding errors
   * (missing theme scopes, a path-less document under the breakpoint
   * column) propagate before any row is produced.
   */
  render(
    editor: Editor,
    doc: EditorDocument,
    view: EditorView,
    theme: Theme,
    isFocused: boolean,
  ): GutterFrame {
    const bound = this._columns.map(column => ({
      column,
      render: column.gutter(editor, doc, view, theme, isFocused, column.width),
    }));
    log.debug(`bound ${bound.length} gutter column(s) for view ${view.id}`);

    const base = theme.tryGet(Scopes.gutter) ?? EMPTY_STYLE;
    const selectedLines = new Set(doc.selection(view.id).cursorLines(doc.buffer));
    const out = new GutterOutput();
    const rows: GutterRow[] = [];

    for (const line of view.visibleLines(doc)) {
      const selected = selectedLines.has(line);
      const cells: GutterCell[] = [];
      let rowStyle: Style | undefined;

      for (const { column, render } of bound) {
        out.clear();
        const style = render(line, selected, out);
        if (style && !rowStyle) rowStyle = style;
        cells.push({
          column: column.name,
          text: fitToWidth(out.text, column.width),
          style: style ? patchStyle(base, style) : base,
        });
      }

      rows.push({
        line,
        selected,
        cells,
        text: cells.map(c => c.text).join(''),
        style: rowStyle ? patchStyle(base, rowStyle) : base,
      });
    }

    return { width: this.totalWidth, rows };
  }
}
