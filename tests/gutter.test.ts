import { describe, expect, test } from 'vitest';
import { EditorDocument } from '../core/document/document';
import { Editor } from '../core/editor/editor';
import { Selection } from '../core/cursor/selection';
import { EditorView } from '../core/viewport/view';
import { DEFAULT_EDITOR_CONFIG, type LineNumberMode } from '../core/config/editor-config';
import type { Diagnostic, Severity } from '../core/diagnostics/diagnostic';
import type { Breakpoint } from '../core/breakpoints/breakpoint-store';
import { MissingDocumentPathError, MissingStyleError } from '../core/errors';
import { Modifier, rgb } from '../core/graphics/style';
import {
  type GutterLineRenderer,
  GutterOutput,
  breakpointGutter,
  diagnosticGutter,
  lineNumberGutter,
} from '../view-model/gutter';
import { Theme } from '../view-model/theme';

const PATH = '/src/main.ts';

const theme = Theme.fromDefinition('test', {
  scopes: {
    'ui.linenr': '#808080',
    'ui.linenr.selected': '#ffffff',
    'error': '#c83232',
    'warning': '#c8c832',
    'info': '#3232c8',
    'hint': '#32c832',
  },
});

function numberedLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i}`).join('\n');
}

function call(render: GutterLineRenderer, line: number, selected = false) {
  const out = new GutterOutput();
  const style = render(line, selected, out);
  return { text: out.text, style };
}

function diag(line: number, severity?: Severity): Diagnostic {
  const d: Diagnostic = { line, range: { start: 0, end: 0 }, message: `problem on ${line}` };
  return severity ? { ...d, severity } : d;
}

describe('diagnosticGutter', () => {
  function bind(diagnostics: Diagnostic[]) {
    const doc = new EditorDocument(PATH, numberedLines(10));
    doc.setDiagnostics(diagnostics);
    const view = new EditorView(10);
    return { doc, render: diagnosticGutter(new Editor(), doc, view, theme, true, 1) };
  }

  test('line without diagnostic emits nothing', () => {
    const { render } = bind([diag(3, 'error')]);
    expect(call(render, 2)).toEqual({ text: '', style: undefined });
  });

  test('each severity maps to its style', () => {
    const { render } = bind([diag(0, 'error'), diag(1, 'warning'), diag(2, 'info'), diag(3, 'hint')]);
    expect(call(render, 0)).toEqual({ text: '●', style: theme.get('error') });
    expect(call(render, 1)).toEqual({ text: '●', style: theme.get('warning') });
    expect(call(render, 2)).toEqual({ text: '●', style: theme.get('info') });
    expect(call(render, 3)).toEqual({ text: '●', style: theme.get('hint') });
  });

  test('missing severity is styled as a warning', () => {
    const { render } = bind([diag(4)]);
    expect(call(render, 4)).toEqual({ text: '●', style: theme.get('warning') });
  });

  test('first diagnostic on a line wins', () => {
    const { render } = bind([diag(5, 'hint'), diag(5, 'error'), diag(6, 'info')]);
    expect(call(render, 5).style).toEqual(theme.get('hint'));
  });

  test('bound renderer keeps the diagnostics it was bound with', () => {
    const { doc, render } = bind([diag(1, 'error')]);
    doc.setDiagnostics([]);
    expect(call(render, 1)).toEqual({ text: '●', style: theme.get('error') });

    const rebound = diagnosticGutter(new Editor(), doc, new EditorView(10), theme, true, 1);
    expect(call(rebound, 1)).toEqual({ text: '', style: undefined });
  });

  test('binding fails when the theme lacks a severity scope', () => {
    const partial = Theme.fromDefinition('partial', {
      scopes: { error: '#ff0000', warning: '#ffff00', info: '#0000ff' },
    });
    const doc = new EditorDocument(PATH, 'x');
    expect(() => diagnosticGutter(new Editor(), doc, new EditorView(1), partial, true, 1))
      .toThrow(MissingStyleError);
  });
});

describe('lineNumberGutter', () => {
  function bind(opts: {
    text: string;
    mode: LineNumberMode;
    cursorLine?: number;
    width?: number;
    height?: number;
    focused?: boolean;
    theme?: Theme;
  }) {
    const doc = new EditorDocument(PATH, opts.text);
    const view = new EditorView(opts.height ?? 200);
    if (opts.cursorLine !== undefined) {
      doc.setSelection(view.id, Selection.point(doc.buffer.getLineOffset(opts.cursorLine)));
    }
    const editor = new Editor({ ...DEFAULT_EDITOR_CONFIG, lineNumber: opts.mode });
    return lineNumberGutter(editor, doc, view, opts.theme ?? theme, opts.focused ?? true, opts.width ?? 3);
  }

  test('absolute mode shows line + 1 right-aligned', () => {
    const render = bind({ text: numberedLines(100), mode: 'absolute', cursorLine: 50 });
    expect(call(render, 0)).toEqual({ text: '  1', style: theme.get('ui.linenr') });
    expect(call(render, 9)).toEqual({ text: ' 10', style: theme.get('ui.linenr') });
    expect(call(render, 99)).toEqual({ text: '100', style: theme.get('ui.linenr') });
  });

  test('relative mode shows distance to the cursor line', () => {
    const render = bind({ text: numberedLines(100), mode: 'relative', cursorLine: 50 });
    expect(call(render, 10)).toEqual({ text: ' 40', style: theme.get('ui.linenr') });
    expect(call(render, 49).text).toBe('  1');
    expect(call(render, 51).text).toBe('  1');
    expect(call(render, 99).text).toBe(' 49');
  });

  test('relative mode shows the absolute number on the cursor line', () => {
    const render = bind({ text: numberedLines(100), mode: 'relative', cursorLine: 50 });
    expect(call(render, 50, true)).toEqual({ text: ' 51', style: theme.get('ui.linenr.selected') });
  });

  test('selected style requires focus', () => {
    const render = bind({ text: numberedLines(100), mode: 'relative', cursorLine: 50, focused: false });
    expect(call(render, 50, true)).toEqual({ text: ' 51', style: theme.get('ui.linenr') });
  });

  test('unselected line uses the default style while focused', () => {
    const render = bind({ text: numberedLines(10), mode: 'absolute' });
    expect(call(render, 3, false).style).toEqual(theme.get('ui.linenr'));
  });

  test('renderer writes the full number even past its width', () => {
    const render = bind({ text: numberedLines(100), mode: 'absolute', width: 2 });
    expect(call(render, 99).text).toBe('100');
  });

  test('empty last line shows a tilde in every mode', () => {
    for (const mode of ['absolute', 'relative'] as const) {
      const render = bind({ text: 'a\nb\n', mode, cursorLine: 2 });
      expect(call(render, 2, true)).toEqual({ text: '  ~', style: theme.get('ui.linenr') });
      expect(call(render, 1).text).toBe(mode === 'absolute' ? '  2' : '  1');
    }
  });

  test('empty document shows a tilde on its only line', () => {
    const render = bind({ text: '', mode: 'absolute' });
    expect(call(render, 0).text).toBe('  ~');
  });

  test('last line emptiness is measured in bytes', () => {
    const render = bind({ text: 'é\n', mode: 'absolute' });
    expect(call(render, 0).text).toBe('  1');
    expect(call(render, 1).text).toBe('  ~');
  });

  test('last visible line of a longer document keeps its number', () => {
    const render = bind({ text: numberedLines(100), mode: 'absolute', height: 10 });
    expect(call(render, 9).text).toBe(' 10');
  });

  test('forward selection puts the cursor on its last selected character', () => {
    const doc = new EditorDocument(PATH, numberedLines(10));
    const view = new EditorView(20);
    doc.setSelection(view.id, Selection.single(doc.buffer.getLineOffset(3), doc.buffer.getLineOffset(5)));
    const editor = new Editor({ ...DEFAULT_EDITOR_CONFIG, lineNumber: 'relative' });
    const render = lineNumberGutter(editor, doc, view, theme, true, 2);

    expect(call(render, 4).text).toBe(' 5');
    expect(call(render, 5).text).toBe(' 1');
  });

  test('selected style falls back to the default when the theme has none', () => {
    const plain = Theme.fromDefinition('plain', { scopes: { 'ui.linenr': 'gray' } });
    const render = bind({ text: numberedLines(5), mode: 'absolute', theme: plain });
    expect(call(render, 0, true).style).toEqual(plain.get('ui.linenr'));
  });
});

describe('breakpointGutter', () => {
  const error = theme.get('error');
  const warning = theme.get('warning');
  const info = theme.get('info');

  function bind(breakpoints: Breakpoint[] | null, bindTheme: Theme = theme) {
    const editor = new Editor();
    if (breakpoints) editor.breakpoints.set(PATH, breakpoints);
    const doc = new EditorDocument(PATH, numberedLines(20));
    return breakpointGutter(editor, doc, new EditorView(20), bindTheme, true, 1);
  }

  test('line without breakpoint emits nothing', () => {
    const render = bind([{ line: 4, verified: true }]);
    expect(call(render, 3)).toEqual({ text: '', style: undefined });
  });

  test('file without breakpoints binds to an empty list', () => {
    const render = bind(null);
    expect(call(render, 0)).toEqual({ text: '', style: undefined });
  });

  test('verified breakpoints use the undimmed style table', () => {
    const render = bind([
      { line: 0, verified: true, condition: 'x > 1', logMessage: 'x={x}' },
      { line: 1, verified: true, condition: 'x > 1' },
      { line: 2, verified: true, logMessage: 'x={x}' },
      { line: 3, verified: true },
    ]);

    expect(call(render, 0)).toEqual({
      text: '▲',
      style: { fg: rgb(200, 50, 50), addModifier: Modifier.UNDERLINED, subModifier: 0 },
    });
    expect(call(render, 1)).toEqual({ text: '▲', style: error });
    expect(call(render, 2)).toEqual({ text: '▲', style: info });
    expect(call(render, 3)).toEqual({ text: '▲', style: warning });
  });

  test('unverified breakpoints fade rgb foregrounds to 40%', () => {
    const render = bind([
      { line: 0, verified: false, condition: 'x > 1', logMessage: 'x={x}' },
      { line: 4, verified: false, condition: 'ready' },
      { line: 2, verified: false, logMessage: 'x={x}' },
      { line: 3, verified: false },
    ]);

    expect(call(render, 0)).toEqual({
      text: '⊚',
      style: { fg: rgb(80, 20, 20), addModifier: Modifier.UNDERLINED, subModifier: 0 },
    });
    expect(call(render, 4)).toEqual({ text: '⊚', style: { fg: rgb(80, 20, 20), addModifier: 0, subModifier: 0 } });
    expect(call(render, 2)).toEqual({ text: '⊚', style: { fg: rgb(20, 20, 80), addModifier: 0, subModifier: 0 } });
    expect(call(render, 3)).toEqual({ text: '⊚', style: { fg: rgb(80, 80, 20), addModifier: 0, subModifier: 0 } });
  });

  test('unverified breakpoints with a non-rgb foreground turn gray', () => {
    const named = Theme.fromDefinition('named', {
      scopes: {
        error: 'red',
        warning: { bg: '#202020' },
        info: 'blue',
      },
    });
    const render = bind([
      { line: 0, verified: false, condition: 'c' },
      { line: 1, verified: false },
      { line: 2, verified: true, condition: 'c', logMessage: 'm' },
    ], named);

    expect(call(render, 0).style).toEqual({ fg: 'gray', addModifier: 0, subModifier: 0 });
    expect(call(render, 1).style).toEqual({ fg: 'gray', bg: rgb(32, 32, 32), addModifier: 0, subModifier: 0 });
    expect(call(render, 2).style).toEqual({ fg: 'red', addModifier: Modifier.UNDERLINED, subModifier: 0 });
  });

  test('first breakpoint on a line wins', () => {
    const render = bind([
      { line: 7, verified: true, logMessage: 'first' },
      { line: 7, verified: false, condition: 'second' },
    ]);
    expect(call(render, 7)).toEqual({ text: '▲', style: info });
  });

  test('binding without a document path throws', () => {
    const doc = new EditorDocument(null, 'scratch');
    expect(() => breakpointGutter(new Editor(), doc, new EditorView(5), theme, true, 1))
      .toThrow(MissingDocumentPathError);
  });

  test('bound renderer keeps the breakpoints it was bound with', () => {
    const editor = new Editor();
    editor.breakpoints.set(PATH, [{ line: 2, verified: true }]);
    const doc = new EditorDocument(PATH, numberedLines(5));
    const render = breakpointGutter(editor, doc, new EditorView(5), theme, true, 1);

    editor.breakpoints.toggle(PATH, 2);
    expect(editor.breakpoints.get(PATH)).toEqual([]);
    expect(call(render, 2).text).toBe('▲');
  });
});
