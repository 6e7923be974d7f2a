/**
 * Minimal gutter example.
 *
 * Opens a document with a few diagnostics and breakpoints and prints its
 * gutter next to the text, once with absolute and once with relative
 * line numbers.
 *
 *   npm run example
 */

import chalk from 'chalk';
import { EditorDocument } from '../../core/document/document';
import { Editor } from '../../core/editor/editor';
import { Selection } from '../../core/cursor/selection';
import { EditorView } from '../../core/viewport/view';
import { applyPublishDiagnostics } from '../../core/diagnostics/diagnostic';
import { resolveEditorConfig } from '../../core/config/editor-config';
import { GutterColumns } from '../../view-model/gutter-columns';
import { paintRow, styleToChalk } from '../../view-model/ansi-painter';
import { DARK_THEME } from '../../view-model/theme';

const sampleCode = `function greet(name: string): string {
  return \`Hello, \${name}!\`;
}

const result = greet("World");
console.log(result);
`;

const path = '/tmp/example.ts';
const doc = new EditorDocument(path, sampleCode);
const view = new EditorView(10);

// Cursor on `const result`
doc.setSelection(view.id, Selection.point(doc.buffer.getLineOffset(4)));

applyPublishDiagnostics(doc, {
  uri: `file://${path}`,
  diagnostics: [
    { range: { start: { line: 1, character: 9 }, end: { line: 1, character: 14 } }, severity: 1, message: 'unterminated template' },
    { range: { start: { line: 5, character: 0 }, end: { line: 5, character: 7 } }, message: 'no console' },
  ],
});

const config = resolveEditorConfig({
  gutters: [
    { type: 'diagnostics', width: 1 },
    { type: 'breakpoints', width: 1 },
    { type: 'line-numbers', width: 4 },
  ],
});

const editor = new Editor(config);
editor.breakpoints.set(path, [
  { line: 1, verified: true },
  { line: 4, verified: false, condition: 'name === ""' },
]);

const text = styleToChalk(DARK_THEME.get('ui.text'), chalk);

for (const mode of ['absolute', 'relative'] as const) {
  editor.setConfig({ ...config, lineNumber: mode });
  const frame = GutterColumns.fromConfig(editor.config).render(editor, doc, view, DARK_THEME, true);

  console.log(`--- ${mode} ---`);
  for (const row of frame.rows) {
    console.log(`${paintRow(row, chalk)} ${text(doc.buffer.getLine(row.line))}`);
  }
}
