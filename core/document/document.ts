/**
 * EditorDocument: path, buffer, version, diagnostics and per-view selections.
 *
 * State is replaced rather than mutated in place: the diagnostics array a
 * renderer captured during one draw cycle is never changed under it.
 */

import { TextBuffer } from '../buffer/text-buffer';
import { Selection } from '../cursor/selection';
import type { Diagnostic } from '../diagnostics/diagnostic';
import type { ViewId } from '../viewport/view';

export class EditorDocument {
  /** Backing file path, or null for a scratch buffer. */
  readonly path: string | null;
  readonly buffer: TextBuffer;

  private _version: number = 0;
  private _diagnostics: readonly Diagnostic[] = [];
  private _selections: Map<ViewId, Selection> = new Map();

  constructor(path: string | null, content: string = '') {
    this.path = path;
    this.buffer = new TextBuffer(content);
  }

  get version(): number {
    return this._version;
  }

  get diagnostics(): readonly Diagnostic[] {
    return this._diagnostics;
  }

  setDiagnostics(diagnostics: readonly Diagnostic[]): void {
    this._diagnostics = [...diagnostics];
  }

  /**
   * Selection of a view. A view that never set one sees a cursor at the
   * start of the document.
   */
  selection(viewId: ViewId): Selection {
    return this._selections.get(viewId) ?? Selection.point(0);
  }

  setSelection(viewId: ViewId, selection: Selection): void {
    this._selections.set(viewId, selection.clamp(this.buffer.getLength()));
  }

  /** Views that have a selection in this document. */
  viewIds(): ViewId[] {
    return [...this._selections.keys()];
  }

  /**
   * Replace the content. Selections are clamped to the new text and
   * diagnostics, which referred to the old text, are dropped.
   */
  setText(content: string): void {
    this.buffer.setText(content);
    this._version++;
    this._diagnostics = [];
    const length = this.buffer.getLength();
    for (const [viewId, selection] of this._selections) {
      this._selections.set(viewId, selection.clamp(length));
    }
  }
}
