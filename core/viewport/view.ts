/**
 * A view onto a document: which lines are on screen.
 *
 * The view scrolls by whole lines; `offset` is the first visible line and
 * `height` the number of text rows it shows.
 */

import type { EditorDocument } from '../document/document';

export type ViewId = number;

let nextViewId = 1;

export class EditorView {
  readonly id: ViewId;
  private _offset: number;
  private _height: number;

  constructor(height: number, offset: number = 0, id: ViewId = nextViewId++) {
    this.id = id;
    this._height = validateHeight(height);
    this._offset = validateOffset(offset);
  }

  get offset(): number { return this._offset; }
  get height(): number { return this._height; }

  resize(height: number): void {
    this._height = validateHeight(height);
  }

  /** Scroll so `line` is the first visible line. */
  scrollTo(line: number): void {
    this._offset = validateOffset(line);
  }

  /** Scroll the minimum amount needed to show `line`. */
  ensureLineVisible(line: number): void {
    if (line < this._offset) {
      this._offset = Math.max(0, line);
    } else if (line >= this._offset + this._height) {
      this._offset = line - this._height + 1;
    }
  }

  /** Last line of the document shown by this view. */
  lastLine(doc: EditorDocument): number {
    return Math.min(this._offset + this._height, doc.buffer.getLineCount()) - 1;
  }

  /** Document lines on screen, top to bottom. */
  visibleLines(doc: EditorDocument): number[] {
    const lines: number[] = [];
    const last = this.lastLine(doc);
    for (let line = this._offset; line <= last; line++) {
      lines.push(line);
    }
    return lines;
  }
}

function validateHeight(height: number): number {
  if (!Number.isInteger(height) || height < 1) {
    throw new RangeError(`View height must be a positive integer, got ${height}`);
  }
  return height;
}

function validateOffset(offset: number): number {
  if (!Number.isInteger(offset) || offset < 0) {
    throw new RangeError(`View offset must be a non-negative integer, got ${offset}`);
  }
  return offset;
}
