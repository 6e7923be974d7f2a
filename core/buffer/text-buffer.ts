/**
 * Read-mostly text storage for a document.
 *
 * Offsets are UTF-16 code unit positions, matching JavaScript strings.
 * Byte-based queries are provided for callers that reason about the
 * UTF-8 encoded size of the text.
 */

import { LineIndex } from './line-index';

const encoder = new TextEncoder();

function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, '\n').replace(/\r/g, '\n');
}

export class TextBuffer {
  private text: string;
  private lineIndex: LineIndex;

  constructor(initialContent: string = '') {
    this.text = normalizeLineEndings(initialContent);
    this.lineIndex = new LineIndex(this.text);
  }

  /** Replace the whole content. */
  setText(content: string): void {
    this.text = normalizeLineEndings(content);
    this.lineIndex.rebuild(this.text);
  }

  getText(): string {
    return this.text;
  }

  /** Get text within a character offset range [start, end). */
  getTextRange(start: number, end: number): string {
    return this.text.substring(start, end);
  }

  /** Get the content of a single line (without line ending). */
  getLine(lineNumber: number): string {
    if (lineNumber < 0 || lineNumber >= this.getLineCount()) return '';

    const lineStart = this.lineIndex.getLineStart(lineNumber);
    const lineEnd = lineNumber + 1 < this.getLineCount()
      ? this.lineIndex.getLineStart(lineNumber + 1) - 1 // exclude \n
      : this.getLength();

    return this.text.substring(lineStart, lineEnd);
  }

  /**
   * Total number of lines. A trailing newline opens an empty last line,
   * and an empty buffer still has one line.
   */
  getLineCount(): number {
    return this.lineIndex.lineCount;
  }

  /** Get the character offset of the start of a line. */
  getLineOffset(lineNumber: number): number {
    return this.lineIndex.getLineStart(lineNumber);
  }

  /** Get the line number for a given character offset. */
  getOffsetLine(offset: number): number {
    return this.lineIndex.getLineForOffset(offset);
  }

  /** Total number of characters in the buffer. */
  getLength(): number {
    return this.text.length;
  }

  /** Size of the text in UTF-8 bytes. */
  getByteLength(): number {
    return encoder.encode(this.text).length;
  }

  /** UTF-8 byte offset of the start of a line. */
  getLineByteOffset(lineNumber: number): number {
    const offset = this.lineIndex.getLineStart(lineNumber);
    return encoder.encode(this.text.substring(0, offset)).length;
  }

  getLineLength(lineNumber: number): number {
    return this.getLine(lineNumber).length;
  }
}
