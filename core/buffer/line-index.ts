/**
 * Line-start-offset index.
 *
 * Maps line numbers to character offsets and back. Rebuilt from the full
 * text whenever the buffer content is replaced.
 */

export class LineIndex {
  /**
   * Line start offsets. lineStarts[i] = character offset of the start of line i.
   * lineStarts[0] is always 0.
   */
  private lineStarts: number[];

  constructor(text: string = '') {
    this.lineStarts = [0];
    this.rebuild(text);
  }

  /** Total number of lines. */
  get lineCount(): number {
    return this.lineStarts.length;
  }

  /** Get the character offset of the start of a line. */
  getLineStart(lineNumber: number): number {
    if (lineNumber < 0) return 0;
    if (lineNumber >= this.lineStarts.length) {
      return this.lineStarts[this.lineStarts.length - 1];
    }
    return this.lineStarts[lineNumber];
  }

  /** Get the line number for a given character offset. */
  getLineForOffset(offset: number): number {
    if (offset <= 0) return 0;

    let lo = 0;
    let hi = this.lineStarts.length - 1;
    while (lo < hi) {
      const mid = (lo + hi + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }
    return lo;
  }

  /** Rebuild the index by scanning for line breaks. */
  rebuild(text: string): void {
    this.lineStarts = [0];
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 10) {
        this.lineStarts.push(i + 1);
      }
    }
  }

  getLineStarts(): readonly number[] {
    return this.lineStarts;
  }
}
