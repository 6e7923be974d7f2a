/**
 * Selection ranges over buffer offsets.
 *
 * A range is defined by an anchor and a head. A selection holds one or more
 * ranges, one of which is primary; the primary range's cursor drives the
 * relative line numbering.
 */

import type { TextBuffer } from '../buffer/text-buffer';

export interface Range {
  readonly anchor: number;
  readonly head: number;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Offset of the cursor of a range. A forward range (head after anchor)
 * puts the cursor on the last selected character, not past it.
 */
export function rangeCursor(range: Range, text: string): number {
  if (range.head <= range.anchor) return range.head;

  let offset = range.head - 1;
  if (offset > 0 && isLowSurrogate(text.charCodeAt(offset))) offset--;
  return offset;
}

export function rangeFrom(range: Range): number {
  return Math.min(range.anchor, range.head);
}

export function rangeTo(range: Range): number {
  return Math.max(range.anchor, range.head);
}

export function isRangeEmpty(range: Range): boolean {
  return range.anchor === range.head;
}

export class Selection {
  readonly ranges: readonly Range[];
  readonly primaryIndex: number;

  constructor(ranges: readonly Range[], primaryIndex: number = 0) {
    if (ranges.length === 0) {
      throw new RangeError('A selection needs at least one range');
    }
    if (primaryIndex < 0 || primaryIndex >= ranges.length) {
      throw new RangeError(`Primary index ${primaryIndex} out of bounds (${ranges.length} ranges)`);
    }
    this.ranges = ranges;
    this.primaryIndex = primaryIndex;
  }

  /** A single empty range at `offset`. */
  static point(offset: number): Selection {
    return new Selection([{ anchor: offset, head: offset }]);
  }

  static single(anchor: number, head: number): Selection {
    return new Selection([{ anchor, head }]);
  }

  primary(): Range {
    return this.ranges[this.primaryIndex];
  }

  /** Line of the primary cursor. */
  primaryCursorLine(buffer: TextBuffer): number {
    return buffer.getOffsetLine(rangeCursor(this.primary(), buffer.getText()));
  }

  /** Sorted, unique lines holding a cursor of any range. */
  cursorLines(buffer: TextBuffer): number[] {
    const text = buffer.getText();
    const lines = new Set<number>();
    for (const range of this.ranges) {
      lines.add(buffer.getOffsetLine(rangeCursor(range, text)));
    }
    return [...lines].sort((a, b) => a - b);
  }

  /** Clamp every range into [0, length]. */
  clamp(length: number): Selection {
    const clampOffset = (offset: number) => Math.max(0, Math.min(offset, length));
    return new Selection(
      this.ranges.map(r => ({ anchor: clampOffset(r.anchor), head: clampOffset(r.head) })),
      this.primaryIndex,
    );
  }
}
