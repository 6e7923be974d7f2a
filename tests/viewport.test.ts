import { describe, expect, test } from 'vitest';
import { EditorDocument } from '../core/document/document';
import { EditorView } from '../core/viewport/view';

function makeDoc(lines: number): EditorDocument {
  return new EditorDocument('/doc.txt', Array.from({ length: lines }, (_, i) => `${i}`).join('\n'));
}

describe('EditorView', () => {
  test('last line of a short document', () => {
    const view = new EditorView(20);
    expect(view.lastLine(makeDoc(5))).toBe(4);
  });

  test('last line limited by the view height', () => {
    const view = new EditorView(10, 30);
    expect(view.lastLine(makeDoc(100))).toBe(39);
    expect(view.visibleLines(makeDoc(100))).toEqual([30, 31, 32, 33, 34, 35, 36, 37, 38, 39]);
  });

  test('visible lines stop at the end of the document', () => {
    const view = new EditorView(10, 3);
    expect(view.visibleLines(makeDoc(5))).toEqual([3, 4]);
  });

  test('view scrolled past the end shows nothing', () => {
    const view = new EditorView(10, 8);
    expect(view.visibleLines(makeDoc(5))).toEqual([]);
  });

  test('ensureLineVisible scrolls down just enough', () => {
    const view = new EditorView(10);
    view.ensureLineVisible(25);
    expect(view.offset).toBe(16);
    expect(view.lastLine(makeDoc(100))).toBe(25);
  });

  test('ensureLineVisible scrolls up to the line', () => {
    const view = new EditorView(10, 40);
    view.ensureLineVisible(12);
    expect(view.offset).toBe(12);
  });

  test('ensureLineVisible does not scroll if already visible', () => {
    const view = new EditorView(10, 5);
    view.ensureLineVisible(9);
    expect(view.offset).toBe(5);
  });

  test('scrollTo and resize', () => {
    const view = new EditorView(10);
    view.scrollTo(7);
    view.resize(3);
    expect(view.visibleLines(makeDoc(20))).toEqual([7, 8, 9]);
  });

  test('rejects invalid geometry', () => {
    expect(() => new EditorView(0)).toThrow(RangeError);
    expect(() => new EditorView(5, -1)).toThrow(RangeError);
    expect(() => new EditorView(5).scrollTo(1.5)).toThrow(RangeError);
  });

  test('views get distinct ids', () => {
    expect(new EditorView(1).id).not.toBe(new EditorView(1).id);
  });
});
