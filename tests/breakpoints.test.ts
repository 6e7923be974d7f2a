import { describe, expect, expectTypeOf, test, vi } from 'vitest';
import { type Breakpoint, BreakpointStore } from '../core/breakpoints/breakpoint-store';

const FILE = '/project/src/main.ts';

describe('BreakpointStore', () => {
  test('get returns undefined for unknown files', () => {
    expect(new BreakpointStore().get('/unknown.ts')).toBeUndefined();
  });

  test('toggle adds an unverified breakpoint and removes it again', () => {
    const store = new BreakpointStore();
    expect(store.toggle(FILE, 10)).toBe(true);
    expect(store.get(FILE)).toEqual([{ line: 10, verified: false }]);

    expect(store.toggle(FILE, 10)).toBe(false);
    expect(store.get(FILE)).toEqual([]);
  });

  test('updates never mutate a list handed out earlier', () => {
    const store = new BreakpointStore();
    store.set(FILE, [{ line: 1, verified: false }]);
    const before = store.get(FILE);

    store.toggle(FILE, 2);
    store.applySetBreakpointsResponse(FILE, { breakpoints: [{ id: 1, verified: true }, { id: 2, verified: true }] });

    expect(before).toEqual([{ line: 1, verified: false }]);
  });

  test('clear and paths', () => {
    const store = new BreakpointStore();
    store.set('/a.ts', []);
    store.set('/b.ts', [{ line: 0, verified: true }]);
    store.clear('/a.ts');
    expect(store.paths()).toEqual(['/b.ts']);
  });

  test('source breakpoints use one-based lines', () => {
    const store = new BreakpointStore();
    store.set(FILE, [
      { line: 4, verified: false, condition: 'i > 3' },
      { line: 9, column: 2, verified: true, logMessage: 'i={i}', hitCondition: '5' },
    ]);

    expect(store.toSetBreakpointsArguments(FILE)).toEqual({
      source: { path: FILE },
      breakpoints: [
        { line: 5, condition: 'i > 3' },
        { line: 10, column: 3, hitCondition: '5', logMessage: 'i={i}' },
      ],
    });
  });

  test('setBreakpoints response is merged by index', () => {
    const store = new BreakpointStore();
    store.set(FILE, [
      { line: 4, verified: false, condition: 'i > 3' },
      { line: 9, verified: false },
    ]);

    store.applySetBreakpointsResponse(FILE, {
      breakpoints: [
        { id: 11, verified: true, line: 5 },
        { id: 12, verified: false, line: 12, message: 'moved to next statement' },
      ],
    });

    expect(store.get(FILE)).toEqual([
      { id: 11, line: 4, verified: true, condition: 'i > 3' },
      { id: 12, line: 11, verified: false, message: 'moved to next statement' },
    ]);
  });

  test('mismatched response length is logged and the rest left alone', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new BreakpointStore();
    store.set(FILE, [{ line: 1, verified: false }, { line: 2, verified: false }]);

    store.applySetBreakpointsResponse(FILE, { breakpoints: [{ id: 1, verified: true }] });

    expect(store.get(FILE)).toEqual([
      { id: 1, line: 1, verified: true },
      { line: 2, verified: false },
    ]);
    expect(warn).toHaveBeenCalledWith(
      '[breakpoints]',
      `setBreakpoints for ${FILE} returned 1 results for 2 breakpoints`,
    );
  });

  test('changed event updates the breakpoint with that id', () => {
    const store = new BreakpointStore();
    store.set('/other.ts', [{ id: 3, line: 0, verified: true }]);
    store.set(FILE, [{ id: 7, line: 2, verified: false }]);

    store.applyBreakpointEvent({ reason: 'changed', breakpoint: { id: 7, verified: true, line: 4 } });

    expect(store.get(FILE)).toEqual([{ id: 7, line: 3, verified: true }]);
    expect(store.get('/other.ts')).toEqual([{ id: 3, line: 0, verified: true }]);
  });

  test('removed event drops the breakpoint', () => {
    const store = new BreakpointStore();
    store.set(FILE, [{ id: 7, line: 2, verified: true }, { id: 8, line: 5, verified: true }]);

    store.applyBreakpointEvent({ reason: 'removed', breakpoint: { id: 7, verified: true } });

    expect(store.get(FILE)).toEqual([{ id: 8, line: 5, verified: true }]);
  });

  test('events without an id are ignored', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const store = new BreakpointStore();
    store.set(FILE, [{ id: 7, line: 2, verified: false }]);

    store.applyBreakpointEvent({ reason: 'changed', breakpoint: { verified: true } });

    expect(store.get(FILE)).toEqual([{ id: 7, line: 2, verified: false }]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('stored breakpoints are read-only', () => {
    expectTypeOf<Breakpoint>().toEqualTypeOf<Readonly<Breakpoint>>();

    const store = new BreakpointStore();
    store.set(FILE, [{ line: 3, verified: false }]);
    const before = store.get(FILE);
    store.applySetBreakpointsResponse(FILE, { breakpoints: [{ id: 4, verified: true }] });

    expect(before?.[0]).toEqual({ line: 3, verified: false });
    expect(store.get(FILE)?.[0]).toEqual({ id: 4, line: 3, verified: true });
  });
});
