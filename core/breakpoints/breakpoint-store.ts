/**
 * Breakpoints per source file, kept in sync with a debug adapter.
 *
 * Lines are zero-based here and one-based on the wire. Every update
 * replaces the per-file array, so a list handed out earlier is a stable
 * snapshot.
 */

import { makeLogger } from '../logging/logger';
import type {
  BreakpointEventBody,
  DapBreakpoint,
  SetBreakpointsArguments,
  SetBreakpointsResponse,
  SourceBreakpoint,
} from '../dap-client/protocol';

const log = makeLogger('breakpoints');

export interface Breakpoint {
  /** Adapter-assigned id, present once the adapter has reported on it. */
  readonly id?: number;
  /** Confirmed by the debug adapter. */
  readonly verified: boolean;
  readonly message?: string;
  readonly line: number;
  readonly column?: number;
  readonly condition?: string;
  readonly hitCondition?: string;
  readonly logMessage?: string;
}

export class BreakpointStore {
  private _byPath: Map<string, readonly Breakpoint[]> = new Map();

  /** Breakpoints for a file, in insertion order; undefined if none were ever set. */
  get(path: string): readonly Breakpoint[] | undefined {
    return this._byPath.get(path);
  }

  set(path: string, breakpoints: readonly Breakpoint[]): void {
    this._byPath.set(path, [...breakpoints]);
  }

  clear(path: string): void {
    this._byPath.delete(path);
  }

  paths(): string[] {
    return [...this._byPath.keys()];
  }

  /**
   * Remove the first breakpoint on `line`, or add an unverified one.
   * @returns true if a breakpoint was added.
   */
  toggle(path: string, line: number): boolean {
    const existing = this._byPath.get(path) ?? [];
    const idx = existing.findIndex(b => b.line === line);

    if (idx !== -1) {
      this._byPath.set(path, [...existing.slice(0, idx), ...existing.slice(idx + 1)]);
      return false;
    }

    this._byPath.set(path, [...existing, { line, verified: false }]);
    return true;
  }

  /** Arguments of a `setBreakpoints` request for a file. */
  toSetBreakpointsArguments(path: string): SetBreakpointsArguments {
    return {
      source: { path },
      breakpoints: this.toSourceBreakpoints(path),
    };
  }

  toSourceBreakpoints(path: string): SourceBreakpoint[] {
    return (this._byPath.get(path) ?? []).map(b => {
      const source: SourceBreakpoint = { line: b.line + 1 };
      if (b.column !== undefined) source.column = b.column + 1;
      if (b.condition !== undefined) source.condition = b.condition;
      if (b.hitCondition !== undefined) source.hitCondition = b.hitCondition;
      if (b.logMessage !== undefined) source.logMessage = b.logMessage;
      return source;
    });
  }

  /**
   * Merge an adapter's `setBreakpoints` response. The adapter answers in
   * request order, so results are matched by index.
   */
  applySetBreakpointsResponse(path: string, response: SetBreakpointsResponse): void {
    const existing = this._byPath.get(path) ?? [];
    if (response.breakpoints.length !== existing.length) {
      log.warn(
        `setBreakpoints for ${path} returned ${response.breakpoints.length} results`
        + ` for ${existing.length} breakpoints`,
      );
    }

    this._byPath.set(path, existing.map((b, i) => {
      const reported = response.breakpoints[i];
      return reported ? mergeReported(b, reported) : b;
    }));
  }

  /** Apply a `breakpoint` event from the adapter. */
  applyBreakpointEvent(body: BreakpointEventBody): void {
    const id = body.breakpoint.id;
    if (id === undefined) {
      log.warn(`Ignoring "${body.reason}" breakpoint event without an id`);
      return;
    }

    for (const [path, breakpoints] of this._byPath) {
      const idx = breakpoints.findIndex(b => b.id === id);
      if (idx === -1) continue;

      if (body.reason === 'removed') {
        this._byPath.set(path, breakpoints.filter((_, i) => i !== idx));
      } else {
        this._byPath.set(path, breakpoints.map((b, i) => (
          i === idx ? mergeReported(b, body.breakpoint) : b
        )));
      }
      return;
    }

    log.debug(`No breakpoint with id ${id} for "${body.reason}" event`);
  }
}

function mergeReported(breakpoint: Breakpoint, reported: DapBreakpoint): Breakpoint {
  return {
    ...breakpoint,
    verified: reported.verified,
    ...(reported.id === undefined ? {} : { id: reported.id }),
    ...(reported.message === undefined ? {} : { message: reported.message }),
    ...(reported.line === undefined ? {} : { line: reported.line - 1 }),
    ...(reported.column === undefined ? {} : { column: reported.column - 1 }),
  };
}
