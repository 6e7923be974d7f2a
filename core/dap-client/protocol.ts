/**
 * Debug Adapter Protocol types for breakpoint synchronization.
 *
 * Lines here are one-based (the editor initializes adapters with
 * `linesStartAt1: true`); the breakpoint store converts at the boundary.
 */

export interface Source {
  name?: string;
  path?: string;
  sourceReference?: number;
}

/** Breakpoint as requested by the editor in `setBreakpoints`. */
export interface SourceBreakpoint {
  line: number;
  column?: number;
  condition?: string;
  hitCondition?: string;
  logMessage?: string;
}

/** Breakpoint as reported back by the adapter. */
export interface DapBreakpoint {
  id?: number;
  verified: boolean;
  message?: string;
  source?: Source;
  line?: number;
  column?: number;
  endLine?: number;
  endColumn?: number;
}

export interface SetBreakpointsArguments {
  source: Source;
  breakpoints?: SourceBreakpoint[];
}

export interface SetBreakpointsResponse {
  breakpoints: DapBreakpoint[];
}

export interface BreakpointEventBody {
  reason: 'changed' | 'new' | 'removed';
  breakpoint: DapBreakpoint;
}
