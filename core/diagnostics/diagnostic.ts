/**
 * Document diagnostics and their intake from language servers.
 */

import type { TextBuffer } from '../buffer/text-buffer';
import type { EditorDocument } from '../document/document';
import {
  DiagnosticSeverity,
  type LspDiagnostic,
  type LspPosition,
  type PublishDiagnosticsParams,
} from '../lsp-client/protocol';

export type Severity = 'error' | 'warning' | 'info' | 'hint';

export interface Diagnostic {
  /** Zero-based line the diagnostic is reported on. */
  readonly line: number;
  /** Character offsets into the buffer, [start, end). */
  readonly range: { readonly start: number; readonly end: number };
  readonly message: string;
  /** Absent when the server sent none; styled as a warning. */
  readonly severity?: Severity;
  readonly source?: string;
  readonly code?: number | string;
}

export function severityFromLsp(severity: number | undefined): Severity | undefined {
  switch (severity) {
    case DiagnosticSeverity.Error:
      return 'error';
    case DiagnosticSeverity.Warning:
      return 'warning';
    case DiagnosticSeverity.Information:
      return 'info';
    case DiagnosticSeverity.Hint:
      return 'hint';
    default:
      return undefined;
  }
}

function positionToOffset(buffer: TextBuffer, position: LspPosition): number {
  const line = Math.max(0, Math.min(position.line, buffer.getLineCount() - 1));
  const character = Math.max(0, Math.min(position.character, buffer.getLineLength(line)));
  return buffer.getLineOffset(line) + character;
}

export function diagnosticFromLsp(diagnostic: LspDiagnostic, buffer: TextBuffer): Diagnostic {
  const severity = severityFromLsp(diagnostic.severity);
  return {
    line: diagnostic.range.start.line,
    range: {
      start: positionToOffset(buffer, diagnostic.range.start),
      end: positionToOffset(buffer, diagnostic.range.end),
    },
    message: diagnostic.message,
    ...(severity === undefined ? {} : { severity }),
    ...(diagnostic.source === undefined ? {} : { source: diagnostic.source }),
    ...(diagnostic.code === undefined ? {} : { code: diagnostic.code }),
  };
}

/** Replace a document's diagnostics with a server's publication, keeping its order. */
export function applyPublishDiagnostics(doc: EditorDocument, params: PublishDiagnosticsParams): void {
  doc.setDiagnostics(params.diagnostics.map(d => diagnosticFromLsp(d, doc.buffer)));
}
