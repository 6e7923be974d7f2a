/**
 * Core barrel export: re-exports all public APIs from core/.
 */

// Buffer
export { TextBuffer } from './buffer/text-buffer';
export { LineIndex } from './buffer/line-index';

// Cursor
export {
  type Range, Selection,
  rangeCursor, rangeFrom, rangeTo, isRangeEmpty,
} from './cursor/selection';

// Document
export { EditorDocument } from './document/document';

// Diagnostics
export {
  type Diagnostic, type Severity,
  severityFromLsp, diagnosticFromLsp, applyPublishDiagnostics,
} from './diagnostics/diagnostic';
export {
  DiagnosticSeverity,
  type LspDiagnostic, type LspPosition, type LspRange, type PublishDiagnosticsParams,
} from './lsp-client/protocol';

// Breakpoints
export { BreakpointStore, type Breakpoint } from './breakpoints/breakpoint-store';
export type {
  DapBreakpoint, SourceBreakpoint, SetBreakpointsArguments,
  SetBreakpointsResponse, BreakpointEventBody,
} from './dap-client/protocol';

// Viewport
export { EditorView, type ViewId } from './viewport/view';

// Editor / config
export { Editor } from './editor/editor';
export {
  type EditorConfig, type GutterColumnConfig, type GutterType, type LineNumberMode,
  DEFAULT_EDITOR_CONFIG, GUTTER_TYPES, resolveEditorConfig,
} from './config/editor-config';

// Graphics
export {
  type Color, type NamedColor, type RgbColor, type IndexedColor, type Style, type ModifierFlag,
  NAMED_COLORS, Modifier, MODIFIER_NAMES, EMPTY_STYLE,
  rgb, indexed, isRgb, withFg, withBg, addModifier, removeModifier, hasModifier,
  patchStyle, fadeColor, parseColor,
} from './graphics/style';
export { getCharWidth, getGraphemeWidth, getDisplayWidth, fitToWidth } from './graphics/char-width';

// Errors / logging
export { MissingStyleError, MissingDocumentPathError, ThemeError, ConfigError } from './errors';
export { type Logger, type LogLevel, makeLogger, setLogLevel, getLogLevel } from './logging/logger';
