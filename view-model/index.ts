/**
 * View-model barrel export: themes, gutter renderers and composition.
 */

export {
  Theme, Scopes, DARK_THEME, LIGHT_THEME, DARK_THEME_DEFINITION, LIGHT_THEME_DEFINITION,
  type ThemeDefinition, type ScopeDefinition,
} from './theme';
export {
  type Gutter, type GutterLineRenderer, GutterOutput, Glyphs,
  diagnosticGutter, lineNumberGutter, breakpointGutter,
} from './gutter';
export {
  GutterColumns, GUTTERS,
  type GutterColumn, type GutterCell, type GutterRow, type GutterFrame,
} from './gutter-columns';
export { styleToChalk, paintCell, paintRow, paintFrame } from './ansi-painter';
