/**
 * Editor-wide state the gutter reads: configuration and the breakpoint store.
 */

import { BreakpointStore } from '../breakpoints/breakpoint-store';
import { DEFAULT_EDITOR_CONFIG, type EditorConfig, resolveEditorConfig } from '../config/editor-config';

export class Editor {
  readonly breakpoints: BreakpointStore;
  private _config: EditorConfig;

  constructor(config: EditorConfig = DEFAULT_EDITOR_CONFIG, breakpoints: BreakpointStore = new BreakpointStore()) {
    this._config = config;
    this.breakpoints = breakpoints;
  }

  /** Build an editor from an untrusted partial config object. */
  static fromRawConfig(raw: unknown): Editor {
    return new Editor(resolveEditorConfig(raw));
  }

  get config(): EditorConfig {
    return this._config;
  }

  setConfig(config: EditorConfig): void {
    this._config = config;
  }
}
