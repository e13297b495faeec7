// ============================================================================
// Settings Context
// ============================================================================
// The resolved settings in effect for a unit of work. Backed by
// AsyncLocalStorage, so every async call chain (one MCP request, one CLI
// invocation) sees its own scope and anything it spawns inherits it.
//
//   const ctx = new SettingsContext(baseline);
//   await ctx.withOverrides({ 'dremio.pat': token }, () => handle(request));
//
// Leaving a scope, by return, throw or abort, restores the enclosing tree
// because the enclosing store was never modified.
// ============================================================================

import { AsyncLocalStorage } from 'async_hooks';
import { applyOverrides } from './overrides.js';
import type { SettingsOverrides } from './loader.js';
import type { Settings } from './schema.js';

export class SettingsContext {
  private readonly storage = new AsyncLocalStorage<Settings>();
  private baseline: Settings;

  constructor(baseline: Settings) {
    this.baseline = baseline;
  }

  /** Settings in effect for the caller's unit of work */
  current(): Settings {
    return this.storage.getStore() ?? this.baseline;
  }

  /** Process-wide settings used outside any scope */
  getBaseline(): Settings {
    return this.baseline;
  }

  /**
   * Replace the process-wide settings (e.g. after a config reload).
   * Scopes already running keep the tree they entered with.
   */
  setBaseline(settings: Settings): void {
    this.baseline = settings;
  }

  /** Run `fn` with `settings` installed as current */
  runWith<T>(settings: Settings, fn: () => T): T {
    return this.storage.run(settings, fn);
  }

  /**
   * Run `fn` with overrides layered on the current settings. Nested calls
   * accumulate; the innermost value wins for a given path.
   *
   * @throws ValidationError / ResolutionError before `fn` runs if the
   *   overrides do not validate; the current scope is unchanged
   */
  withOverrides<T>(overrides: SettingsOverrides, fn: () => T): T {
    const derived = applyOverrides(this.current(), overrides);
    return this.storage.run(derived, fn);
  }
}
