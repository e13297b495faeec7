// ============================================================================
// Settings Overrides
// ============================================================================

import { validateOnto, overridesToDocument, type SettingsOverrides } from './loader.js';
import type { Settings } from './schema.js';

/**
 * Derive a new resolved tree from `base` with dotted-path overrides applied.
 * `base` is left untouched; on failure nothing is derived. Secrets already
 * resolved in `base` are not read again.
 *
 * @throws ValidationError / ResolutionError from re-validation
 */
export function applyOverrides(base: Settings, overrides: SettingsOverrides): Settings {
  const doc = overridesToDocument(overrides);
  if (Object.keys(doc).length === 0) {
    return base;
  }
  return validateOnto(base, doc);
}
