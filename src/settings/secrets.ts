// ============================================================================
// Secret References
// ============================================================================
// A secret-shaped setting is either the literal value or `@<path>`, in which
// case the value is the content of that file. Files are read on every
// resolution so a rotated secret is picked up without a restart.
// ============================================================================

import { readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { ResolutionError, errorMessage } from '../errors.js';

export const SECRET_REFERENCE_PREFIX = '@';

export function isSecretReference(raw: string): boolean {
  return raw.startsWith(SECRET_REFERENCE_PREFIX);
}

export function expandHome(p: string): string {
  if (p === '~') return homedir();
  if (p.startsWith('~/')) return join(homedir(), p.slice(2));
  return p;
}

/**
 * Resolve a secret-shaped value to its literal form.
 *
 * @param field - dotted settings path, used in the error only
 */
export function resolveSecret(field: string, raw: string): string {
  if (!isSecretReference(raw)) {
    return raw;
  }

  const refPath = raw.slice(SECRET_REFERENCE_PREFIX.length);
  if (refPath.length === 0) {
    throw new ResolutionError(field, refPath, 'empty path');
  }

  try {
    return readFileSync(expandHome(refPath), 'utf-8').trimEnd();
  } catch (err) {
    const reason = err instanceof Error && 'code' in err && typeof err.code === 'string'
      ? err.code
      : errorMessage(err);
    throw new ResolutionError(field, refPath, reason);
  }
}
