// ============================================================================
// Settings File Writer
// ============================================================================
// Backs `config create dremioai` and `config list`. Documents are written as
// given: secret references stay `@path` and symbolic URIs stay symbolic, so
// the file on disk is what the user typed.
// ============================================================================

import { mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import YAML from 'yaml';
import { log } from '../config.js';
import type { ToolMode } from '../modes.js';
import { isSecretReference } from './secrets.js';
import { settingsLeaves } from './schema.js';
import {
  checkSettingsDocument,
  getAtPath,
  setAtPath,
  type PlainObject,
} from './loader.js';

export const MASK = '********';

export interface CreateDremioOptions {
  uri: string;
  pat: string;
  projectId?: string;
  modes?: readonly string[];
  enableExperimental?: boolean;
  allowDml?: boolean;
}

export const DEFAULT_CREATE_MODES: readonly ToolMode[] = ['FOR_DATA_PATTERNS'];

/**
 * Build the document `config create dremioai` writes.
 *
 * @throws ValidationError when the result would not load
 */
export function buildDremioDocument(options: CreateDremioOptions): PlainObject {
  const dremio: PlainObject = { uri: options.uri, pat: options.pat };
  if (options.projectId !== undefined) dremio.project_id = options.projectId;
  if (options.enableExperimental) dremio.enable_experimental = true;
  if (options.allowDml) dremio.allow_dml = true;

  const modes = options.modes && options.modes.length > 0 ? options.modes : DEFAULT_CREATE_MODES;
  const doc: PlainObject = {
    dremio,
    tools: { server_mode: modes.map(m => m.trim().toUpperCase()).join(',') },
  };

  checkSettingsDocument(doc);
  return doc;
}

/**
 * Replace literal secrets with a mask. `@path` references are shown as-is
 * unless `resolved` says the document holds resolved values only, where a
 * leading `@` is part of the secret.
 */
export function maskSecrets(doc: PlainObject, resolved = false): PlainObject {
  let masked = doc;
  for (const leaf of settingsLeaves()) {
    if (!leaf.secret) continue;
    const value = getAtPath(masked, leaf.path);
    if (typeof value === 'string' && (resolved || !isSecretReference(value))) {
      masked = setAtPath(masked, leaf.path, MASK);
    }
  }
  return masked;
}

export function renderSettings(doc: PlainObject): string {
  return YAML.stringify(doc);
}

export function writeSettingsFile(path: string, doc: PlainObject): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, renderSettings(doc), { encoding: 'utf-8', mode: 0o600 });
  log(`Settings: wrote ${path}`);
}
