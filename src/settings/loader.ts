// ============================================================================
// Layered Settings Loader
// ============================================================================
// Precedence, highest first:
//   1. programmatic overrides ({ 'dremio.uri': ... })
//   2. environment variables  (DREMIO_URI, TOOLS_SERVER_MODE, ...)
//   3. explicit config file   (--cfg; missing file is an error)
//   4. default config file    ($XDG_CONFIG_HOME/dremioai/config.yaml; optional)
//   5. schema defaults
// Layers 3 and 4 are exclusive: an explicit path replaces the default one.
// ============================================================================

import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join, resolve } from 'path';
import YAML from 'yaml';
import type { z } from 'zod';
import { log, debug } from '../config.js';
import { ValidationError, errorMessage, type Violation } from '../errors.js';
import { resolveSecret, expandHome } from './secrets.js';
import {
  SettingsSchema,
  settingsLeaves,
  type Settings,
  type SettingsLeaf,
} from './schema.js';

export const APP_NAME = 'dremioai';

/** Dotted-path overrides, e.g. { 'dremio.uri': 'PROD' } */
export type SettingsOverrides = Record<string, unknown>;

export interface LoadOptions {
  /** Explicit config file; must exist */
  configPath?: string;
  /** Environment to map onto settings (defaults to process.env) */
  env?: NodeJS.ProcessEnv;
  overrides?: SettingsOverrides;
}

export interface ResolvedSettings {
  settings: Settings;
  /** File the settings were read from, undefined when none existed */
  source?: string;
}

// ============================================================================
// Plain Object Helpers
// ============================================================================

export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Merge `over` onto `base`; objects merge key by key, everything else replaces */
export function deepMerge(base: PlainObject, over: PlainObject): PlainObject {
  const out: PlainObject = { ...base };
  for (const [key, value] of Object.entries(over)) {
    const existing = out[key];
    out[key] = isPlainObject(existing) && isPlainObject(value)
      ? deepMerge(existing, value)
      : value;
  }
  return out;
}

export function setAtPath(target: PlainObject, path: readonly string[], value: unknown): PlainObject {
  if (path.length === 0) return target;
  const [head, ...rest] = path;
  if (rest.length === 0) {
    return { ...target, [head]: value };
  }
  const child = target[head];
  return { ...target, [head]: setAtPath(isPlainObject(child) ? child : {}, rest, value) };
}

export function getAtPath(target: unknown, path: readonly string[]): unknown {
  let current = target;
  for (const key of path) {
    if (!isPlainObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Turn dotted overrides into a nested document. Undefined values are skipped
 * so CLI flags that were not given do not clobber lower layers.
 */
export function overridesToDocument(overrides: SettingsOverrides): PlainObject {
  let doc: PlainObject = {};
  for (const [key, value] of Object.entries(overrides)) {
    if (value === undefined) continue;
    doc = setAtPath(doc, key.split('.'), value);
  }
  return doc;
}

// ============================================================================
// Validation
// ============================================================================

function toViolations(issues: z.ZodIssue[]): Violation[] {
  const violations: Violation[] = [];
  for (const issue of issues) {
    const base = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        violations.push({ path: base ? `${base}.${key}` : key, message: 'unknown field' });
      }
      continue;
    }
    violations.push({ path: base || '(root)', message: issue.message });
  }
  return violations;
}

function resolveSecrets(parsed: Settings, leaves: readonly SettingsLeaf[]): Settings {
  let doc: PlainObject = parsed;
  for (const leaf of leaves) {
    const raw = getAtPath(doc, leaf.path);
    if (typeof raw !== 'string') continue;
    const resolved = resolveSecret(leaf.path.join('.'), raw);
    if (resolved !== raw) {
      doc = setAtPath(doc, leaf.path, resolved);
    }
  }
  // Only string leaves were replaced by strings, so the parse result still holds
  const reparsed = SettingsSchema.safeParse(doc);
  if (!reparsed.success) {
    throw new ValidationError(toViolations(reparsed.error.issues), 'Invalid settings');
  }
  return reparsed.data;
}

/**
 * Shape check only; secret references are left unread.
 *
 * @throws ValidationError listing every offending field
 */
export function checkSettingsDocument(raw: unknown): Settings {
  const result = SettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ValidationError(toViolations(result.error.issues), 'Invalid settings');
  }
  return result.data;
}

/**
 * Validate a raw settings document and return the resolved, frozen tree.
 *
 * @throws ValidationError listing every offending field
 * @throws ResolutionError when a secret reference cannot be read
 */
export function validateSettings(raw: unknown): Settings {
  const secrets = settingsLeaves().filter(leaf => leaf.secret);
  return deepFreeze(resolveSecrets(checkSettingsDocument(raw), secrets));
}

/**
 * Validate `layer` on top of an already resolved tree. Only secret leaves
 * the layer sets are resolved; values `base` holds are literals already,
 * even when they start with `@`.
 *
 * @throws ValidationError listing every offending field
 * @throws ResolutionError when a secret reference in `layer` cannot be read
 */
export function validateOnto(base: Settings, layer: PlainObject): Settings {
  const secrets = settingsLeaves().filter(leaf => leaf.secret && getAtPath(layer, leaf.path) !== undefined);
  return deepFreeze(resolveSecrets(checkSettingsDocument(deepMerge(base, layer)), secrets));
}

// ============================================================================
// Environment Layer
// ============================================================================

/** `dremio.project_id` -> `DREMIO_PROJECT_ID` */
export function envVariableName(path: readonly string[]): string {
  return path.map(p => p.toUpperCase()).join('_');
}

/** Every settings leaf keyed by its environment variable name */
export function envBindings(): Map<string, SettingsLeaf> {
  const bindings = new Map<string, SettingsLeaf>();
  for (const leaf of settingsLeaves()) {
    bindings.set(envVariableName(leaf.path), leaf);
  }
  return bindings;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function coerceEnvValue(leaf: SettingsLeaf, raw: string): unknown {
  switch (leaf.kind) {
    case 'boolean': {
      const lowered = raw.trim().toLowerCase();
      if (TRUE_VALUES.has(lowered)) return true;
      if (FALSE_VALUES.has(lowered)) return false;
      return raw; // left for the schema to reject
    }
    case 'number': {
      const n = Number(raw);
      return raw.trim() !== '' && Number.isFinite(n) ? n : raw;
    }
    case 'list':
      if (raw.trim().startsWith('[')) {
        try {
          return JSON.parse(raw);
        } catch {
          return raw;
        }
      }
      return raw.split(',').map(s => s.trim()).filter(s => s.length > 0);
    case 'json':
      try {
        return JSON.parse(raw);
      } catch {
        return raw;
      }
    default:
      return raw;
  }
}

export function envLayer(env: NodeJS.ProcessEnv): PlainObject {
  let doc: PlainObject = {};
  for (const [name, leaf] of envBindings()) {
    const raw = env[name];
    if (raw === undefined) continue;
    debug(`Settings: ${name} -> ${leaf.path.join('.')}`);
    doc = setAtPath(doc, leaf.path, coerceEnvValue(leaf, raw));
  }
  return doc;
}

// ============================================================================
// File Layer
// ============================================================================

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.XDG_CONFIG_HOME || join(homedir(), '.config');
  return join(base, APP_NAME, 'config.yaml');
}

function readSettingsFile(path: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ValidationError([{ path: '(file)', message: `${path}: ${errorMessage(err)}` }], 'Invalid settings file');
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ValidationError(
      [{ path: '(root)', message: `${path} must contain a mapping of sections` }],
      'Invalid settings file'
    );
  }
  return parsed;
}

// ============================================================================
// Load
// ============================================================================

/**
 * Resolve the effective settings from every layer.
 *
 * @throws ValidationError on any invalid field or a missing explicit file
 * @throws ResolutionError when a secret reference cannot be read
 */
export function loadSettings(options: LoadOptions = {}): ResolvedSettings {
  const env = options.env ?? process.env;

  let source: string | undefined;
  let fileDoc: PlainObject = {};

  if (options.configPath !== undefined) {
    const explicit = resolve(expandHome(options.configPath));
    if (!existsSync(explicit)) {
      throw new ValidationError(
        [{ path: '(file)', message: `config file not found: ${explicit}` }],
        'Invalid settings file'
      );
    }
    fileDoc = readSettingsFile(explicit);
    source = explicit;
  } else {
    const fallback = defaultConfigPath(env);
    if (existsSync(fallback)) {
      fileDoc = readSettingsFile(fallback);
      source = fallback;
    }
  }

  const merged = deepMerge(
    deepMerge(fileDoc, envLayer(env)),
    overridesToDocument(options.overrides ?? {})
  );

  const settings = validateSettings(merged);
  log(`Settings: loaded${source ? ` from ${source}` : ' (no config file)'}`);
  return { settings, source };
}
