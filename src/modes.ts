// ============================================================================
// Capability Modes
// ============================================================================
// A mode is a named capability. Tools declare the modes they belong to and the
// registry exposes a tool when any of its modes is active.
// ============================================================================

import { ValidationError } from './errors.js';

export const TOOL_MODES = ['FOR_SELF', 'FOR_PROMETHEUS', 'FOR_DATA_PATTERNS', 'EXPERIMENTAL'] as const;

export type ToolMode = (typeof TOOL_MODES)[number];

/** Bit value of each mode, for integer mode specs */
export const MODE_BITS: Record<ToolMode, number> = {
  FOR_SELF: 1,
  FOR_PROMETHEUS: 2,
  FOR_DATA_PATTERNS: 4,
  EXPERIMENTAL: 8,
};

/** Modes that only take effect together with dremio.enable_experimental */
export const EXPERIMENTAL_MODES: ReadonlySet<ToolMode> = new Set<ToolMode>(['EXPERIMENTAL']);

const ALL_BITS = TOOL_MODES.reduce((acc, m) => acc | MODE_BITS[m], 0);

/** Accepted shapes of `tools.server_mode` */
export type ModeSpec = string | number | readonly string[];

export function isToolMode(value: string): value is ToolMode {
  return TOOL_MODES.some(m => m === value);
}

/** Canonical order (enumeration order), no duplicates */
function canonical(modes: Iterable<ToolMode>): ToolMode[] {
  const set = new Set(modes);
  return TOOL_MODES.filter(m => set.has(m));
}

export function modesFromBits(bits: number, token = String(bits)): ToolMode[] {
  if (!Number.isInteger(bits) || bits <= 0 || (bits & ~ALL_BITS) !== 0) {
    throw new ValidationError(
      [{ path: 'tools.server_mode', message: `invalid mode bits "${token}" (known bits: ${ALL_BITS})` }],
      'Invalid mode specification'
    );
  }
  return TOOL_MODES.filter(m => (bits & MODE_BITS[m]) !== 0);
}

export function modesToBits(modes: Iterable<ToolMode>): number {
  let bits = 0;
  for (const m of modes) bits |= MODE_BITS[m];
  return bits;
}

/**
 * Normalize a mode specification into a set of named modes.
 *
 * Shapes are tried in a fixed order: integer, list of names, then a string
 * that is either a name list (`FOR_SELF,FOR_DATA_PATTERNS`, `|` also accepted)
 * or a decimal bit combination.
 */
export function parseModeSpec(spec: ModeSpec): ToolMode[] {
  if (typeof spec === 'number') {
    return modesFromBits(spec);
  }

  const tokens = typeof spec === 'string'
    ? spec.split(/[,|]/)
    : spec.flatMap(s => s.split(/[,|]/));
  const trimmed = tokens.map(t => t.trim()).filter(t => t.length > 0);

  if (trimmed.length === 0) {
    throw new ValidationError(
      [{ path: 'tools.server_mode', message: 'mode specification is empty' }],
      'Invalid mode specification'
    );
  }

  if (typeof spec === 'string' && trimmed.length === 1 && /^\d+$/.test(trimmed[0])) {
    return modesFromBits(Number.parseInt(trimmed[0], 10), trimmed[0]);
  }

  const modes: ToolMode[] = [];
  const invalid: string[] = [];
  for (const token of trimmed) {
    const upper = token.toUpperCase();
    if (isToolMode(upper)) {
      modes.push(upper);
    } else {
      invalid.push(token);
    }
  }

  if (invalid.length > 0) {
    throw new ValidationError(
      invalid.map(t => ({
        path: 'tools.server_mode',
        message: `unknown mode "${t}" (expected one of ${TOOL_MODES.join(', ')})`,
      })),
      'Invalid mode specification'
    );
  }

  return canonical(modes);
}

/**
 * Active modes: the declared set minus experimental modes, unless the
 * experimental switch is on as well.
 */
export function effectiveModes(declared: Iterable<ToolMode>, enableExperimental: boolean): ReadonlySet<ToolMode> {
  const active = new Set<ToolMode>();
  for (const m of declared) {
    if (EXPERIMENTAL_MODES.has(m) && !enableExperimental) continue;
    active.add(m);
  }
  return active;
}

export function formatModes(modes: Iterable<ToolMode>): string {
  return canonical(modes).join(',');
}
