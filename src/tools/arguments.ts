// ============================================================================
// Argument Validation
// ============================================================================
// Raw arguments arrive as JSON from MCP or as `key=value` strings from the
// CLI. Both go through one zod object built from the tool's params: strict
// (unknown keys rejected), with string inputs coerced to the declared type.
// ============================================================================

import { z } from 'zod';
import { ValidationError, ToolExecutionError, type Violation } from '../errors.js';
import type { ParamSpec, ParamType, ToolArgs } from './types.js';

const TYPE_LABELS: Record<ParamType, string> = {
  string: 'string',
  number: 'number',
  integer: 'integer',
  boolean: 'boolean',
  'string[]': 'list of strings',
};

function fromNumericString(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return value;
}

function fromBooleanString(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'true') return true;
  if (lowered === 'false') return false;
  return value;
}

function fromScalar(value: unknown): unknown {
  return typeof value === 'number' || typeof value === 'boolean' ? String(value) : value;
}

function toList(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  if (value.trim().startsWith('[')) {
    try {
      return JSON.parse(value);
    } catch {
      return value;
    }
  }
  return [value];
}

function paramSchema(param: ParamSpec): z.ZodTypeAny {
  switch (param.type) {
    case 'string':
      return z.preprocess(fromScalar, z.string());
    case 'number':
      return z.preprocess(fromNumericString, z.number().finite());
    case 'integer':
      return z.preprocess(fromNumericString, z.number().int());
    case 'boolean':
      return z.preprocess(fromBooleanString, z.boolean());
    case 'string[]':
      return z.preprocess(toList, z.array(z.preprocess(fromScalar, z.string())));
  }
}

/** Build the strict validator for a parameter list */
export function argumentSchema(params: readonly ParamSpec[]): z.ZodTypeAny {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of params) {
    const schema = paramSchema(param);
    if (param.required) {
      shape[param.name] = schema;
    } else if (param.default !== undefined) {
      shape[param.name] = schema.default(param.default);
    } else {
      shape[param.name] = schema.optional();
    }
  }
  return z.object(shape).strict();
}

function toViolations(issues: z.ZodIssue[], params: readonly ParamSpec[], raw: ToolArgs): Violation[] {
  const byName = new Map(params.map(p => [p.name, p]));
  const seen = new Set<string>();
  const violations: Violation[] = [];

  for (const issue of issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        if (seen.has(key)) continue;
        seen.add(key);
        violations.push({ path: key, message: 'unknown parameter' });
      }
      continue;
    }

    const name = String(issue.path[0] ?? '(arguments)');
    if (seen.has(name)) continue;
    seen.add(name);

    const param = byName.get(name);
    if (!param) {
      violations.push({ path: name, message: issue.message });
    } else if (raw[name] === undefined) {
      violations.push({ path: name, message: `missing required parameter (expected ${TYPE_LABELS[param.type]})` });
    } else {
      violations.push({ path: name, message: `expected ${TYPE_LABELS[param.type]}, got ${JSON.stringify(raw[name])}` });
    }
  }
  return violations;
}

/**
 * Validate and coerce raw arguments.
 *
 * @throws ValidationError listing every missing, unknown or uncoercible parameter
 */
export function validateArguments(params: readonly ParamSpec[], raw: unknown): ToolArgs {
  if (raw === undefined || raw === null) {
    raw = {};
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError([{ path: '(arguments)', message: 'arguments must be an object' }], 'Invalid arguments');
  }
  const args: ToolArgs = { ...raw };

  const result = argumentSchema(params).safeParse(args);
  if (!result.success) {
    throw new ValidationError(toViolations(result.error.issues, params, args), 'Invalid arguments');
  }
  const parsed: ToolArgs = result.data;
  return parsed;
}

/**
 * Parse CLI `key=value` pairs into raw arguments. Values stay strings and
 * are coerced by validateArguments().
 */
export function parseKeyValueArgs(pairs: readonly string[]): ToolArgs {
  const args: ToolArgs = {};
  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq <= 0) {
      throw new ValidationError([{ path: pair, message: 'expected key=value' }], 'Invalid arguments');
    }
    args[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return args;
}

// ============================================================================
// Typed accessors for tool implementations
// ============================================================================
// Values were already coerced; these only narrow for the compiler.
// ============================================================================

function malformed(name: string, expected: string): ToolExecutionError {
  return new ToolExecutionError('malformed-argument', `Parameter ${name} must be ${expected}`);
}

export function stringArg(args: ToolArgs, name: string): string {
  const value = args[name];
  if (typeof value !== 'string') throw malformed(name, 'a string');
  return value;
}

export function optionalStringArg(args: ToolArgs, name: string): string | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw malformed(name, 'a string');
  return value;
}

export function stringListArg(args: ToolArgs, name: string): string[] {
  const value = args[name];
  if (!Array.isArray(value)) throw malformed(name, 'a list of strings');
  const out: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') throw malformed(name, 'a list of strings');
    out.push(item);
  }
  return out;
}
