// ============================================================================
// Tool Registry
// ============================================================================
// A snapshot is the frozen view of the static tool table under one set of
// active modes. It is rebuilt whenever the settings in scope change and is
// never mutated afterwards, so concurrent readers always see a whole view.
// ============================================================================

import { effectiveModes, type ToolMode } from '../modes.js';
import { ValidationError, type Violation } from '../errors.js';
import type { Settings } from '../settings/schema.js';
import type {
  ToolDefinition,
  ToolInputSchema,
  ToolListing,
  JsonSchemaProperty,
  ParamSpec,
} from './types.js';

export interface RegistrySnapshot {
  readonly activeModes: ReadonlySet<ToolMode>;
  /** Every visible definition, tools and resources */
  readonly visible: readonly ToolDefinition[];
  readonly tools: readonly ToolDefinition[];
  readonly resources: readonly ToolDefinition[];
  /** Visible tool by name; hidden, unknown and resource names are all undefined */
  get(name: string): ToolDefinition | undefined;
  /** Visible resource by URI */
  getResource(uri: string): ToolDefinition | undefined;
  /** Listing of visible tools (resources excluded) */
  list(): ToolListing[];
}

export interface RegistryOptions {
  /** A project id is configured; tools that need one stay hidden otherwise */
  projectScoped?: boolean;
}

/** "Any of": at least one declared mode is active */
export function isVisible(
  definition: ToolDefinition,
  active: ReadonlySet<ToolMode>,
  options: RegistryOptions = {}
): boolean {
  if (definition.requiresProjectId && !options.projectScoped) return false;
  return definition.modes.some(m => active.has(m));
}

function checkDefinitions(definitions: readonly ToolDefinition[]): void {
  const names = new Set<string>();
  const violations: Violation[] = [];
  for (const def of definitions) {
    if (names.has(def.name)) {
      violations.push({ path: def.name, message: 'duplicate tool name' });
    }
    names.add(def.name);
    if (def.modes.length === 0) {
      violations.push({ path: def.name, message: 'tool declares no modes' });
    }
    if (def.kind === 'resource' && !def.uri) {
      violations.push({ path: def.name, message: 'resource has no uri' });
    }
  }
  if (violations.length > 0) {
    throw new ValidationError(violations, 'Invalid tool table');
  }
}

export function toListing(def: ToolDefinition): ToolListing {
  return {
    name: def.name,
    description: def.description,
    params: def.params.map(p => ({
      name: p.name,
      type: p.type,
      required: p.required,
      ...(p.default !== undefined ? { default: p.default } : {}),
      description: p.description,
    })),
  };
}

function jsonSchemaProperty(param: ParamSpec): JsonSchemaProperty {
  const base: JsonSchemaProperty = param.type === 'string[]'
    ? { type: 'array', items: { type: 'string' }, description: param.description }
    : { type: param.type, description: param.description };
  return param.default !== undefined ? { ...base, default: param.default } : base;
}

/** MCP `inputSchema` for a definition */
export function toJsonSchema(def: ToolDefinition): ToolInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  for (const param of def.params) {
    properties[param.name] = jsonSchemaProperty(param);
  }
  const required = def.params.filter(p => p.required).map(p => p.name);
  return {
    type: 'object',
    properties,
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };
}

/**
 * Filter the tool table by the active modes.
 *
 * @throws ValidationError when the table itself is inconsistent
 */
export function buildRegistry(
  definitions: readonly ToolDefinition[],
  activeModes: ReadonlySet<ToolMode>,
  options: RegistryOptions = {}
): RegistrySnapshot {
  checkDefinitions(definitions);

  const active: ReadonlySet<ToolMode> = new Set(activeModes);
  const visible = Object.freeze(definitions.filter(d => isVisible(d, active, options)));
  const tools = Object.freeze(visible.filter(d => d.kind === 'tool'));
  const resources = Object.freeze(visible.filter(d => d.kind === 'resource'));
  const byName = new Map(tools.map(d => [d.name, d]));
  const byUri = new Map(resources.map(d => [d.uri ?? '', d]));

  return Object.freeze({
    activeModes: active,
    visible,
    tools,
    resources,
    get: (name: string) => byName.get(name),
    getResource: (uri: string) => byUri.get(uri),
    list: () => tools.map(toListing),
  });
}

/**
 * Snapshot for a resolved settings tree. `modes` replaces the tree's server
 * mode; the experimental gate and the project id still come from the tree.
 */
export function registryForSettings(
  definitions: readonly ToolDefinition[],
  settings: Settings,
  modes: readonly ToolMode[] = settings.tools.server_mode
): RegistrySnapshot {
  const active = effectiveModes(modes, settings.dremio?.enable_experimental ?? false);
  return buildRegistry(definitions, active, { projectScoped: settings.dremio?.project_id !== undefined });
}
