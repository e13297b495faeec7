// ============================================================================
// Tool Types
// ============================================================================
// A tool is a plain record collected into a static table per domain
// (src/tools/<domain>/index.ts) and aggregated in src/tools/index.ts.
// Nothing is registered at runtime; the registry only filters.
// ============================================================================

import type { ToolMode } from '../modes.js';
import type { Settings } from '../settings/schema.js';

export type ParamType = 'string' | 'number' | 'integer' | 'boolean' | 'string[]';

export type ParamValue = string | number | boolean | string[];

export interface ParamSpec {
  name: string;
  type: ParamType;
  required: boolean;
  /** Applied when an optional parameter is absent */
  default?: ParamValue;
  description: string;
}

/** Arguments after validation and coercion against the tool's params */
export type ToolArgs = Record<string, unknown>;

/** Ambient inputs of one invocation */
export interface ToolContext {
  settings: Settings;
  signal: AbortSignal;
}

export type ToolKind = 'tool' | 'resource';

export interface ToolDefinition {
  name: string;
  description: string;
  params: ParamSpec[];
  /** Visible when any of these modes is active */
  modes: ToolMode[];
  kind: ToolKind;
  /** Hidden unless dremio.project_id is set */
  requiresProjectId?: boolean;
  /** Resource address, resources only */
  uri?: string;
  execute(args: ToolArgs, ctx: ToolContext): Promise<unknown>;
}

/**
 * Standard MCP tool result format
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
};

/** Listing entry shared by MCP discovery and the CLI */
export interface ToolListing {
  name: string;
  description: string;
  params: Array<{
    name: string;
    type: ParamType;
    required: boolean;
    default?: ParamValue;
    description: string;
  }>;
}

export interface JsonSchemaProperty {
  type: 'string' | 'number' | 'integer' | 'boolean' | 'array';
  description: string;
  items?: { type: 'string' };
  default?: ParamValue;
}

export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
  additionalProperties: false;
}
