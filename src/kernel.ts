// ============================================================================
// Tool Kernel
// ============================================================================
// The kernel owns: the settings context, registry snapshots, dispatch,
// resources, the system prompt, and dispatch events. Both stdio and HTTP
// transports and the CLI go through it.
// ============================================================================

import { EventEmitter } from 'events';
import { log, debug } from './config.js';
import { allTools } from './tools/index.js';
import { registryForSettings, toJsonSchema, type RegistrySnapshot } from './tools/registry.js';
import { dispatch as dispatchTool, dispatchResource, type DispatchOutcome } from './tools/dispatcher.js';
import { toolSuccess, toolError } from './tools/shared/index.js';
import { SettingsContext } from './settings/context.js';
import { formatModes } from './modes.js';
import { systemPrompt } from './prompts.js';
import type { SettingsOverrides } from './settings/loader.js';
import type { Settings } from './settings/schema.js';
import type { ToolDefinition, ToolInputSchema, ToolResult } from './tools/types.js';

// ============================================================================
// Dispatch Context
// ============================================================================

/**
 * Optional context threaded through every dispatch call. Used for event
 * correlation and cancellation; never for authorization.
 */
export interface DispatchContext {
  /** Request correlation ID, threaded through events */
  requestId?: string;
  signal?: AbortSignal;
}

// ============================================================================
// Dispatch Events
// ============================================================================

export interface DispatchEvent {
  type: 'dispatch' | 'result' | 'error';
  tool: string;
  requestId?: string;
  timestamp: string;
  duration_ms?: number;
  status?: DispatchOutcome['status'];
  code?: string;
  error?: string;
}

export interface McpToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface McpResourceDefinition {
  uri: string;
  name: string;
  description: string;
  mimeType: string;
}

export interface ToolKernel {
  readonly context: SettingsContext;
  /** The full static table, before mode filtering */
  readonly definitions: readonly ToolDefinition[];

  /** Snapshot for the settings in scope (or the given tree) */
  snapshot(settings?: Settings): RegistrySnapshot;

  /** MCP tool definitions visible in the current scope */
  getMcpToolDefinitions(): McpToolDefinition[];

  getMcpResources(): McpResourceDefinition[];

  /** Dispatch against the settings in scope */
  dispatch(name: string, args: unknown, context?: DispatchContext): Promise<DispatchOutcome>;

  /** dispatch() rendered as an MCP tool result */
  callTool(name: string, args: unknown, context?: DispatchContext): Promise<ToolResult>;

  /** Execute the resource registered at `uri` */
  readResource(uri: string, context?: DispatchContext): Promise<DispatchOutcome>;

  systemPrompt(): string;

  /** Run `fn` with overrides layered onto the settings in scope */
  withOverrides<T>(overrides: SettingsOverrides, fn: () => T): T;

  /** Subscribe to dispatch events (dispatch, result, error) */
  on(event: DispatchEvent['type'], listener: (evt: DispatchEvent) => void): void;
}

export interface KernelOptions {
  settings: Settings;
  /** Defaults to the full tool table */
  tools?: readonly ToolDefinition[];
}

/**
 * Create the tool kernel. Call once at startup; all transports share it.
 */
export function createKernel(options: KernelOptions): ToolKernel {
  const definitions = options.tools ?? allTools;
  const context = new SettingsContext(options.settings);

  // One snapshot per resolved tree; trees are frozen so identity is enough
  const snapshots = new WeakMap<Settings, RegistrySnapshot>();

  function snapshot(settings: Settings = context.current()): RegistrySnapshot {
    let cached = snapshots.get(settings);
    if (!cached) {
      cached = registryForSettings(definitions, settings);
      snapshots.set(settings, cached);
      debug(`Kernel: registry rebuilt for modes ${formatModes(cached.activeModes)} (${cached.visible.length} visible)`);
    }
    return cached;
  }

  const initial = snapshot(options.settings);
  log(`Kernel: ${definitions.length} tools, ${initial.visible.length} visible under ${formatModes(initial.activeModes)}`);

  // emit('error') throws when nothing listens
  const emitter = new EventEmitter();
  emitter.on('error', (evt: DispatchEvent) => debug(`Kernel: ${evt.tool} ${evt.status ?? 'failure'}`));

  async function run(
    name: string,
    execute: (settings: Settings, snap: RegistrySnapshot) => Promise<DispatchOutcome>,
    ctx?: DispatchContext
  ): Promise<DispatchOutcome> {
    const settings = context.current();
    const requestId = ctx?.requestId;

    emitter.emit('dispatch', {
      type: 'dispatch', tool: name, requestId, timestamp: new Date().toISOString(),
    } satisfies DispatchEvent);

    const outcome = await execute(settings, snapshot(settings));

    if (outcome.status === 'success') {
      emitter.emit('result', {
        type: 'result', tool: name, requestId, timestamp: new Date().toISOString(),
        duration_ms: outcome.durationMs, status: outcome.status,
      } satisfies DispatchEvent);
    } else {
      log(`Kernel: ${name} ${outcome.status}: ${outcome.error.message}`);
      emitter.emit('error', {
        type: 'error', tool: name, requestId, timestamp: new Date().toISOString(),
        duration_ms: outcome.durationMs, status: outcome.status,
        code: outcome.error.code, error: outcome.error.message,
      } satisfies DispatchEvent);
    }
    return outcome;
  }

  function dispatch(name: string, args: unknown, ctx?: DispatchContext): Promise<DispatchOutcome> {
    return run(
      name,
      (settings, snap) => dispatchTool(snap, name, args, { settings, signal: ctx?.signal }),
      ctx
    );
  }

  async function callTool(name: string, args: unknown, ctx?: DispatchContext): Promise<ToolResult> {
    const outcome = await dispatch(name, args, ctx);
    return outcome.status === 'success' ? toolSuccess(outcome.result) : toolError(outcome.error);
  }

  function readResource(uri: string, ctx?: DispatchContext): Promise<DispatchOutcome> {
    return run(
      uri,
      (settings, snap) => dispatchResource(snap, uri, { settings, signal: ctx?.signal }),
      ctx
    );
  }

  function getMcpToolDefinitions(): McpToolDefinition[] {
    return snapshot().tools.map(t => ({
      name: t.name,
      description: t.description,
      inputSchema: toJsonSchema(t),
    }));
  }

  function getMcpResources(): McpResourceDefinition[] {
    return snapshot().resources.map(r => ({
      uri: r.uri ?? '',
      name: r.name,
      description: r.description,
      mimeType: 'text/plain',
    }));
  }

  return {
    context,
    definitions,
    snapshot,
    getMcpToolDefinitions,
    getMcpResources,
    dispatch,
    callTool,
    readResource,
    systemPrompt: () => systemPrompt(snapshot()),
    withOverrides: <T>(overrides: SettingsOverrides, fn: () => T): T => context.withOverrides(overrides, fn),
    on: (event, listener) => { emitter.on(event, listener); },
  };
}
