// ============================================================================
// Library entry point
// ============================================================================

export * from './errors.js';
export * from './modes.js';
export { resolveSecret, isSecretReference } from './settings/secrets.js';
export { SettingsSchema, CLOUD_URIS, type Settings, type RawSettings } from './settings/schema.js';
export {
  loadSettings,
  validateSettings,
  defaultConfigPath,
  envVariableName,
  type LoadOptions,
  type ResolvedSettings,
  type SettingsOverrides,
} from './settings/loader.js';
export { applyOverrides } from './settings/overrides.js';
export { SettingsContext } from './settings/context.js';
export { allTools } from './tools/index.js';
export { buildRegistry, registryForSettings, type RegistrySnapshot, type RegistryOptions } from './tools/registry.js';
export { dispatch, dispatchResource, type DispatchOutcome, type DispatchOptions } from './tools/dispatcher.js';
export type { ToolDefinition, ParamSpec, ToolContext } from './tools/types.js';
export { createKernel, type ToolKernel, type DispatchEvent } from './kernel.js';
export { createMcpServer, StdioAdapter, HttpAdapter } from './transports/index.js';
export { startHttpServer } from './httpServer.js';
export { createProgram, runCli } from './cli.js';
