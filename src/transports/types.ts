// ============================================================================
// Transport Adapter Interface
// ============================================================================
// All transports implement this interface so the CLI can start either one
// without knowing transport internals.
// ============================================================================

import type { ToolKernel } from '../kernel.js';

/**
 * Configuration shared across all transports.
 * Each adapter uses what it needs and ignores the rest.
 */
export interface TransportConfig {
  /** Settings file the kernel was loaded from, for startup logs */
  source?: string;

  // HTTP-specific
  port?: number;
  host?: string;
}

/**
 * A transport adapter knows how to expose the kernel to a specific protocol.
 * Adapters are self-contained: they create their own MCP Server, connect
 * their own transport, and manage their own lifecycle.
 */
export interface TransportAdapter {
  readonly name: string;
  start(kernel: ToolKernel, config: TransportConfig): Promise<void>;
  stop(): Promise<void>;
}
