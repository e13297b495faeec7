// ============================================================================
// Transport Layer: public API
// ============================================================================

export type { TransportAdapter, TransportConfig } from './types.js';
export { createMcpServer } from './mcp.js';
export { StdioAdapter } from './stdio.js';
export { HttpAdapter, DEFAULT_HTTP_PORT, DEFAULT_HTTP_HOST } from './http.js';
