// ============================================================================
// HTTP Transport Adapter
// ============================================================================
// Wraps httpServer.ts: streamable HTTP MCP plus health/info endpoints.
// ============================================================================

import { log } from '../config.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter, TransportConfig } from './types.js';
import { startHttpServer, type HttpServerHandle } from '../httpServer.js';

export const DEFAULT_HTTP_PORT = 8000;
export const DEFAULT_HTTP_HOST = '127.0.0.1';

export class HttpAdapter implements TransportAdapter {
  readonly name = 'http';
  private handle: HttpServerHandle | null = null;

  async start(kernel: ToolKernel, config: TransportConfig): Promise<void> {
    this.handle = await startHttpServer(kernel, {
      port: config.port ?? DEFAULT_HTTP_PORT,
      host: config.host ?? DEFAULT_HTTP_HOST,
    });
    log('HTTP transport started');
  }

  /** Bound address, once started */
  address(): { host: string; port: number } | undefined {
    return this.handle ? { host: this.handle.host, port: this.handle.port } : undefined;
  }

  async stop(): Promise<void> {
    if (this.handle) {
      await this.handle.stop();
      this.handle = null;
    }
  }
}
