// ============================================================================
// Stdio Transport Adapter
// ============================================================================
// One MCP session over a pair of streams (process stdin/stdout unless given),
// for Claude Desktop and other local clients. Stdio carries no credentials,
// so the adapter opens no override scope: every request runs against the
// kernel's baseline settings, the tree loaded at startup.
// ============================================================================

import type { Readable, Writable } from 'stream';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { log } from '../config.js';
import { formatModes } from '../modes.js';
import type { ToolKernel } from '../kernel.js';
import type { TransportAdapter, TransportConfig } from './types.js';
import { createMcpServer } from './mcp.js';

export interface StdioStreams {
  stdin?: Readable;
  stdout?: Writable;
}

export class StdioAdapter implements TransportAdapter {
  readonly name = 'stdio';
  private server: Server | null = null;

  constructor(private readonly streams: StdioStreams = {}) {}

  async start(kernel: ToolKernel, config: TransportConfig): Promise<void> {
    if (this.server) {
      throw new Error('stdio transport already started');
    }

    const baseline = kernel.snapshot(kernel.context.getBaseline());
    log(
      `Stdio: serving ${baseline.tools.length} tools under ${formatModes(baseline.activeModes) || '(no modes)'}` +
        ` with settings from ${config.source ?? 'defaults and environment'}`
    );

    const server = createMcpServer(kernel);
    await server.connect(new StdioServerTransport(this.streams.stdin, this.streams.stdout));
    this.server = server;
    log('Dremio MCP Server running on stdio');
  }

  async stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (server) {
      await server.close();
      log('Stdio: session closed');
    }
  }
}
