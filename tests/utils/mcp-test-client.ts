import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { createMcpServer } from '../../src/transports/mcp.js';
import type { ToolKernel } from '../../src/kernel.js';

export interface ToolCallResult {
  content: Array<{ type: string; text: string }>;
  isError?: boolean;
}

export interface TestMcpClient {
  client: Client;
  server: Server;
  close: () => Promise<void>;
  listTools: () => Promise<Array<{ name: string; description?: string }>>;
  callTool: (name: string, args: Record<string, unknown>) => Promise<ToolCallResult>;
}

function textContent(content: unknown): Array<{ type: string; text: string }> {
  if (!Array.isArray(content)) return [];
  const out: Array<{ type: string; text: string }> = [];
  for (const item of content) {
    if (typeof item === 'object' && item !== null && 'type' in item && 'text' in item) {
      out.push({ type: String(item.type), text: String(item.text) });
    }
  }
  return out;
}

/**
 * Creates a test MCP client connected to a real server instance via in-memory transport.
 * This allows testing the full MCP protocol flow without stdio.
 */
export async function createTestMcpClient(kernel: ToolKernel): Promise<TestMcpClient> {
  const server = createMcpServer(kernel);
  const client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);

  return {
    client,
    server,
    close: async () => {
      await client.close();
      await server.close();
    },
    listTools: async () => {
      const result = await client.listTools();
      return result.tools;
    },
    callTool: async (name, args) => {
      const result = await client.callTool({ name, arguments: args });
      return {
        content: textContent(result.content),
        isError: result.isError === true,
      };
    },
  };
}
