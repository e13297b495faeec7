// ============================================================================
// Shared MCP Server Factory
// ============================================================================
// Creates an MCP Server with tool, resource and prompt handlers wired to the
// kernel. Each transport adapter calls this to get its own Server instance.
// Handlers read settings from the kernel's context, so whatever scope the
// transport opened around a request is what the request sees.
// ============================================================================

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  ListPromptsRequestSchema,
  GetPromptRequestSchema,
  McpError,
  ErrorCode,
} from '@modelcontextprotocol/sdk/types.js';
import { log, debug } from '../config.js';
import { NotFoundError } from '../errors.js';
import { PKG } from '../version.js';
import { SYSTEM_PROMPT_NAME } from '../prompts.js';
import type { ToolKernel } from '../kernel.js';

/**
 * Create an MCP Server wired to the given kernel.
 * Each transport gets its own Server instance (MCP SDK only supports
 * one transport per Server).
 */
export function createMcpServer(kernel: ToolKernel): Server {
  const server = new Server(
    { name: PKG.name, version: PKG.version },
    { capabilities: { tools: {}, resources: {}, prompts: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: kernel.getMcpToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    log(`Tool called: ${name}`);
    debug(`Arguments:`, JSON.stringify(args ?? {}));

    return kernel.callTool(name, args ?? {}, {
      requestId: String(extra.requestId),
      signal: extra.signal,
    });
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return { resources: kernel.getMcpResources() };
  });

  server.setRequestHandler(ReadResourceRequestSchema, async (request, extra) => {
    const { uri } = request.params;
    const outcome = await kernel.readResource(uri, {
      requestId: String(extra.requestId),
      signal: extra.signal,
    });

    if (outcome.status !== 'success') {
      const code = outcome.error instanceof NotFoundError ? ErrorCode.InvalidParams : ErrorCode.InternalError;
      throw new McpError(code, outcome.error.message);
    }

    const text = typeof outcome.result === 'string' ? outcome.result : JSON.stringify(outcome.result, null, 2);
    return { contents: [{ uri, mimeType: 'text/plain', text }] };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => {
    return {
      prompts: [{ name: SYSTEM_PROMPT_NAME, description: 'Guidance for analyzing the cluster with the available tools' }],
    };
  });

  server.setRequestHandler(GetPromptRequestSchema, async (request) => {
    if (request.params.name !== SYSTEM_PROMPT_NAME) {
      throw new McpError(ErrorCode.InvalidParams, `Prompt not found: ${request.params.name}`);
    }
    return {
      messages: [{ role: 'user', content: { type: 'text', text: kernel.systemPrompt() } }],
    };
  });

  return server;
}
