/**
 * HTTP Server Mode
 *
 * Exposes the MCP server over streamable HTTP for remote clients.
 *
 * Usage:
 *   dremio-mcp-server run --http --port 8000
 *
 * Endpoints:
 *   GET  /health   - Health check
 *   GET  /info     - Server name, version, active modes and visible tools
 *   POST /mcp      - Full MCP protocol endpoint (stateless)
 *
 * A `Authorization: Bearer <token>` header on /mcp replaces dremio.pat for
 * the duration of that request only.
 */

import { createServer, IncomingMessage, ServerResponse, type Server as NodeHttpServer } from 'http';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { log, logError } from './config.js';
import { McpCoreError, errorMessage } from './errors.js';
import { formatModes } from './modes.js';
import { isSecretReference } from './settings/secrets.js';
import { PKG } from './version.js';
import { createMcpServer } from './transports/mcp.js';
import type { ToolKernel } from './kernel.js';
import type { SettingsOverrides } from './settings/loader.js';

// ============================================================================
// Response Helpers
// ============================================================================

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, statusCode: number, data: Record<string, unknown>): void {
  res.writeHead(statusCode, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

/**
 * Settings overrides carried by the request headers. A token that looks like
 * a secret reference is refused so a caller cannot make the server read a
 * local file.
 */
export function requestOverrides(req: IncomingMessage): SettingsOverrides | 'invalid' {
  const header = req.headers.authorization;
  if (!header) return {};
  const match = /^Bearer\s+(.+)$/i.exec(header);
  if (!match) return 'invalid';
  const token = match[1].trim();
  if (token.length === 0 || isSecretReference(token)) return 'invalid';
  return { 'dremio.pat': token };
}

// ============================================================================
// MCP Request Handling
// ============================================================================

/**
 * Stateless mode: a fresh Server + transport per request, closed when the
 * response ends.
 */
async function handleMcpRequest(kernel: ToolKernel, req: IncomingMessage, res: ServerResponse): Promise<void> {
  const server = createMcpServer(kernel);
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: undefined, // Stateless mode
  });

  res.on('close', () => {
    transport.close().catch(err => logError('HTTP: transport close failed:', err));
    server.close().catch(err => logError('HTTP: server close failed:', err));
  });

  await server.connect(transport);
  await transport.handleRequest(req, res);
}

export function createRequestHandler(kernel: ToolKernel): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  return async (req, res) => {
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const path = url.pathname;

    log(`HTTP: ${req.method} ${path}`);

    // CORS headers for browser-based clients
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization, Mcp-Session-Id, Accept');
    res.setHeader('Access-Control-Expose-Headers', 'Mcp-Session-Id');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    if (path === '/health' && req.method === 'GET') {
      sendJson(res, 200, { status: 'ok', version: PKG.version });
      return;
    }

    if (path === '/info' && req.method === 'GET') {
      const snapshot = kernel.snapshot();
      sendJson(res, 200, {
        name: PKG.name,
        version: PKG.version,
        modes: formatModes(snapshot.activeModes),
        tools: snapshot.tools.map(t => t.name),
        resources: snapshot.resources.map(r => r.uri),
      });
      return;
    }

    if (path === '/mcp') {
      const overrides = requestOverrides(req);
      if (overrides === 'invalid') {
        sendJson(res, 401, { error: 'Malformed Authorization header', code: 'UNAUTHORIZED' });
        return;
      }

      try {
        await kernel.withOverrides(overrides, () => handleMcpRequest(kernel, req, res));
      } catch (error) {
        if (error instanceof McpCoreError) {
          log(`HTTP: request settings rejected: ${error.message}`);
          if (!res.headersSent) sendJson(res, 400, error.toJSON());
          return;
        }
        const message = errorMessage(error);
        logError(`HTTP: Error handling MCP request: ${message}`);
        if (!res.headersSent) {
          sendJson(res, 500, { error: message });
        } else if (!res.writableEnded) {
          res.end();
        }
      }
      return;
    }

    // 404 for all other paths
    sendJson(res, 404, { error: 'Not found' });
  };
}

// ============================================================================
// Server Lifecycle
// ============================================================================

export interface HttpServerOptions {
  port: number;
  host?: string;
}

export interface HttpServerHandle {
  host: string;
  /** Bound port (differs from the requested one when that was 0) */
  port: number;
  server: NodeHttpServer;
  stop(): Promise<void>;
}

/**
 * Start an HTTP server that handles MCP requests
 */
export async function startHttpServer(kernel: ToolKernel, options: HttpServerOptions): Promise<HttpServerHandle> {
  const { port, host = '127.0.0.1' } = options;
  const handler = createRequestHandler(kernel);

  const httpServer = createServer((req, res) => {
    handler(req, res).catch(err => {
      logError('HTTP: unhandled request failure:', err);
      if (!res.headersSent) sendJson(res, 500, { error: errorMessage(err) });
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(port, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const boundPort = address !== null && typeof address === 'object' ? address.port : port;
  log(`HTTP Server listening on http://${host}:${boundPort} (MCP at /mcp)`);

  return {
    host,
    port: boundPort,
    server: httpServer,
    stop: () =>
      new Promise<void>((resolve, reject) => {
        httpServer.close(err => (err ? reject(err) : resolve()));
        httpServer.closeAllConnections();
      }),
  };
}
