import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IncomingMessage } from 'http';
import { Socket } from 'net';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { createKernel } from '../../src/kernel.js';
import { validateSettings } from '../../src/settings/loader.js';
import { startHttpServer, requestOverrides, type HttpServerHandle } from '../../src/httpServer.js';
import { PKG } from '../../src/version.js';

function requestWith(authorization?: string): IncomingMessage {
  const req = new IncomingMessage(new Socket());
  if (authorization !== undefined) req.headers.authorization = authorization;
  return req;
}

describe('HTTP transport', () => {
  describe('requestOverrides', () => {
    it('carries no overrides without an Authorization header', () => {
      expect(requestOverrides(requestWith())).toEqual({});
    });

    it('maps a bearer token onto dremio.pat', () => {
      expect(requestOverrides(requestWith('Bearer request-secret'))).toEqual({ 'dremio.pat': 'request-secret' });
      expect(requestOverrides(requestWith('bearer  request-secret '))).toEqual({ 'dremio.pat': 'request-secret' });
    });

    it.each(['Basic dXNlcjpwYXNz', 'Bearer', 'Bearer @/etc/passwd', 'Bearer @env:HOME'])('refuses %s', header => {
      expect(requestOverrides(requestWith(header))).toBe('invalid');
    });
  });

  describe('server', () => {
    let handle: HttpServerHandle;
    let base: string;

    beforeEach(async () => {
      const kernel = createKernel({
        settings: validateSettings({
          dremio: { uri: 'https://dremio.test', pat: 'test-secret', project_id: 'p-1' },
          tools: { server_mode: 'FOR_DATA_PATTERNS' },
        }),
      });
      handle = await startHttpServer(kernel, { port: 0, host: '127.0.0.1' });
      base = `http://127.0.0.1:${handle.port}`;
    });

    afterEach(async () => {
      await handle.stop();
    });

    it('binds an ephemeral port', () => {
      expect(handle.port).toBeGreaterThan(0);
    });

    it('answers /health', async () => {
      const res = await fetch(`${base}/health`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', version: PKG.version });
    });

    it('describes the active modes on /info', async () => {
      const res = await fetch(`${base}/info`);
      expect(await res.json()).toEqual({
        name: PKG.name,
        version: PKG.version,
        modes: 'FOR_DATA_PATTERNS',
        tools: [
          'RunSqlQuery',
          'GetUsefulSystemTableNames',
          'GetSchemaOfTable',
          'GetTableOrViewLineage',
          'GetDescriptionOfTableOrSchema',
        ],
        resources: [],
      });
    });

    it('returns 404 for unknown paths', async () => {
      const res = await fetch(`${base}/nope`);
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Not found' });
    });

    it('answers CORS preflight', async () => {
      const res = await fetch(`${base}/mcp`, { method: 'OPTIONS' });
      expect(res.status).toBe(204);
      expect(res.headers.get('access-control-allow-origin')).toBe('*');
    });

    it('refuses secret references passed as tokens', async () => {
      const res = await fetch(`${base}/mcp`, {
        method: 'POST',
        headers: { Authorization: 'Bearer @/etc/passwd', 'Content-Type': 'application/json' },
        body: '{}',
      });
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({ error: 'Malformed Authorization header', code: 'UNAUTHORIZED' });
    });

    it('serves MCP over streamable HTTP', async () => {
      const client = new Client({ name: 'test-client', version: '1.0.0' }, { capabilities: {} });
      const transport = new StreamableHTTPClientTransport(new URL(`${base}/mcp`), {
        requestInit: { headers: { Authorization: 'Bearer request-secret' } },
      });
      await client.connect(transport);
      try {
        const { tools } = await client.listTools();
        expect(tools.map(t => t.name)).toContain('RunSqlQuery');

        const result = await client.callTool({ name: 'GetUsefulSystemTableNames', arguments: {} });
        expect(result.isError).toBeFalsy();
      } finally {
        await client.close();
      }
    });
  });
});
