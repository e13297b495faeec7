import { describe, it, expect, afterEach, vi } from 'vitest';
import { z } from 'zod';
import { HttpClient, categorizeStatus } from '../../src/api/http.js';
import { ToolExecutionError } from '../../src/errors.js';
import { createFakeUpstream, type FakeResponse } from '../utils/fake-upstream.js';

const Body = z.object({ ok: z.boolean() });

async function failureOf(promise: Promise<unknown>): Promise<ToolExecutionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ToolExecutionError) return err;
    throw err;
  }
  throw new Error('expected a ToolExecutionError');
}

describe('HTTP client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it.each([
    [401, 'permission-denied'],
    [403, 'permission-denied'],
    [404, 'malformed-argument'],
    [400, 'malformed-query'],
    [409, 'malformed-query'],
    [500, 'upstream-unreachable'],
    [503, 'upstream-unreachable'],
  ])('categorizes status %i as %s', (status, category) => {
    expect(categorizeStatus(status)).toBe(category);
  });

  it('sends the bearer token and query parameters', async () => {
    const upstream = createFakeUpstream().on('GET', '/api/v3/thing', { body: { ok: true } }).install();
    const client = new HttpClient({ baseUrl: 'https://dremio.test/', token: 'test-secret' });

    await expect(client.get('/api/v3/thing', Body, { limit: 5, skip: undefined })).resolves.toEqual({ ok: true });

    const [req] = upstream.requests;
    expect(req.url.toString()).toBe('https://dremio.test/api/v3/thing?limit=5');
    expect(req.headers.get('authorization')).toBe('Bearer test-secret');
  });

  it('posts JSON bodies', async () => {
    const upstream = createFakeUpstream().on('POST', '/api/v3/sql', { body: { ok: true } }).install();
    const client = new HttpClient({ baseUrl: 'https://dremio.test' });

    await client.post('/api/v3/sql', { sql: 'SELECT 1' }, Body);

    expect(upstream.requests[0].body).toEqual({ sql: 'SELECT 1' });
    expect(upstream.requests[0].headers.get('content-type')).toBe('application/json');
    expect(upstream.requests[0].headers.get('authorization')).toBeNull();
  });

  it('carries the upstream error message into the failure', async () => {
    createFakeUpstream()
      .on('GET', '/api/v3/catalog/by-path/nope', { status: 404, body: { errorMessage: 'Could not find entity' } })
      .install();
    const client = new HttpClient({ baseUrl: 'https://dremio.test', token: 'test-secret' });

    const error = await failureOf(client.get('/api/v3/catalog/by-path/nope', Body));
    expect(error.category).toBe('malformed-argument');
    expect(error.message).toBe(
      'GET https://dremio.test/api/v3/catalog/by-path/nope returned 404: Could not find entity'
    );
  });

  it('maps authentication failures to permission-denied', async () => {
    createFakeUpstream().on('GET', '/x', { status: 401, text: 'Unauthorized' }).install();
    const client = new HttpClient({ baseUrl: 'https://dremio.test', token: 'test-secret' });

    const error = await failureOf(client.get('/x', Body));
    expect(error.category).toBe('permission-denied');
    expect(error.message).toBe('GET https://dremio.test/x returned 401: Unauthorized');
  });

  it('maps network failures to upstream-unreachable', async () => {
    vi.stubGlobal('fetch', async () => {
      throw new TypeError('fetch failed');
    });
    const client = new HttpClient({ baseUrl: 'https://dremio.test' });

    const error = await failureOf(client.get('/x', Body));
    expect(error.category).toBe('upstream-unreachable');
    expect(error.message).toBe('Cannot reach https://dremio.test/x: fetch failed');
  });

  it('rejects bodies that do not match the expected shape', async () => {
    createFakeUpstream().on('GET', '/x', { body: { ok: 'yes' } }).install();
    const client = new HttpClient({ baseUrl: 'https://dremio.test' });

    const error = await failureOf(client.get('/x', Body));
    expect(error.category).toBe('upstream-unreachable');
    expect(error.message).toContain('returned an unexpected body: ok:');
  });

  it('rejects invalid JSON', async () => {
    createFakeUpstream().on('GET', '/x', { text: '<html>' }).install();
    const client = new HttpClient({ baseUrl: 'https://dremio.test' });

    const error = await failureOf(client.get('/x', Body));
    expect(error.message).toBe('GET https://dremio.test/x returned invalid JSON');
  });

  it('rethrows the abort rather than categorizing it', async () => {
    createFakeUpstream().on('GET', '/x', () => new Promise<FakeResponse>(() => undefined)).install();
    const controller = new AbortController();
    const client = new HttpClient({ baseUrl: 'https://dremio.test', signal: controller.signal });

    const pending = client.get('/x', Body);
    controller.abort('stop');
    await expect(pending).rejects.toBe('stop');
  });
});
