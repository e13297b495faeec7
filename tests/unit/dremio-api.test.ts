import { describe, it, expect, afterEach, vi } from 'vitest';
import { connect, projectEndpoint } from '../../src/api/dremio/client.js';
import { runQuery, fetchResults, waitForJob } from '../../src/api/dremio/sql.js';
import { splitPath, quotePath, getDescriptions, getLineage } from '../../src/api/dremio/catalog.js';
import { search, categoryFilter, parseCategory } from '../../src/api/dremio/search.js';
import { prometheusClient, queryRange, metricSchema } from '../../src/api/prometheus.js';
import { validateSettings } from '../../src/settings/loader.js';
import { ToolExecutionError } from '../../src/errors.js';
import { createFakeUpstream, withSqlJob } from '../utils/fake-upstream.js';

const settings = validateSettings({
  dremio: { uri: 'https://dremio.test', pat: 'test-secret' },
  prometheus: { uri: 'http://prometheus.test:9090', token: 'test-token' },
});

async function failureOf(promise: Promise<unknown>): Promise<ToolExecutionError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof ToolExecutionError) return err;
    throw err;
  }
  throw new Error('expected a ToolExecutionError');
}

describe('Data platform API', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('connection', () => {
    it('uses project-scoped endpoints when a project id is set', () => {
      const cloud = validateSettings({ dremio: { uri: 'PROD', pat: 'test-secret', project_id: 'p-1' } });
      expect(cloud.dremio && projectEndpoint(cloud.dremio)).toBe('/v0/projects/p-1');
      expect(settings.dremio && projectEndpoint(settings.dremio)).toBe('/api/v3');
    });

    it('refuses to connect without a uri or token', () => {
      expect(() => connect(validateSettings({}))).toThrow('dremio.uri is not configured');
      const noPat = validateSettings({ dremio: { uri: 'PROD' } });
      let caught: unknown;
      try {
        connect(noPat);
      } catch (err) {
        caught = err;
      }
      expect(caught).toMatchObject({ category: 'permission-denied', message: 'dremio.pat is not configured' });
    });
  });

  describe('sql', () => {
    it('pages through every result row', async () => {
      const rows = [1, 2, 3, 4, 5].map(n => ({ n }));
      const upstream = withSqlJob(createFakeUpstream(), { columns: [{ name: 'n', type: 'INTEGER' }], rows }).install();

      const result = await fetchResults(connect(settings), 'job-1', { pageSize: 2 });

      expect(result).toEqual({ columns: ['n'], types: { n: 'INTEGER' }, rows, rowCount: 5 });
      expect(upstream.requests.map(r => r.url.search)).toEqual([
        '?offset=0&limit=2',
        '?offset=2&limit=2',
        '?offset=4&limit=2',
      ]);
    });

    it('polls until the job is terminal', async () => {
      const states = ['ENQUEUED', 'RUNNING', 'COMPLETED'];
      const upstream = createFakeUpstream()
        .on('GET', '/api/v3/job/j', () => ({ body: { jobState: states.shift() ?? 'COMPLETED', rowCount: 0 } }))
        .install();

      const job = await waitForJob(connect(settings), 'j', { pollIntervalMs: 1 });
      expect(job.jobState).toBe('COMPLETED');
      expect(upstream.requests).toHaveLength(3);
    });

    it('reports a failed job as a malformed query', async () => {
      createFakeUpstream()
        .on('POST', '/api/v3/sql', { body: { id: 'j' } })
        .on('GET', '/api/v3/job/j', { body: { jobState: 'FAILED', errorMessage: "Table 'x' not found" } })
        .install();

      const error = await failureOf(runQuery(connect(settings), 'SELECT * FROM x'));
      expect(error.category).toBe('malformed-query');
      expect(error.message).toBe("Job j failed: Table 'x' not found");
    });

    it('skips the results call for an empty job', async () => {
      const upstream = withSqlJob(createFakeUpstream(), { columns: [], rows: [] }).install();

      const result = await runQuery(connect(settings), 'SELECT 1 WHERE FALSE');
      expect(result).toEqual({ columns: [], types: {}, rows: [], rowCount: 0 });
      expect(upstream.requests.map(r => `${r.method} ${r.url.pathname}`)).toEqual([
        'POST /api/v3/sql',
        'GET /api/v3/job/job-1',
      ]);
    });
  });

  describe('catalog', () => {
    it.each([
      ['space.folder.table', ['space', 'folder', 'table']],
      ['space."my.folder".t', ['space', 'my.folder', 't']],
      ['"say ""hi""".t', ['say "hi"', 't']],
      [' a . b ', ['a', 'b']],
    ])('splits %s', (name, expected) => {
      expect(splitPath(name)).toEqual(expected);
    });

    it.each(['a..b', '"open.b', ''])('rejects %s', name => {
      expect(() => splitPath(name)).toThrow(ToolExecutionError);
    });

    it('quotes every component', () => {
      expect(quotePath(['space', 'say "hi"'])).toBe('"space"."say ""hi"""');
    });

    it('collects descriptions of datasets and their parents', async () => {
      createFakeUpstream()
        .on('GET', '/api/v3/catalog/by-path/space/orders', { body: { id: 'o', path: ['space', 'orders'] } })
        .on('GET', '/api/v3/catalog/o/collaboration/tag', { body: { tags: ['finance'] } })
        .on('GET', '/api/v3/catalog/o/collaboration/wiki', { body: { text: 'Orders table' } })
        .on('GET', '/api/v3/catalog/by-path/space', { body: { id: 's', path: ['space'] } })
        .on('GET', '/api/v3/catalog/s/collaboration/wiki', { body: { text: 'Sales space' } })
        .install();

      const descriptions = await getDescriptions(connect(settings), [['space', 'orders'], ['space', 'orders']]);
      expect(descriptions).toEqual({
        '"space"."orders"': { description: 'Orders table', tags: ['finance'] },
        '"space"': { description: 'Sales space' },
      });
    });

    it('resolves dotted names before reading lineage', async () => {
      const upstream = createFakeUpstream()
        .on('GET', '/api/v3/catalog/by-path/space/v', { body: { id: 'v-1', path: ['space', 'v'] } })
        .on('GET', '/api/v3/catalog/v-1/graph', {
          body: { parents: [{ id: 't-1', path: ['space', 't'], type: 'DATASET' }] },
        })
        .install();

      const lineage = await getLineage(connect(settings), 'space.v');
      expect(lineage).toEqual({
        sources: [],
        parents: [{ id: 't-1', path: ['space', 't'], type: 'DATASET' }],
        children: [],
      });
      expect(upstream.requests).toHaveLength(2);
    });
  });

  describe('search', () => {
    it('builds category filters', () => {
      expect(categoryFilter(undefined)).toBe('');
      expect(categoryFilter([parseCategory('table'), 'VIEW'])).toBe('category in ["TABLE","VIEW"]');
      expect(() => parseCategory('FILES')).toThrow(ToolExecutionError);
    });

    it('follows page tokens', async () => {
      const pages = [
        { results: [{ category: 'TABLE' }], nextPageToken: 't2' },
        { results: [{ category: 'VIEW' }] },
      ];
      const upstream = createFakeUpstream()
        .on('POST', '/api/v3/search', () => ({ body: pages.shift() ?? { results: [] } }))
        .install();

      const results = await search(connect(settings), { query: 'orders' });
      expect(results).toEqual([{ category: 'TABLE' }, { category: 'VIEW' }]);
      expect(upstream.requests.map(r => r.body)).toEqual([
        { query: 'orders', filter: '', maxResults: 50 },
        { query: 'orders', filter: '', maxResults: 50, pageToken: 't2' },
      ]);
    });

    it('surfaces search errors as malformed queries', async () => {
      createFakeUpstream().on('POST', '/api/v3/search', { body: { errorMessage: 'bad filter' } }).install();
      const error = await failureOf(search(connect(settings), { query: 'x' }));
      expect(error.category).toBe('malformed-query');
      expect(error.message).toBe('Search failed: bad filter');
    });
  });

  describe('prometheus', () => {
    it('flattens range query series into points', async () => {
      const upstream = createFakeUpstream()
        .on('GET', '/api/v1/query_range', {
          body: {
            status: 'success',
            data: {
              resultType: 'matrix',
              result: [
                {
                  metric: { __name__: 'jobs_total', instance: 'coord-0' },
                  values: [[1700000000, '12'], [1700003600, '15']],
                },
              ],
            },
          },
        })
        .install();

      const points = await queryRange(prometheusClient(settings), { query: 'jobs_total', start: '-7d', step: '1h' });

      expect(points).toEqual([
        { time: '2023-11-14T22:13:20.000Z', value: 12, labels: 'instance=coord-0', name: 'jobs_total' },
        { time: '2023-11-14T23:13:20.000Z', value: 15, labels: 'instance=coord-0', name: 'jobs_total' },
      ]);
      expect(upstream.requests[0].url.searchParams.get('start')).toBe('-7d');
      expect(upstream.requests[0].headers.get('authorization')).toBe('Bearer test-token');
    });

    it('returns the labels of the first series as the schema', async () => {
      createFakeUpstream()
        .on('GET', '/api/v1/query_range', {
          body: { status: 'success', data: { resultType: 'matrix', result: [{ metric: { engine_id: 'e1' }, values: [] }] } },
        })
        .install();
      await expect(metricSchema(prometheusClient(settings), 'dremio_engine_executors')).resolves.toEqual({ engine_id: 'e1' });
    });

    it('reports query errors as malformed queries', async () => {
      createFakeUpstream()
        .on('GET', '/api/v1/query_range', { body: { status: 'error', errorType: 'bad_data', error: 'parse error' } })
        .install();
      const error = await failureOf(queryRange(prometheusClient(settings), { query: 'rate(' }));
      expect(error.category).toBe('malformed-query');
      expect(error.message).toBe('PromQL query failed: parse error');
    });

    it('requires a prometheus section', () => {
      expect(() => prometheusClient(validateSettings({}))).toThrow('prometheus.uri is not configured');
    });
  });
});
