// ============================================================================
// Prometheus Client
// ============================================================================
// Range queries against a Prometheus-compatible API (VictoriaMetrics accepts
// relative starts such as `-7d`).
// ============================================================================

import { z } from 'zod';
import { ToolExecutionError } from '../errors.js';
import { HttpClient } from './http.js';
import type { Settings } from '../settings/schema.js';

const Sample = z.tuple([z.number(), z.union([z.string(), z.number()])]);

const Series = z
  .object({
    metric: z.record(z.string()),
    values: z.array(Sample).optional(),
    value: Sample.optional(),
  })
  .passthrough();

const QueryResponse = z
  .object({
    status: z.enum(['success', 'error']),
    data: z
      .object({
        resultType: z.string(),
        result: z.array(Series),
      })
      .optional(),
    errorType: z.string().optional(),
    error: z.string().optional(),
  })
  .passthrough();

export interface MetricPoint {
  time: string;
  value: number;
  /** `k=v` pairs without the internal `__` labels */
  labels: string;
  name?: string;
}

export interface RangeQuery {
  query: string;
  start?: string;
  end?: string;
  step?: string;
}

export function prometheusClient(settings: Settings, signal?: AbortSignal): HttpClient {
  const prometheus = settings.prometheus;
  if (!prometheus) {
    throw new ToolExecutionError('upstream-unreachable', 'prometheus.uri is not configured');
  }
  return new HttpClient({ baseUrl: prometheus.uri, token: prometheus.token, signal });
}

function labelString(metric: Record<string, string>): string {
  return Object.entries(metric)
    .filter(([k]) => !k.startsWith('__'))
    .map(([k, v]) => `${k}=${v}`)
    .join(',');
}

async function queryRangeSeries(client: HttpClient, query: RangeQuery): Promise<z.infer<typeof Series>[]> {
  const response = await client.get('/api/v1/query_range', QueryResponse, {
    query: query.query,
    start: query.start,
    end: query.end,
    step: query.step,
  });
  if (response.status === 'error') {
    throw new ToolExecutionError('malformed-query', `PromQL query failed: ${response.error ?? response.errorType ?? 'unknown error'}`);
  }
  return response.data?.result ?? [];
}

/** Flatten every series of a range query into one row per sample */
export async function queryRange(client: HttpClient, query: RangeQuery): Promise<MetricPoint[]> {
  const series = await queryRangeSeries(client, query);
  const points: MetricPoint[] = [];
  for (const s of series) {
    const samples = s.values ?? (s.value ? [s.value] : []);
    const labels = labelString(s.metric);
    for (const [ts, raw] of samples) {
      points.push({
        time: new Date(ts * 1000).toISOString(),
        value: Number(raw),
        labels,
        ...(s.metric.__name__ ? { name: s.metric.__name__ } : {}),
      });
    }
  }
  return points;
}

/** Labels of the first series of `metric` over the last 30 minutes */
export async function metricSchema(client: HttpClient, metric: string): Promise<Record<string, string>> {
  const series = await queryRangeSeries(client, { query: metric, start: '-30m' });
  return series.length > 0 ? series[0].metric : {};
}
