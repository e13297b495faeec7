// ============================================================================
// Metrics Domain Tools
// ============================================================================

import { prometheusClient, queryRange, metricSchema } from '../../api/prometheus.js';
import { stringArg } from '../arguments.js';
import type { ToolDefinition } from '../types.js';

export const RELEVANT_METRICS: Record<string, string> = {
  jobs_total: 'Total number of jobs executed in the Dremio cluster',
  jobs_failed_total: 'Total number of failed jobs executed in the Dremio cluster',
  jobs_command_pool_queue_size: 'Total number of jobs queued before planning',
  jvm_gc_pause_seconds:
    'Indicates how long the JVM was paused for garbage collection, and also is a rubric to know if the system is in use',
  memory_heap_usage: 'Indicates the amount of memory used by the JVM',
  memory_heap_committed: 'Indicates the amount of memory committed by the JVM',
  dremio_engine_executors:
    'Number of executors running in the Dremio engine. It correlates to dremio_engine_replica_running using engine_id label',
  dremio_engine_replica_running:
    'Number of running replicas in the Dremio engine. It correlates to dremio_engine_executors using engine_id label',
};

export const getRelevantMetricsTool: ToolDefinition = {
  name: 'GetRelevantMetrics',
  description: [
    'Get the names and descriptions of the relevant prometheus metrics for the Dremio cluster.',
    "Metrics sharing the same value for label 'daas_dremio_com_coordinator_project_id' belong to the same project.",
  ].join('\n'),
  params: [],
  modes: ['FOR_PROMETHEUS'],
  kind: 'tool',
  execute: async () => RELEVANT_METRICS,
};

export const getMetricSchemaTool: ToolDefinition = {
  name: 'GetMetricSchema',
  description: 'Given the name of a metric, returns the labels it carries with a sample value for each',
  params: [
    { name: 'metric', type: 'string', required: true, description: 'The name of the metric' },
  ],
  modes: ['FOR_PROMETHEUS'],
  kind: 'tool',
  execute: async (args, { settings, signal }) =>
    metricSchema(prometheusClient(settings, signal), stringArg(args, 'metric')),
};

export const runPromQLTool: ToolDefinition = {
  name: 'RunPromQL',
  description: 'Runs a prometheus query over the last 7 days at 1h resolution and returns the results',
  params: [
    { name: 'promql_query', type: 'string', required: true, description: 'The PromQL query to run' },
  ],
  modes: ['FOR_PROMETHEUS'],
  kind: 'tool',
  execute: async (args, { settings, signal }) => {
    const metrics = await queryRange(prometheusClient(settings, signal), {
      query: stringArg(args, 'promql_query'),
      start: '-7d',
      step: '1h',
    });
    return {
      metrics,
      columns: ['time', 'value', 'labels', 'name'],
      row_count: metrics.length,
    };
  },
};

export const metricsTools: ToolDefinition[] = [
  getRelevantMetricsTool,
  getMetricSchemaTool,
  runPromQLTool,
];
