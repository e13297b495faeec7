// ============================================================================
// Jobs Domain Tools
// ============================================================================
// Job history analysis over the jobs_recent system table, project usage
// reports, plus the cluster analysis hints resource.
// ============================================================================

import { connect } from '../../api/dremio/client.js';
import { runQuery } from '../../api/dremio/sql.js';
import { buildUsageReport, parseUsageType } from '../../api/dremio/usage.js';
import { stringArg } from '../arguments.js';
import { submitterComment } from '../sql/index.js';
import type { DremioSettings } from '../../settings/schema.js';
import type { ToolDefinition } from '../types.js';

export const HINTS_URI = 'dremio://hints';

export const HINTS_TEXT = [
  'Dremio cluster has few key dimensions that can be used to analyze and optimize the cluster.',
  'Look at the number of jobs, their statistics and failure rates, and the overall system usage.',
].join('\n');

/** Project-scoped deployments expose job history under sys.project */
export function jobsRecentTable(dremio: DremioSettings | undefined): string {
  return dremio?.project_id ? 'sys.project.jobs_recent' : 'sys.jobs_recent';
}

export function failedJobsQuery(table: string): string {
  return `${submitterComment('GetFailedJobDetails')}
select job_id as id,
  query_type as queryType,
  status as state,
  submitted_ts as startTime,
  query,
  (final_state_epoch_millis - submitted_epoch_millis) / 1000 as duration,
  queried_datasets as queriedDatasets,
  user_name as "user",
  engine,
  error_msg
from ${table}
where to_date(submitted_ts) >= current_date - interval '7' day
  and status in ('CANCELED', 'FAILED')`;
}

type Row = Record<string, unknown>;

function dayOf(value: unknown): string {
  return typeof value === 'string' ? value.slice(0, 10) : String(value ?? '');
}

/** One row per queried dataset; rows without datasets are kept once */
function explodeDatasets(rows: Row[]): Row[] {
  return rows.flatMap(row => {
    const raw = row.queriedDatasets;
    const datasets: unknown[] = Array.isArray(raw) ? raw : raw === undefined || raw === null ? [] : [raw];
    if (datasets.length === 0) return [{ ...row, queriedDatasets: null }];
    return datasets.map(ds => ({ ...row, queriedDatasets: ds }));
  });
}

/** `GROUP BY keys` with a `count` column, first-seen order */
export function groupCount(rows: Row[], keys: string[]): Row[] {
  const groups = new Map<string, Row>();
  for (const row of rows) {
    const values = keys.map(k => row[k] ?? null);
    const id = JSON.stringify(values);
    const existing = groups.get(id);
    if (existing) {
      existing.count = Number(existing.count) + 1;
    } else {
      const group: Row = {};
      keys.forEach((k, i) => { group[k] = values[i]; });
      group.count = 1;
      groups.set(id, group);
    }
  }
  return [...groups.values()];
}

export const getFailedJobDetailsTool: ToolDefinition = {
  name: 'GetFailedJobDetails',
  description: [
    'Get the stats and details of failed or canceled jobs executed in the Dremio cluster in the past 7 days',
    'along with a split by job type, engine, user, queried dataset and error.',
  ].join('\n'),
  params: [],
  modes: ['FOR_SELF'],
  kind: 'tool',
  execute: async (_args, { settings, signal }) => {
    const conn = connect(settings, signal);
    const result = await runQuery(conn, failedJobsQuery(jobsRecentTable(settings.dremio)), { signal });
    const rows = result.rows.map(r => ({ ...r, date: dayOf(r.startTime) }));

    return {
      'Number of jobs over 7 days': rows.length,
      'Job categories by day, queryType and state': groupCount(rows, ['date', 'queryType', 'state']),
      'Job count by day, queryType and engine': groupCount(rows, ['date', 'queryType', 'engine']),
      'Job count by day, queryType, user': groupCount(rows, ['date', 'queryType', 'user']),
      'Job count by day, queriedDataset and state': groupCount(explodeDatasets(rows), ['date', 'queriedDatasets', 'state']),
      'Job count by day, queryType and error': groupCount(rows, ['date', 'queryType', 'error_msg']),
    };
  },
};

export const getNameOfJobsRecentTableTool: ToolDefinition = {
  name: 'GetNameOfJobsRecentTable',
  description: 'Gets the schema full name of the table that stores the jobs information',
  params: [],
  modes: ['FOR_SELF'],
  kind: 'tool',
  execute: async (_args, { settings }) => ({ name: jobsRecentTable(settings.dremio) }),
};

export const buildUsageReportTool: ToolDefinition = {
  name: 'BuildUsageReport',
  description: [
    'Build a usage report for the project grouped by engines for the past 7 days',
    '',
    'Hint: This is useful to plot a visualization',
  ].join('\n'),
  params: [
    {
      name: 'by',
      type: 'string',
      required: false,
      default: 'ENGINE',
      description: "grouping the usage by 'PROJECT' or 'ENGINE'",
    },
  ],
  modes: ['FOR_SELF'],
  kind: 'tool',
  requiresProjectId: true,
  execute: async (args, { settings, signal }) => {
    const by = parseUsageType(stringArg(args, 'by'));
    return buildUsageReport(connect(settings, signal), by);
  },
};

export const hintsResource: ToolDefinition = {
  name: 'Hints',
  description: HINTS_TEXT,
  params: [],
  modes: ['FOR_SELF'],
  kind: 'resource',
  uri: HINTS_URI,
  execute: async () => HINTS_TEXT,
};

export const jobsTools: ToolDefinition[] = [
  getFailedJobDetailsTool,
  getNameOfJobsRecentTableTool,
  buildUsageReportTool,
  hintsResource,
];
