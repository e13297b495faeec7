// ============================================================================
// SQL Jobs
// ============================================================================
// submit (POST /sql) -> poll (GET /job/<id>) until terminal -> page through
// GET /job/<id>/results.
// ============================================================================

import { setTimeout as sleep } from 'timers/promises';
import { z } from 'zod';
import { debug } from '../../config.js';
import { ToolExecutionError } from '../../errors.js';
import type { DremioConnection } from './client.js';

export const RESULTS_PAGE_SIZE = 500;
export const POLL_INTERVAL_MS = 500;

const TERMINAL_STATES = new Set(['COMPLETED', 'CANCELED', 'FAILED']);

const QuerySubmission = z.object({ id: z.string() }).passthrough();

export const JobStatus = z
  .object({
    jobState: z.string(),
    rowCount: z.number().int().nonnegative().optional(),
    errorMessage: z.string().optional(),
    cancellationReason: z.string().optional(),
  })
  .passthrough();

export type JobStatus = z.infer<typeof JobStatus>;

const JobResultsPage = z
  .object({
    rowCount: z.number().int().nonnegative(),
    schema: z.array(z.object({ name: z.string(), type: z.object({ name: z.string() }).passthrough() }).passthrough()).optional(),
    rows: z.array(z.record(z.unknown())),
  })
  .passthrough();

export interface QueryResult {
  columns: string[];
  /** Column name -> data-platform type name */
  types: Record<string, string>;
  rows: Record<string, unknown>[];
  rowCount: number;
}

export interface RunQueryOptions {
  signal?: AbortSignal;
  pollIntervalMs?: number;
  pageSize?: number;
}

export async function submitQuery(conn: DremioConnection, sql: string): Promise<string> {
  const submission = await conn.http.post(`${conn.endpoint}/sql`, { sql }, QuerySubmission);
  debug(`SQL: submitted job ${submission.id}`);
  return submission.id;
}

/**
 * Poll until the job reaches a terminal state.
 *
 * @throws ToolExecutionError when the job failed or was cancelled upstream
 */
export async function waitForJob(conn: DremioConnection, jobId: string, options: RunQueryOptions = {}): Promise<JobStatus> {
  const interval = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  let job = await conn.http.get(`${conn.endpoint}/job/${jobId}`, JobStatus);
  while (!TERMINAL_STATES.has(job.jobState)) {
    await sleep(interval, undefined, options.signal ? { signal: options.signal } : undefined);
    job = await conn.http.get(`${conn.endpoint}/job/${jobId}`, JobStatus);
  }

  if (job.jobState === 'FAILED') {
    throw new ToolExecutionError('malformed-query', `Job ${jobId} failed: ${job.errorMessage ?? 'Unknown error'}`);
  }
  if (job.jobState === 'CANCELED') {
    throw new ToolExecutionError(
      'upstream-unreachable',
      `Job ${jobId} failed: ${job.errorMessage ?? job.cancellationReason ?? 'cancelled upstream'}`
    );
  }
  return job;
}

export async function fetchResults(conn: DremioConnection, jobId: string, options: RunQueryOptions = {}): Promise<QueryResult> {
  const limit = options.pageSize ?? RESULTS_PAGE_SIZE;
  const rows: Record<string, unknown>[] = [];
  let columns: string[] = [];
  const types: Record<string, string> = {};
  let total = Number.POSITIVE_INFINITY;

  while (rows.length < total) {
    const page = await conn.http.get(`${conn.endpoint}/job/${jobId}/results`, JobResultsPage, {
      offset: rows.length,
      limit,
    });
    total = page.rowCount;
    if (columns.length === 0 && page.schema) {
      columns = page.schema.map(c => c.name);
      for (const c of page.schema) types[c.name] = c.type.name;
    }
    if (page.rows.length === 0) break;
    rows.push(...page.rows);
  }

  return { columns, types, rows, rowCount: rows.length };
}

/** Submit, wait and collect every row */
export async function runQuery(conn: DremioConnection, sql: string, options: RunQueryOptions = {}): Promise<QueryResult> {
  const jobId = await submitQuery(conn, sql);
  const job = await waitForJob(conn, jobId, options);
  if (job.rowCount === 0) {
    return { columns: [], types: {}, rows: [], rowCount: 0 };
  }
  return fetchResults(conn, jobId, options);
}
