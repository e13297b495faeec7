// ============================================================================
// Usage
// ============================================================================
// Organization usage records of the hosted platform, paged, plus the engines
// of the project in scope so engine usage can be named and attributed.
// ============================================================================

import { z } from 'zod';
import { ToolExecutionError } from '../../errors.js';
import type { QueryParams } from '../http.js';
import type { DremioConnection } from './client.js';

export const USAGE_TYPES = ['PROJECT', 'ENGINE'] as const;

export type UsageType = (typeof USAGE_TYPES)[number];

export const USAGE_WINDOW_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;
const PAGE_SIZE = 500;

export function parseUsageType(value: string): UsageType {
  const upper = value.trim().toUpperCase();
  const match = USAGE_TYPES.find(t => t === upper);
  if (!match) {
    throw new ToolExecutionError(
      'malformed-argument',
      `Unknown usage grouping "${value}" (expected one of ${USAGE_TYPES.join(', ')})`
    );
  }
  return match;
}

export const UsageRecord = z
  .object({
    id: z.string(),
    type: z.enum(USAGE_TYPES),
    startTime: z.string(),
    endTime: z.string(),
    usage: z.number(),
  })
  .passthrough();

export type UsageRecord = z.infer<typeof UsageRecord>;

const UsagePage = z.object({
  data: z.array(UsageRecord).default([]),
  previousPageToken: z.string().optional(),
  nextPageToken: z.string().optional(),
});

const Engine = z
  .object({
    id: z.string(),
    name: z.string().optional(),
  })
  .passthrough();

export type Engine = z.infer<typeof Engine>;

export interface UsageQuery {
  groupBy?: UsageType;
  start: Date;
  end?: Date;
  /** Restrict to one project or engine id */
  id?: string;
}

/** `start_time >= 1 && start_time <= 2 && id == 'x'` */
export function usageFilter(query: UsageQuery): string {
  const clauses = [`start_time >= ${query.start.getTime()}`];
  if (query.end) clauses.push(`start_time <= ${query.end.getTime()}`);
  if (query.id) clauses.push(`id == '${query.id.replace(/'/g, "\\'")}'`);
  return clauses.join(' && ');
}

/** Every page of usage for `query`, records with zero usage dropped */
export async function getUsage(conn: DremioConnection, query: UsageQuery): Promise<UsageRecord[]> {
  const params: QueryParams = {
    maxResults: PAGE_SIZE,
    filter: usageFilter(query),
    groupBy: query.groupBy,
  };

  const records: UsageRecord[] = [];
  let pageToken: string | undefined;
  do {
    const page = await conn.http.get('/v0/usage', UsagePage, { ...params, pageToken });
    records.push(...page.data.filter(r => r.usage > 0));
    pageToken = page.nextPageToken;
  } while (pageToken);

  return records;
}

export async function getEngines(conn: DremioConnection, projectId: string): Promise<Engine[]> {
  return conn.http.get(`/v0/projects/${encodeURIComponent(projectId)}/engines`, z.array(Engine));
}

export interface ProjectUsage {
  project_id: string;
  type: UsageType;
  startTime: string;
  endTime: string;
  usage: number;
}

export interface EngineUsage {
  engine_id: string;
  engine_name?: string;
  project_id: string;
  startTime: string;
  endTime: string;
  usage: number;
}

/**
 * Usage of the project in scope over the last week, per project or per
 * engine. Engine records of other projects are left out.
 *
 * @throws ToolExecutionError when no project is configured
 */
export async function buildUsageReport(
  conn: DremioConnection,
  by: UsageType,
  now: Date = new Date()
): Promise<ProjectUsage[] | EngineUsage[]> {
  const projectId = conn.settings.project_id;
  if (!projectId) {
    throw new ToolExecutionError('malformed-argument', 'Usage reports need dremio.project_id');
  }
  const start = new Date(now.getTime() - USAGE_WINDOW_DAYS * DAY_MS);

  if (by === 'PROJECT') {
    const records = await getUsage(conn, { start, id: projectId });
    return records.map(r => ({
      project_id: r.id,
      type: r.type,
      startTime: r.startTime,
      endTime: r.endTime,
      usage: r.usage,
    }));
  }

  const [engines, records] = await Promise.all([
    getEngines(conn, projectId),
    getUsage(conn, { start, groupBy: 'ENGINE' }),
  ]);
  const names = new Map(engines.map(e => [e.id, e.name]));

  return records
    .filter(r => names.has(r.id))
    .map(r => {
      const row: EngineUsage = {
        engine_id: r.id,
        project_id: projectId,
        startTime: r.startTime,
        endTime: r.endTime,
        usage: r.usage,
      };
      const name = names.get(r.id);
      if (name !== undefined) row.engine_name = name;
      return row;
    });
}
