// ============================================================================
// SQL Domain Tools
// ============================================================================

import { connect } from '../../api/dremio/client.js';
import { runQuery } from '../../api/dremio/sql.js';
import { stringArg } from '../arguments.js';
import { ensureQueryAllowed } from './guard.js';
import type { ToolDefinition } from '../types.js';

/** Marks jobs submitted by this server in the job history */
export function submitterComment(tool: string): string {
  return `/* dremioai: submitter=${tool} */`;
}

export const runSqlQueryTool: ToolDefinition = {
  name: 'RunSqlQuery',
  description: [
    'Run a SELECT SQL query on the Dremio cluster and return the results.',
    "Ensure that SQL keywords like 'day', 'month', 'count', 'table' etc are enclosed in double quotes.",
    'Only SELECT queries are permitted; DML and DDL statements are rejected.',
  ].join('\n'),
  params: [
    { name: 'query', type: 'string', required: true, description: 'The SQL query to run' },
  ],
  modes: ['FOR_SELF', 'FOR_DATA_PATTERNS'],
  kind: 'tool',
  execute: async (args, { settings, signal }) => {
    const query = stringArg(args, 'query');
    ensureQueryAllowed(query, settings.dremio?.allow_dml ?? false);

    const conn = connect(settings, signal);
    const result = await runQuery(conn, `${submitterComment('RunSqlQuery')}\n${query}`, { signal });
    return {
      rows: result.rows,
      columns: result.columns,
      types: result.types,
      row_count: result.rowCount,
    };
  },
};

export const sqlTools: ToolDefinition[] = [runSqlQueryTool];
