// ============================================================================
// Read-only SQL Guard
// ============================================================================
// Statements are checked after comments, string literals and quoted
// identifiers are blanked out, so `SELECT 'drop'` and `SELECT "update"` pass
// while `SELECT 1; DROP TABLE t` does not.
// ============================================================================

import { ToolExecutionError } from '../../errors.js';

const READ_ONLY_START = /^(select|with|values|explain|show|describe|desc)\b|^\(/i;
const MUTATING_KEYWORD = /\b(drop|insert|update|truncate|delete|copy\s+into|alter|create|merge|grant|revoke|optimize|vacuum)\b/i;

/** Replace comments, '...' literals and "..." identifiers with a space */
export function stripLiterals(sql: string): string {
  let out = '';
  let i = 0;
  while (i < sql.length) {
    const ch = sql[i];
    const next = sql[i + 1];

    if (ch === '-' && next === '-') {
      const end = sql.indexOf('\n', i);
      i = end === -1 ? sql.length : end;
      out += ' ';
    } else if (ch === '/' && next === '*') {
      const end = sql.indexOf('*/', i + 2);
      i = end === -1 ? sql.length : end + 2;
      out += ' ';
    } else if (ch === "'" || ch === '"') {
      i++;
      while (i < sql.length) {
        if (sql[i] === ch && sql[i + 1] === ch) {
          i += 2;
        } else if (sql[i] === ch) {
          i++;
          break;
        } else {
          i++;
        }
      }
      out += ' ';
    } else {
      out += ch;
      i++;
    }
  }
  return out;
}

/** Non-empty statements of a script, literals stripped */
export function statements(sql: string): string[] {
  return stripLiterals(sql)
    .split(';')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export function isReadOnlyQuery(sql: string): boolean {
  const parts = statements(sql);
  if (parts.length === 0) return false;
  return parts.every(s => READ_ONLY_START.test(s) && !MUTATING_KEYWORD.test(s));
}

/**
 * @throws ToolExecutionError (mutation-not-allowed) unless the query only reads
 */
export function ensureQueryAllowed(sql: string, allowDml: boolean): void {
  if (allowDml) return;
  if (!isReadOnlyQuery(sql)) {
    throw new ToolExecutionError(
      'mutation-not-allowed',
      'The query contains a DML or DDL statement. Only SELECT queries are allowed'
    );
  }
}
