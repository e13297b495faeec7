import { describe, it, expect } from 'vitest';
import { isReadOnlyQuery, ensureQueryAllowed, stripLiterals, statements } from '../../src/tools/sql/guard.js';
import { ToolExecutionError } from '../../src/errors.js';

describe('Read-only SQL guard', () => {
  it.each([
    'SELECT 1',
    'select * from sys.jobs_recent limit 10',
    'WITH t AS (SELECT 1 AS x) SELECT x FROM t',
    "SELECT 'drop table x' AS note",
    'SELECT "update" FROM t',
    '-- delete everything\nSELECT 1',
    'EXPLAIN PLAN FOR SELECT 1',
    '(SELECT 1) UNION (SELECT 2)',
    'SELECT 1;',
  ])('allows %s', sql => {
    expect(isReadOnlyQuery(sql)).toBe(true);
  });

  it.each([
    'DROP TABLE x',
    'delete from t where 1 = 1',
    'INSERT INTO t VALUES (1)',
    'SELECT 1; DROP TABLE t',
    'CREATE TABLE t AS SELECT 1',
    'WITH t AS (SELECT 1) INSERT INTO u SELECT * FROM t',
    'COPY INTO t FROM \'@s3/bucket\'',
    'OPTIMIZE TABLE t',
    '',
    '/* only a comment */',
  ])('rejects %s', sql => {
    expect(isReadOnlyQuery(sql)).toBe(false);
  });

  it('blanks literals, identifiers and comments', () => {
    expect(stripLiterals("a 'it''s' b \"c\" /* d */ e -- f")).toBe('a   b     e  ');
    expect(statements("SELECT ';'; SELECT 2")).toEqual(['SELECT', 'SELECT 2']);
  });

  it('raises mutation-not-allowed unless DML is allowed', () => {
    let caught: unknown;
    try {
      ensureQueryAllowed('DROP TABLE x', false);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ToolExecutionError);
    expect(caught).toMatchObject({ category: 'mutation-not-allowed' });

    expect(() => ensureQueryAllowed('DROP TABLE x', true)).not.toThrow();
  });
});
