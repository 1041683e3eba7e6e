import QueryEngine from '../engine';
import { ConfigError } from '../errors';
import { explain } from '../planner';
import { toScalar } from '../value';
import { createCompany, silentLogger } from './fixtures';

describe('QueryEngine', () => {
  let engine: QueryEngine;
  beforeEach(() => {
    engine = new QueryEngine(createCompany(), { logger: silentLogger });
  });
  it('should execute queries', () => {
    let result = engine.execute('SELECT name FROM employees WHERE id = 2');
    if (!result.ok) throw result.error;
    expect(result.value.rows.map(row => toScalar(row.name))).toEqual(['Bob']);
  });
  it('should report query errors as results', () => {
    let result = engine.execute('SELECT nme FROM employees');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('unknown_column');
  });
  it('should explain like the standalone planner', () => {
    let sql = 'SELECT * FROM employees WHERE dept_id = 2';
    expect(engine.explain(sql)).toEqual(
      explain(sql, createCompany(), { logger: silentLogger }));
    expect(engine.explain(sql).rows[0].type).toBe('ref');
  });
  it('should compare indexes per table', () => {
    let tables = engine.compareIndexes(
      'SELECT * FROM employees WHERE dept_id = 2');
    expect(tables.map(table => table.table)).toEqual(['employees']);
  });
  it('should analyze queries', () => {
    let analysis = engine.analyze('SELECT * FROM employees');
    expect(analysis.error).toBeNull();
    expect(analysis.result?.rowCount).toBe(8);
    expect(analysis.issues.map(issue => issue.code)).toContain('select_star');
  });
  it('should build indexes at the configured order', () => {
    expect(engine.buildIndex('employees', 'salary').order).toBe(4);
    let wide = new QueryEngine(createCompany(),
      { logger: silentLogger, btreeOrder: 8 });
    let tree = wide.buildIndex('employees', 'salary');
    expect(tree.order).toBe(8);
    expect(tree.search(70000).value).toBe(2);
  });
  it('should reject invalid options up front', () => {
    expect(() => new QueryEngine(createCompany(), { btreeOrder: 2 }))
      .toThrow(ConfigError);
  });
});
