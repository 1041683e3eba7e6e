import analyze from '../../analyzer';
import execute from '../../executor';
import MemoryDataset from '../../dataset/memory';
import { EmptyQueryError, UnsupportedFeatureError } from '../../errors';
import { createCompany, createOrders, silentLogger } from '../fixtures';

const options = { logger: silentLogger };

describe('analyze', () => {
  let company: MemoryDataset;
  beforeEach(() => {
    company = createCompany();
  });
  it('should rewrite YEAR() comparisons into date ranges', () => {
    let sql = 'SELECT * FROM employees WHERE YEAR(hire_date) = 2021';
    let analysis = analyze(sql, company, options);
    expect(analysis.result?.rowCount).toBe(2);
    expect(analysis.issues.map(issue => issue.code))
      .toEqual(['select_star', 'function_on_column']);
    expect(analysis.issues[1].title).toBe('Function on Column: YEAR()');
    expect(analysis.overallSeverity).toBe('critical');
    expect(analysis.accessRating).toBe('bad');
    expect(analysis.rewrites.map(v => [v.originalPattern, v.rewritten]))
      .toEqual([
        ['SELECT *', 'SELECT id, name, dept_id, salary, hire_date, ' +
          'manager_id, email FROM employees'],
        ['YEAR(hire_date) = 2021',
          "hire_date >= '2021-01-01' AND hire_date < '2022-01-01'"],
      ]);
    expect(analysis.optimizedQuery).toBe('SELECT * FROM employees WHERE ' +
      "hire_date >= '2021-01-01' AND hire_date < '2022-01-01'");
    expect(analysis.tips).toEqual([
      'Index the filtered columns to avoid full table scans',
      'Selecting specific columns reduces I/O and memory use',
    ]);
  });
  it('should return the same rows from the optimized query', () => {
    let sql = 'SELECT id FROM employees WHERE YEAR(hire_date) = 2021';
    let optimized = analyze(sql, company, options).optimizedQuery;
    if (optimized == null) throw new Error('Expected a rewrite');
    let before = execute(sql, company, options);
    let after = execute(optimized, company, options);
    if (!before.ok || !after.ok) throw new Error('Expected both to run');
    expect(after.value.rows).toEqual(before.value.rows);
  });
  it('should keep a negated YEAR() comparison negated', () => {
    let analysis = analyze('SELECT id FROM employees WHERE NOT ' +
      'YEAR(hire_date) = 2021', company, options);
    expect(analysis.optimizedQuery).toBe('SELECT id FROM employees WHERE ' +
      "NOT (hire_date >= '2021-01-01' AND hire_date < '2022-01-01')");
  });
  it('should detect pattern and ordering issues', () => {
    let analysis = analyze('SELECT DISTINCT name FROM employees ' +
      "WHERE name LIKE '%ice' OR salary > 5 ORDER BY name", company, options);
    expect(analysis.issues.map(issue => issue.code)).toEqual([
      'leading_wildcard',
      'or_different_columns',
      'order_without_limit',
      'distinct',
    ]);
    expect(analysis.rewrites.map(v => v.originalPattern)).toEqual([
      "LIKE '%value%'",
      'WHERE col1 = x OR col2 = y',
    ]);
  });
  it('should suggest NOT EXISTS and a covering index for NOT IN', () => {
    let analysis = analyze('SELECT id FROM employees WHERE dept_id ' +
      'NOT IN (1, 2)', company, options);
    expect(analysis.issues.map(issue => issue.code)).toEqual(['not_in']);
    expect(analysis.overallSeverity).toBe('warning');
    expect(analysis.rewrites[0].rewritten)
      .toBe('NOT EXISTS (SELECT 1 FROM ... WHERE ...)');
    expect(analysis.indexRecommendations).toEqual([{
      type: 'Covering',
      table: 'employees',
      columns: ['id', 'dept_id'],
      sql: 'CREATE INDEX idx_employees_covering ON employees(id, dept_id);',
      reason: 'Every column the query reads is in the index, so the table ' +
        'is never touched',
    }]);
  });
  it('should recommend at most three indexes', () => {
    let analysis = analyze('SELECT name, salary FROM employees ' +
      'WHERE salary > 50000 ORDER BY hire_date LIMIT 5', company, options);
    expect(analysis.indexRecommendations.map(v => [v.type, v.sql])).toEqual([
      ['WHERE filter',
        'CREATE INDEX idx_employees_salary ON employees(salary);'],
      ['ORDER BY',
        'CREATE INDEX idx_employees_hire_date ON employees(hire_date);'],
      ['Composite', 'CREATE INDEX idx_employees_composite ON ' +
        'employees(salary, hire_date);'],
    ]);
  });
  it('should still review a query that cannot run', () => {
    let analysis = analyze('SELECT name FROM employees WHERE dept_id IN ' +
      '(SELECT id FROM departments)', company, options);
    expect(analysis.result).toBe(null);
    expect(analysis.error).toBeInstanceOf(UnsupportedFeatureError);
    expect(analysis.issues.map(issue => issue.code)).toEqual(['subquery']);
    expect(analysis.explain).toBe(null);
    expect(analysis.accessRating).toBe('good');
  });
  it('should not treat a CTE body as a subquery', () => {
    let analysis = analyze('WITH t AS (SELECT 1 AS x) SELECT x FROM t',
      company, options);
    expect(analysis.issues.map(issue => issue.code)).toEqual(['no_where']);
    expect(analysis.overallSeverity).toBe('good');
  });
  it('should report an empty query', () => {
    let analysis = analyze('   ', company, options);
    expect(analysis.error).toBeInstanceOf(EmptyQueryError);
    expect(analysis.parsed).toBe(null);
    expect(analysis.issues).toEqual([]);
  });
  it('should suggest a LIMIT for large results', () => {
    let analysis = analyze('SELECT id FROM orders WHERE id > 5',
      createOrders(), options);
    expect(analysis.accessRating).toBe('good');
    expect(analysis.tips).toEqual(['Add a LIMIT if not every row is needed']);
  });
  it('should fall back to a general tip', () => {
    let analysis = analyze('SELECT name FROM employees WHERE id = 3',
      company, options);
    expect(analysis.issues).toEqual([]);
    expect(analysis.tips)
      .toEqual(['The query looks reasonable. Check timings on real data too.']);
  });
});
