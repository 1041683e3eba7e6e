import parse, { referencesTable, tokenize } from '../../parser';

describe('parse', () => {
  it('should read every clause of a joined query', () => {
    let parsed = parse('SELECT e.name, d.name AS dept FROM employees e ' +
      'JOIN departments d ON e.dept_id = d.id WHERE e.salary > 70000 ' +
      'ORDER BY e.salary DESC LIMIT 5');
    expect(parsed.type).toBe('SELECT');
    expect(parsed.diagnostics).toEqual([]);
    expect(parsed.tables).toEqual(['employees', 'departments']);
    expect(parsed.aliases).toEqual({ e: 'employees', d: 'departments' });
    expect(parsed.from).toEqual({ table: 'employees', alias: 'e' });
    expect(parsed.joins[0].type).toBe('INNER');
    expect(parsed.joins[0].onText).toBe('e.dept_id = d.id');
    expect(parsed.columns.map(column => column.alias)).toEqual([null, 'dept']);
    expect(parsed.columns[0].text).toBe('e.name');
    expect(parsed.whereConditions).toEqual([{
      table: 'e',
      column: 'salary',
      op: '>',
      value: { kind: 'literal', value: 70000 },
      wrappedIn: null,
      conjunct: true,
    }]);
    expect(parsed.orderBy[0].direction).toBe('DESC');
    expect(parsed.orderBy[0].text).toBe('e.salary');
    expect(parsed.limit).toBe(5);
    expect(parsed.offset).toBe(null);
  });
  it('should read both LIMIT forms', () => {
    let comma = parse('SELECT id FROM employees LIMIT 10, 20');
    expect([comma.limit, comma.offset]).toEqual([20, 10]);
    let offset = parse('SELECT id FROM employees LIMIT 20 OFFSET 10');
    expect([offset.limit, offset.offset]).toEqual([20, 10]);
  });
  it('should note functions wrapped around filtered columns', () => {
    let parsed = parse(
      'SELECT * FROM employees WHERE YEAR(hire_date) = 2021');
    expect(parsed.whereConditions).toEqual([{
      table: null,
      column: 'hire_date',
      op: '=',
      value: { kind: 'literal', value: 2021 },
      wrappedIn: 'year',
      conjunct: true,
    }]);
  });
  it('should flatten conditions under OR and NOT', () => {
    let parsed = parse('SELECT id FROM employees WHERE dept_id IN (1, 2) ' +
      'OR NOT salary BETWEEN 1 AND 5 OR email IS NULL');
    expect(parsed.whereConditions.map(cond => [cond.column, cond.op]))
      .toEqual([
        ['dept_id', 'IN'],
        ['salary', 'BETWEEN'],
        ['email', 'IS NULL'],
      ]);
    expect(parsed.whereConditions[0].value)
      .toEqual({ kind: 'list', values: [1, 2] });
    expect(parsed.whereConditions.every(cond => !cond.conjunct)).toBe(true);
  });
  it('should mark conditions every matching row satisfies', () => {
    let parsed = parse('SELECT id FROM employees WHERE dept_id = 1 AND ' +
      '(salary > 5 OR email IS NULL) AND NOT name = \'x\'');
    expect(parsed.whereConditions.map(cond => [cond.column, cond.conjunct]))
      .toEqual([
        ['dept_id', true],
        ['salary', false],
        ['email', false],
        ['name', false],
      ]);
  });
  it('should turn a literal on the left into a reversed condition', () => {
    let parsed = parse('SELECT id FROM employees WHERE 100 < salary');
    expect(parsed.whereConditions[0].op).toBe('>');
    expect(parsed.whereConditions[0].column).toBe('salary');
  });
  it('should read aggregates', () => {
    let parsed = parse('SELECT COUNT(*), SUM(DISTINCT salary) FROM employees');
    expect(parsed.columns.map(column => column.expression)).toEqual([
      { type: 'aggregation', name: 'count', distinct: false, value: null },
      {
        type: 'aggregation',
        name: 'sum',
        distinct: true,
        value: { type: 'column', table: null, name: 'salary' },
      },
    ]);
  });
  it('should find table references in FROM lists', () => {
    expect(referencesTable('SELECT * FROM a, n', 'n')).toBe(true);
    expect(referencesTable('SELECT * FROM a JOIN n ON a.id = n.id', 'n'))
      .toBe(true);
    expect(referencesTable('SELECT n, m FROM a', 'n')).toBe(false);
    expect(referencesTable('SELECT * FROM a WHERE x IN (1, n)', 'n'))
      .toBe(false);
    expect(referencesTable('SELECT * FROM a ORDER BY b, n', 'n')).toBe(false);
  });
  it('should split off the WITH list', () => {
    let parsed = parse('WITH RECURSIVE nums(n) AS (SELECT 1 UNION ALL ' +
      'SELECT n + 1 FROM nums WHERE n < 10) SELECT n FROM nums');
    expect(parsed.isRecursive).toBe(true);
    expect(parsed.ctes).toEqual([{
      name: 'nums',
      query: 'SELECT 1 UNION ALL SELECT n + 1 FROM nums WHERE n < 10',
      columns: ['n'],
      isRecursive: true,
    }]);
    expect(parsed.mainQuery).toBe('SELECT n FROM nums');
    expect(parsed.tables).toEqual(['nums']);
  });
  it('should report unsupported constructs', () => {
    let parsed = parse('SELECT id FROM employees UNION SELECT id FROM ' +
      'departments');
    expect(parsed.diagnostics[0].code).toBe('unsupported');
    expect(parsed.diagnostics[0].message).toBe('UNION');
    let subquery = parse('SELECT id FROM employees WHERE dept_id IN ' +
      '(SELECT id FROM departments)');
    expect(subquery.diagnostics[0].message).toBe('Subqueries');
  });
  it('should report a missing table when columns are read', () => {
    let parsed = parse('SELECT name WHERE salary > 10');
    expect(parsed.diagnostics.map(v => v.code)).toEqual(['missing_table']);
    expect(parse('SELECT 1 + 1').diagnostics).toEqual([]);
  });
  it('should classify statements that are not SELECT', () => {
    let parsed = parse('DELETE FROM employees WHERE id = 1');
    expect(parsed.type).toBe('DELETE');
    expect(parsed.tables).toEqual(['employees']);
    let unknown = parse('SELEC * FROM employees');
    expect(unknown.type).toBe('UNKNOWN');
    expect(unknown.diagnostics[0]).toEqual({
      code: 'unexpected_token',
      message: 'Unrecognized statement',
      near: 'SELEC',
      position: 0,
    });
  });
  it('should keep going after a broken select item', () => {
    let parsed = parse('SELECT id, name name2 name3, salary FROM employees');
    expect(parsed.columns.map(column => column.text)).toEqual(['id', 'salary']);
    expect(parsed.diagnostics[0].near).toBe('name3');
    expect(parsed.from).toEqual({ table: 'employees', alias: null });
  });
});

describe('tokenize', () => {
  it('should unescape quoted text and skip comments', () => {
    let tokens = tokenize("SELECT 'it''s' -- trailing\n, 4.5");
    expect(tokens.map(token => [token.type, token.value])).toEqual([
      ['word', 'SELECT'],
      ['string', "it's"],
      ['comma', ','],
      ['number', '4.5'],
    ]);
  });
  it('should flag an unterminated string', () => {
    let tokens = tokenize("SELECT 'abc");
    expect(tokens[1].unterminated).toBe(true);
  });
});
