import { compareIndexes, explain } from '../../planner';
import MemoryDataset from '../../dataset/memory';
import { UnknownTableError, UnsupportedFeatureError } from '../../errors';
import { createCompany, createOrders, silentLogger } from '../fixtures';

const options = { logger: silentLogger };

describe('explain', () => {
  let orders: MemoryDataset;
  let company: MemoryDataset;
  beforeEach(() => {
    orders = createOrders();
    company = createCompany();
  });
  it('should look up a primary key as const', () => {
    let { rows } = explain('SELECT * FROM orders WHERE id = 42', orders,
      options);
    expect(rows).toEqual([{
      id: 1,
      selectType: 'SIMPLE',
      table: 'orders',
      type: 'const',
      possibleKeys: ['PRIMARY'],
      key: 'PRIMARY',
      keyLen: 4,
      ref: 'const',
      rows: 1,
      filtered: 100,
      extra: [],
      cost: 1,
    }]);
  });
  it('should scan the whole table without a usable index', () => {
    let result = explain('SELECT * FROM orders WHERE amount = 5', orders,
      options);
    let [row] = result.rows;
    expect(row.type).toBe('ALL');
    expect(row.rows).toBe(1000);
    expect(row.key).toBe(null);
    expect(row.possibleKeys).toEqual([]);
    expect(row.filtered).toBe(50);
    expect(row.extra).toEqual(['Using where']);
    let type = result.annotations.find(v => v.field === 'type');
    expect(type?.severity).toBe('warning');
    expect(type?.recommendation)
      .toBe('CREATE INDEX idx_orders_amount ON orders(amount);');
  });
  it('should read a covering index in full', () => {
    let [row] = explain('SELECT id FROM orders', orders, options).rows;
    expect(row.type).toBe('index');
    expect(row.key).toBe('PRIMARY');
    expect(row.rows).toBe(1000);
    expect(row.cost).toBe(500);
    expect(row.extra).toEqual(['Using index']);
  });
  it('should estimate a range', () => {
    let [row] = explain('SELECT * FROM orders WHERE id BETWEEN 10 AND 20',
      orders, options).rows;
    expect(row.type).toBe('range');
    expect(row.rows).toBe(300);
    expect(row.extra).toEqual(['Using index condition']);
  });
  it('should not look up a key that sits under NOT', () => {
    let [row] = explain('SELECT * FROM orders WHERE NOT (id = 5)', orders,
      options).rows;
    expect([row.type, row.key, row.rows]).toEqual(['ALL', null, 1000]);
    expect(row.possibleKeys).toEqual([]);
    expect(row.filtered).toBe(50);
    expect(row.extra).toEqual(['Using where']);
  });
  it('should not look up a key that sits under OR', () => {
    let [row] = explain('SELECT * FROM orders WHERE id = 5 OR amount = 3',
      orders, options).rows;
    expect([row.type, row.key, row.rows]).toEqual(['ALL', null, 1000]);
    expect(row.filtered).toBe(33.33);
  });
  it('should still use a key next to an OR group', () => {
    let [row] = explain('SELECT * FROM orders WHERE id = 5 AND ' +
      '(amount = 3 OR amount = 4)', orders, options).rows;
    expect([row.type, row.key, row.rows]).toEqual(['const', 'PRIMARY', 1]);
    expect(row.filtered).toBe(33.33);
  });
  it('should pick the cheapest path under custom cost fractions', () => {
    orders.addIndex('orders', 'idx_customer', 'customer');
    let sql = "SELECT * FROM orders WHERE customer = 'customer3' AND id > 5";
    let [plain] = explain(sql, orders, options).rows;
    expect([plain.type, plain.key, plain.cost]).toEqual(
      ['ref', 'idx_customer', 100]);
    let tuned = { ...options, cost: { refFraction: 0.5 } };
    let [row] = explain(sql, orders, tuned).rows;
    expect([row.type, row.key, row.cost]).toEqual(['range', 'PRIMARY', 300]);
    let [comparison] = compareIndexes(sql, orders, tuned);
    expect(comparison.optimal).toBe(true);
    expect(comparison.chosen.cost).toBe(row.cost);
    expect(comparison.best.cost).toBe(300);
  });
  it('should ignore an index behind a function', () => {
    let result = explain('SELECT * FROM orders WHERE ABS(id) = 5', orders,
      options);
    expect(result.rows[0].type).toBe('ALL');
    let type = result.annotations.find(v => v.field === 'type');
    expect(type?.recommendation).toBe('Compare the bare column instead of ' +
      'wrapping it in a function, so its index can be used');
  });
  it('should look up the joined table by its unique key', () => {
    let { rows } = explain('SELECT e.name, d.name FROM employees e ' +
      'JOIN departments d ON e.dept_id = d.id', company, options);
    expect(rows.map(row => [row.table, row.type, row.key, row.ref]))
      .toEqual([
        ['e', 'ALL', null, null],
        ['d', 'eq_ref', 'PRIMARY', 'e.dept_id'],
      ]);
  });
  it('should use a non-unique index for the joined table', () => {
    let { rows } = explain('SELECT e.name, d.name FROM departments d ' +
      'JOIN employees e ON e.dept_id = d.id', company, options);
    expect(rows[1]).toMatchObject({
      table: 'e',
      type: 'ref',
      key: 'idx_dept',
      ref: 'd.id',
      rows: 1,
    });
  });
  it('should flag a join without an index', () => {
    let result = explain('SELECT e.name FROM departments d ' +
      'JOIN employees e ON e.salary = d.budget', company, options);
    expect(result.rows[1].extra)
      .toEqual(['Using where', 'Using join buffer (Block Nested Loop)']);
    let buffer = result.annotations.find(v =>
      v.value === 'Using join buffer (Block Nested Loop)');
    expect(buffer?.severity).toBe('warning');
    expect(buffer?.recommendation)
      .toBe('CREATE INDEX idx_employees_salary ON employees(salary);');
  });
  it('should flag sorting and grouping work', () => {
    expect(explain('SELECT name FROM employees ORDER BY salary', company,
      options).rows[0].extra).toEqual(['Using filesort']);
    expect(explain('SELECT dept_id, COUNT(*) FROM employees ' +
      'GROUP BY dept_id ORDER BY COUNT(*)', company, options).rows[0].extra)
      .toEqual(['Using index', 'Using temporary', 'Using filesort']);
    expect(explain('SELECT * FROM orders WHERE id > 5 ORDER BY id', orders,
      options).rows[0].extra).toEqual(['Using index condition']);
  });
  it('should mark CTE reads as derived', () => {
    let [row] = explain('WITH top AS (SELECT * FROM employees ' +
      'WHERE salary > 100000) SELECT * FROM top', company, options).rows;
    expect(row.selectType).toBe('DERIVED');
    expect(row.table).toBe('top');
    expect(row.rows).toBe(2);
  });
  it('should throw for queries it cannot plan', () => {
    expect(() => explain('SELECT * FROM nowhere', company, options))
      .toThrow(UnknownTableError);
    expect(() => explain('UPDATE employees SET name = 1', company, options))
      .toThrow(UnsupportedFeatureError);
  });
});

describe('compareIndexes', () => {
  let orders: MemoryDataset;
  beforeEach(() => {
    orders = createOrders();
  });
  it('should agree with explain on the chosen path', () => {
    let sql = 'SELECT * FROM orders WHERE id = 42';
    let [comparison] = compareIndexes(sql, orders, options);
    let [row] = explain(sql, orders, options).rows;
    expect(comparison.chosen.type).toBe(row.type);
    expect(comparison.chosen.cost).toBe(row.cost);
    expect(comparison.optimal).toBe(true);
    expect(comparison.best.key).toBe('PRIMARY');
  });
  it('should price a hypothetical index', () => {
    let [comparison] = compareIndexes('SELECT * FROM orders WHERE amount = 5',
      orders, options);
    expect(comparison.chosen.type).toBe('ALL');
    expect(comparison.alternatives.map(v => [v.key, v.type, v.cost]))
      .toEqual([
        ['idx_orders_amount', 'ref', 100],
        [null, 'ALL', 1000],
        [null, 'ALL', 1000],
      ]);
    expect(comparison.best.hypothetical).toBe(true);
    expect(comparison.best.statement)
      .toBe('CREATE INDEX idx_orders_amount ON orders(amount);');
    expect(comparison.optimal).toBe(true);
  });
});
