import {
  AggregateExpression, Expression, OrderByItem, ParsedQuery, TableRef,
} from '../parser/type';
import formatExpression from '../parser/format';
import { RESULT_TABLE, ValueRecord } from '../row';
import { SyntaxError, UnknownTableError } from '../errors';
import { Logger } from '../logger';
import { collectAggregates, rewritePostOrder } from '../expression/traverse';
import RowIterator from '../iterator/type';
import InputIterator from '../iterator/input';
import NestedJoinIterator from '../iterator/join/nested';
import FilterIterator from '../iterator/filter';
import GroupHashIterator from '../iterator/groupHash';
import MapIterator, { MapColumn } from '../iterator/map';
import DistinctIterator from '../iterator/distinct';
import SortIterator from '../iterator/sort';
import LimitIterator from '../iterator/limit';
import OutputIterator from '../iterator/output';
import StageIterator, { StageStats } from '../iterator/stage';
import drainIterator from '../util/drainIterator';
import { ScopeOptions } from '../util/scope';
import TableRegistry from './registry';

// Source of the single empty row a FROM-less SELECT projects over.
const DUAL_TABLE = '_dual';

export interface RunEnvironment {
  warn: (message: string) => void,
  logger: Logger,
}

export interface SelectOutput {
  columns: string[],
  rows: ValueRecord[],
  stages: StageStats[],
}

interface Source {
  alias: string,
  columns: string[],
}

class Pipeline {
  stages: StageStats[] = [];
  scanned: number = 0;
  add(name: string, clause: string | null, iterator: RowIterator,
  ): RowIterator {
    let stats: StageStats = {
      name, clause, inputRows: 0, outputRows: 0, active: true,
    };
    this.stages.push(stats);
    return new StageIterator(iterator, stats);
  }
  skip(name: string) {
    this.stages.push({
      name, clause: null, inputRows: 0, outputRows: 0, active: false,
    });
  }
  // Row counts are only known once the pipeline has been drained.
  settle() {
    this.stages.forEach((stats, i) => {
      stats.inputRows = i === 0 ? this.scanned : this.stages[i - 1].outputRows;
      if (!stats.active) stats.outputRows = stats.inputRows;
    });
  }
}

function describeRef(ref: TableRef): string {
  return ref.alias != null ? `${ref.table} AS ${ref.alias}` : ref.table;
}

function scan(registry: TableRegistry, ref: TableRef, sources: Source[],
): InputIterator {
  let table = registry.get(ref.table);
  if (table == null) throw new UnknownTableError(ref.table, registry.getNames());
  let alias = ref.alias ?? ref.table;
  if (sources.some(source => source.alias === alias)) {
    throw new SyntaxError(`Not unique table/alias: '${alias}'`, null,
      'Give each occurrence of the table its own alias');
  }
  sources.push({ alias, columns: table.columns });
  return new InputIterator(alias, table.columns, table.rows);
}

/**
 * Output names: the alias, else the column name, else the text as written.
 * Repeats are qualified with their table where they come from a column, and
 * numbered otherwise.
 */
export function expandColumns(query: ParsedQuery, sources: Source[],
): MapColumn[] {
  let output: MapColumn[] = [];
  let taken = new Set<string>();
  let claim = (name: string, qualified: string | null): string => {
    let result = name;
    if (taken.has(result.toLowerCase()) && qualified != null) {
      result = qualified;
    }
    let suffix = 2;
    while (taken.has(result.toLowerCase())) {
      result = `${name}_${suffix}`;
      suffix++;
    }
    taken.add(result.toLowerCase());
    return result;
  };
  for (let column of query.columns) {
    let expr = column.expression;
    if (expr.type === 'wildcard') {
      let qualifier = expr.table;
      let targets = qualifier == null
        ? sources
        : sources.filter(source => source.alias === qualifier);
      if (qualifier != null && targets.length === 0) {
        throw new UnknownTableError(qualifier,
          sources.map(source => source.alias),
          `'${qualifier}' is not a table or alias in this query`);
      }
      for (let source of targets) {
        for (let name of source.columns) {
          output.push({
            name: claim(name, `${source.alias}.${name}`),
            expression: { type: 'column', table: source.alias, name },
          });
        }
      }
      continue;
    }
    let qualified: string | null = null;
    if (column.alias == null && expr.type === 'column') {
      let lower = expr.name.toLowerCase();
      let owner = expr.table ?? sources.find(source =>
        source.columns.some(name => name.toLowerCase() === lower))?.alias;
      if (owner != null) qualified = `${owner}.${expr.name}`;
    }
    let name = column.alias ??
      (expr.type === 'column' ? expr.name : column.text);
    output.push({ name: claim(name, qualified), expression: expr });
  }
  return output;
}

// Points ORDER BY at select-list outputs for aliases and 1-based positions.
function resolveOrderTarget(expr: Expression, names: string[]): Expression {
  if (expr.type === 'literal' && expr.value.type === 'integer') {
    let position = expr.value.value;
    if (position < 1 || position > names.length) {
      throw new SyntaxError(`Unknown column '${position}' in ORDER BY`, null,
        `ORDER BY positions run from 1 to ${names.length}`);
    }
    return { type: 'column', table: RESULT_TABLE, name: names[position - 1] };
  }
  if (expr.type === 'column' && expr.table == null) {
    let lower = expr.name.toLowerCase();
    let name = names.find(v => v.toLowerCase() === lower);
    if (name != null) return { type: 'column', table: RESULT_TABLE, name };
  }
  return expr;
}

/**
 * Builds and drains the iterator pipeline for one SELECT. Every iterator
 * compiles its expressions while being constructed, so name errors surface
 * before the first row moves.
 */
export default function runSelect(
  query: ParsedQuery, registry: TableRegistry, env: RunEnvironment,
): SelectOutput {
  let pipeline = new Pipeline();
  let options: ScopeOptions = { warn: env.warn };
  let sources: Source[] = [];
  let iterator: RowIterator;

  if (query.from == null) {
    iterator = new InputIterator(DUAL_TABLE, [], [{}]);
    pipeline.scanned = 1;
    pipeline.skip('FROM');
  } else {
    let input = scan(registry, query.from, sources);
    pipeline.scanned = input.input.length;
    iterator = pipeline.add('FROM', describeRef(query.from), input);
  }
  for (let join of query.joins) {
    let right = scan(registry, join, sources);
    let clause = `${join.type} JOIN ${describeRef(join)}` +
      (join.onText != null ? ` ON ${join.onText}` : '');
    iterator = pipeline.add('JOIN', clause,
      new NestedJoinIterator(iterator, right, join.on, join.type, options));
  }

  if (query.where != null) {
    iterator = pipeline.add('WHERE', formatExpression(query.where),
      new FilterIterator(iterator, query.where,
        { ...options, clause: 'WHERE' }));
  } else {
    pipeline.skip('WHERE');
  }

  let columns = expandColumns(query, sources);
  let names = columns.map(column => column.name);

  // GROUP BY and HAVING may name select aliases that shadow no column.
  let sourceColumns = new Set<string>();
  for (let source of sources) {
    for (let name of source.columns) sourceColumns.add(name.toLowerCase());
  }
  let aliases = new Map<string, Expression>();
  for (let column of query.columns) {
    if (column.alias != null) {
      aliases.set(column.alias.toLowerCase(), column.expression);
    }
  }
  let substitute = (expr: Expression) => rewritePostOrder(expr, node => {
    if (node.type !== 'column' || node.table != null) return node;
    let lower = node.name.toLowerCase();
    if (sourceColumns.has(lower)) return node;
    return aliases.get(lower) ?? node;
  });
  let groupBy = query.groupBy.map(substitute);
  let having = query.having != null ? substitute(query.having) : null;
  let orderBy: OrderByItem[] = query.orderBy.map(item => ({
    ...item,
    expression: resolveOrderTarget(item.expression, names),
  }));

  let aggregates: AggregateExpression[] = [];
  for (let column of columns) {
    aggregates.push(...collectAggregates(column.expression));
  }
  if (having != null) aggregates.push(...collectAggregates(having));
  for (let item of orderBy) {
    aggregates.push(...collectAggregates(item.expression));
  }
  let grouped = groupBy.length > 0 || aggregates.length > 0;

  if (grouped) {
    iterator = pipeline.add('GROUP BY',
      groupBy.length > 0 ? groupBy.map(formatExpression).join(', ') : null,
      new GroupHashIterator(iterator, groupBy, aggregates, options));
  } else {
    pipeline.skip('GROUP BY');
  }
  if (having != null) {
    iterator = pipeline.add('HAVING', formatExpression(having),
      new FilterIterator(iterator, having,
        { ...options, aggregates: grouped, clause: 'HAVING' }));
  } else {
    pipeline.skip('HAVING');
  }

  iterator = pipeline.add('SELECT', names.join(', '),
    new MapIterator(iterator, columns, { ...options, aggregates: grouped }));

  if (query.distinct) {
    iterator = pipeline.add('DISTINCT', 'DISTINCT',
      new DistinctIterator(iterator));
  } else {
    pipeline.skip('DISTINCT');
  }
  if (orderBy.length > 0) {
    iterator = pipeline.add('ORDER BY',
      query.orderBy.map(item => `${item.text} ${item.direction}`).join(', '),
      new SortIterator(iterator, orderBy, { ...options, aggregates: grouped }));
  } else {
    pipeline.skip('ORDER BY');
  }
  if (query.limit != null) {
    let clause = `LIMIT ${query.limit}` +
      (query.offset != null ? ` OFFSET ${query.offset}` : '');
    iterator = pipeline.add('LIMIT', clause,
      new LimitIterator(iterator, query.limit, query.offset));
  } else {
    pipeline.skip('LIMIT');
  }

  env.logger.debug('Pipeline built', {
    stages: pipeline.stages.filter(v => v.active).map(v => v.name),
  });
  let rows = drainIterator(new OutputIterator(iterator, RESULT_TABLE))
    .map(row => row[RESULT_TABLE] ?? {});
  pipeline.settle();
  return { columns: names, rows, stages: pipeline.stages };
}
