import parse from '../parser';
import { flattenConditions } from '../parser/conditions';
import { Condition, Expression, ParsedQuery, TableRef } from '../parser/type';
import Dataset from '../dataset/type';
import { UnknownTableError } from '../errors';
import { CostOptions, EngineContext } from '../config';
import { Logger } from '../logger';
import { collectColumns, walk } from '../expression/traverse';
import TableRegistry from '../executor/registry';
import materializeCtes from '../executor/cte';
import assertExecutable from '../executor/validate';
import { TableSource } from './type';

export interface PlanContext {
  parsed: ParsedQuery,
  sources: TableSource[],
  cost: CostOptions,
  logger: Logger,
}

export function findSource(sources: TableSource[], table: string | null,
  column: string,
): TableSource | null {
  if (table != null) {
    return sources.find(source => source.alias === table) ?? null;
  }
  let lower = column.toLowerCase();
  return sources.find(source =>
    source.columns.some(name => name.toLowerCase() === lower)) ?? null;
}

/**
 * Files a condition leaf under the table it reads. A column-to-column
 * equality between two tables belongs to the later one, which can look its
 * rows up by the earlier one's value.
 */
function addCondition(sources: TableSource[], cond: Condition) {
  let owner = findSource(sources, cond.table, cond.column);
  if (owner == null) return;
  let value = cond.value;
  if (value.kind === 'column' && cond.op === '=') {
    let other = findSource(sources, value.table, value.column);
    if (other != null && other !== owner) {
      let later = owner.id > other.id ? owner : other;
      let earlier = later === owner ? other : owner;
      let laterColumn = later === owner ? cond.column : value.column;
      let earlierColumn = later === owner ? value.column : cond.column;
      later.conditions.push({
        column: laterColumn,
        op: '=',
        value: { kind: 'column', table: earlier.alias, column: earlierColumn },
        ref: `${earlier.alias}.${earlierColumn}`,
        wrapped: false,
        conjunct: cond.conjunct,
      });
      return;
    }
  }
  owner.conditions.push({
    column: cond.column,
    op: cond.op,
    value,
    ref: null,
    wrapped: cond.wrappedIn != null,
    conjunct: cond.conjunct,
  });
}

function markNeeded(sources: TableSource[], expr: Expression) {
  walk(expr, node => {
    if (node.type !== 'wildcard') return;
    for (let source of sources) {
      if (node.table == null || node.table === source.alias) {
        source.needed = null;
      }
    }
  });
  for (let column of collectColumns(expr)) {
    let source = findSource(sources, column.table, column.name);
    if (source != null && source.needed != null) {
      source.needed.add(column.name.toLowerCase());
    }
  }
}

function queryExpressions(parsed: ParsedQuery): Expression[] {
  let output: Expression[] = parsed.columns.map(column => column.expression);
  if (parsed.where != null) output.push(parsed.where);
  output.push(...parsed.groupBy);
  if (parsed.having != null) output.push(parsed.having);
  output.push(...parsed.orderBy.map(item => item.expression));
  for (let join of parsed.joins) {
    if (join.on != null) output.push(join.on);
  }
  return output;
}

export function toParsed(input: string | ParsedQuery): ParsedQuery {
  let parsed = typeof input === 'string' ? parse(input) : input;
  assertExecutable(parsed);
  return parsed;
}

/**
 * Gathers what the estimator needs per table: row counts and indexes from
 * the dataset, and CTE row counts from materializing the WITH list.
 */
export default function createPlanContext(
  input: string | ParsedQuery, dataset: Dataset, context: EngineContext,
): PlanContext {
  let parsed = toParsed(input);
  let logger = context.logger.child('planner');
  let registry = new TableRegistry(dataset);
  if (parsed.ctes.length > 0) {
    materializeCtes(parsed.ctes, parsed.isRecursive, registry, {
      warn: () => undefined,
      logger,
      maxRecursionDepth: context.options.maxRecursionDepth,
    });
  }
  let refs: TableRef[] = [
    ...(parsed.from != null ? [parsed.from] : []),
    ...parsed.joins,
  ];
  let sources: TableSource[] = refs.map((ref, i) => {
    let table = registry.get(ref.table);
    if (table == null) {
      throw new UnknownTableError(ref.table, registry.getNames());
    }
    let isCte = registry.ctes.has(ref.table);
    return {
      id: i + 1,
      alias: ref.alias ?? ref.table,
      table: ref.table,
      columns: table.columns,
      rowCount: table.rows.length,
      indexes: isCte ? [] : dataset.getIndexes(ref.table),
      isCte,
      conditions: [],
      needed: new Set<string>(),
    };
  });
  for (let cond of parsed.whereConditions) addCondition(sources, cond);
  for (let join of parsed.joins) {
    for (let cond of flattenConditions(join.on)) addCondition(sources, cond);
  }
  for (let expr of queryExpressions(parsed)) markNeeded(sources, expr);
  return { parsed, sources, cost: context.options.cost, logger };
}
