import formatExpression from '../parser/format';
import { ParsedQuery } from '../parser/type';
import Dataset from '../dataset/type';
import { EngineOptions, resolveOptions } from '../config';
import createPlanContext, { PlanContext, findSource } from './context';
import planTable from './planTable';
import { keyLength } from './cost';
import annotateRow from './annotate';
import {
  ExplainResult, ExplainRow, SelectType, TablePlan, TableSource,
} from './type';

function selectType(context: PlanContext, source: TableSource): SelectType {
  if (context.parsed.ctes.length === 0) return 'SIMPLE';
  return source.isCte ? 'DERIVED' : 'PRIMARY';
}

// Indexes on columns of conditions every returned row satisfies.
export function possibleKeys(source: TableSource): string[] {
  let columns = new Set(source.conditions
    .filter(v => v.conjunct)
    .map(v => v.column.toLowerCase()));
  return source.indexes
    .filter(index => columns.has(index.column.toLowerCase()))
    .map(index => index.name);
}

// Whether the chosen key already yields rows in ORDER BY order.
function orderServed(context: PlanContext, source: TableSource,
  plan: TablePlan,
): boolean {
  let leading = context.parsed.orderBy[0].expression;
  if (leading.type !== 'column' || plan.index == null) return false;
  let owner = findSource(context.sources, leading.table, leading.name);
  return owner === source &&
    leading.name.toLowerCase() === plan.index.column.toLowerCase();
}

function sameLeading(parsed: ParsedQuery): boolean {
  return formatExpression(parsed.groupBy[0]).toLowerCase() ===
    formatExpression(parsed.orderBy[0].expression).toLowerCase();
}

export function determineExtra(context: PlanContext, source: TableSource,
  plan: TablePlan, position: number,
): string[] {
  let parsed = context.parsed;
  let extra: string[] = [];
  if (source.conditions.length > plan.resolved.length) {
    extra.push('Using where');
  }
  if (plan.covering) extra.push('Using index');
  else if (plan.type === 'range') extra.push('Using index condition');
  if (position === 0) {
    if (parsed.groupBy.length > 0 && parsed.orderBy.length > 0 &&
      !sameLeading(parsed)) {
      extra.push('Using temporary');
    }
    if (parsed.orderBy.length > 0 && !orderServed(context, source, plan)) {
      extra.push('Using filesort');
    }
  } else if (plan.type === 'ALL') {
    extra.push('Using join buffer (Block Nested Loop)');
  }
  return extra;
}

export function toExplainRow(context: PlanContext, source: TableSource,
  plan: TablePlan, position: number,
): ExplainRow {
  return {
    id: source.id,
    selectType: selectType(context, source),
    table: source.alias,
    type: plan.type,
    possibleKeys: possibleKeys(source),
    key: plan.index != null ? plan.index.name : null,
    keyLen: plan.index != null ? keyLength(plan.index.values) : null,
    ref: plan.ref,
    rows: plan.rows,
    filtered: plan.filtered,
    extra: determineExtra(context, source, plan, position),
    cost: plan.cost,
  };
}

/**
 * Estimates how each table in FROM/JOIN order would be read, MySQL EXPLAIN
 * style, with notes on what each field means for this query.
 */
export default function explain(input: string | ParsedQuery,
  dataset: Dataset, options: EngineOptions = {},
): ExplainResult {
  let context = createPlanContext(input, dataset, resolveOptions(options));
  let rows: ExplainRow[] = [];
  context.sources.forEach((source, position) => {
    let plan = planTable(source, source.indexes, context.cost);
    context.logger.debug('Access path chosen', {
      table: source.alias, type: plan.type, key: plan.index?.name ?? null,
    });
    rows.push(toExplainRow(context, source, plan, position));
  });
  let annotations = rows.flatMap((row, i) =>
    annotateRow(context, context.sources[i], row));
  return { rows, annotations };
}
