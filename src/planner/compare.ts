import { ParsedQuery } from '../parser/type';
import Dataset, { IndexDefinition } from '../dataset/type';
import { EngineOptions, resolveOptions } from '../config';
import createPlanContext from './context';
import planTable from './planTable';
import { createIndexStatement, unindexedColumns } from './annotate';
import { Alternative, TableComparison, TablePlan } from './type';

function toAlternative(plan: TablePlan, hypothetical: boolean,
  statement: string | null,
): Alternative {
  return {
    key: plan.index != null ? plan.index.name : null,
    column: plan.index != null ? plan.index.column : null,
    hypothetical,
    statement,
    type: plan.type,
    rows: plan.rows,
    cost: plan.cost,
    filtered: plan.filtered,
  };
}

/**
 * Re-plans every table with no index, with each index on its own, and with
 * an index that does not exist yet on each filtered column. Everything goes
 * through the same planTable as explain, so the costs line up.
 */
export default function compareIndexes(input: string | ParsedQuery,
  dataset: Dataset, options: EngineOptions = {},
): TableComparison[] {
  let context = createPlanContext(input, dataset, resolveOptions(options));
  let cost = context.cost;
  return context.sources.map(source => {
    let chosen = toAlternative(
      planTable(source, source.indexes, cost), false, null);
    let alternatives: Alternative[] = [
      toAlternative(planTable(source, [], cost), false, null),
    ];
    for (let index of source.indexes) {
      alternatives.push(toAlternative(planTable(source, [index], cost),
        false, null));
    }
    for (let column of unindexedColumns(source)) {
      let index: IndexDefinition = {
        name: `idx_${source.table}_${column}`,
        column,
        values: [],
        unique: false,
      };
      alternatives.push(toAlternative(planTable(source, [index], cost), true,
        createIndexStatement(source.table, column)));
    }
    alternatives.sort((a, b) => a.cost - b.cost);
    let existing = alternatives.filter(v => !v.hypothetical);
    return {
      table: source.alias,
      chosen,
      alternatives,
      optimal: existing.every(v => chosen.cost <= v.cost),
      best: alternatives[0],
    };
  });
}
