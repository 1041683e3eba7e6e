import Dataset from './dataset/type';
import { EngineContext, EngineOptions, resolveOptions } from './config';
import { ExecuteResult, executeWithContext } from './executor';
import { ExplainResult, TableComparison, compareIndexes, explain }
  from './planner';
import analyze, { QueryAnalysis } from './analyzer';
import BTree from './btree';
import { buildIndexFromTable } from './btree/build';

/**
 * Binds a dataset and a set of options so that repeated calls skip option
 * validation. Invalid options throw a ConfigError from the constructor.
 */
export default class QueryEngine {
  dataset: Dataset;
  options: EngineOptions;
  context: EngineContext;
  constructor(dataset: Dataset, options: EngineOptions = {}) {
    this.dataset = dataset;
    this.context = resolveOptions(options);
    this.options = { ...options, logger: this.context.logger };
  }
  execute(sql: string): ExecuteResult {
    return executeWithContext(sql, this.dataset, this.context);
  }
  explain(sql: string): ExplainResult {
    return explain(sql, this.dataset, this.options);
  }
  compareIndexes(sql: string): TableComparison[] {
    return compareIndexes(sql, this.dataset, this.options);
  }
  analyze(sql: string): QueryAnalysis {
    return analyze(sql, this.dataset, this.options);
  }
  // Simulated index over one column, at the configured tree order.
  buildIndex(table: string, column: string): BTree<number> {
    return buildIndexFromTable(this.dataset, table, column,
      this.context.options.btreeOrder);
  }
}
