import { ConditionOp, ConditionValue } from '../parser/type';
import { IndexDefinition } from '../dataset/type';

export type AccessType = 'const' | 'eq_ref' | 'ref' | 'range' | 'index' |
  'ALL';

export type SelectType = 'SIMPLE' | 'PRIMARY' | 'DERIVED';

export interface ExplainRow {
  id: number,
  selectType: SelectType,
  table: string,
  type: AccessType,
  possibleKeys: string[],
  key: string | null,
  keyLen: number | null,
  // 'const', or the column a join lookup reads its key from.
  ref: string | null,
  rows: number,
  filtered: number,
  extra: string[],
  // Rows examined, weighted by access type.
  cost: number,
}

export type AnnotationSeverity = 'info' | 'caution' | 'warning';

export interface Annotation {
  table: string,
  field: string,
  value: string | number,
  explanation: string,
  severity: AnnotationSeverity,
  recommendation: string | null,
}

export interface ExplainResult {
  rows: ExplainRow[],
  annotations: Annotation[],
}

/**
 * A WHERE or ON leaf that reads one column of the table being planned.
 * Join equalities carry the other side's column in `ref`.
 */
export interface TableCondition {
  column: string,
  op: ConditionOp,
  value: ConditionValue,
  ref: string | null,
  // Wrapped in a function call, so no index can serve it.
  wrapped: boolean,
  // Sits under OR or NOT, so it cannot narrow a lookup.
  conjunct: boolean,
}

export interface TableSource {
  id: number,
  alias: string,
  table: string,
  columns: string[],
  rowCount: number,
  indexes: IndexDefinition[],
  isCte: boolean,
  conditions: TableCondition[],
  // Lower-cased columns the query reads; null when it reads them all.
  needed: Set<string> | null,
}

export interface TablePlan {
  type: AccessType,
  index: IndexDefinition | null,
  ref: string | null,
  rows: number,
  cost: number,
  filtered: number,
  // Conditions the chosen key answers.
  resolved: TableCondition[],
  covering: boolean,
}

export interface Alternative {
  key: string | null,
  column: string | null,
  hypothetical: boolean,
  // CREATE INDEX statement for a hypothetical index.
  statement: string | null,
  type: AccessType,
  rows: number,
  cost: number,
  filtered: number,
}

export interface TableComparison {
  table: string,
  chosen: Alternative,
  alternatives: Alternative[],
  // No index the dataset has would be cheaper than the chosen path.
  optimal: boolean,
  best: Alternative,
}
