import { QueryError } from '../errors';
import { ValueRecord } from '../row';
import { StageStats } from '../iterator/stage';

export type Result<T, E> =
  | { ok: true, value: T }
  | { ok: false, error: E };

export interface CTEInfo {
  name: string,
  rowCount: number,
  columns: string[],
  isRecursive: boolean,
  // Recursive passes run after the anchor; 0 for plain CTEs.
  iterations: number,
}

export interface QueryResult {
  rows: ValueRecord[],
  columns: string[],
  rowCount: number,
  elapsedMs: number,
  warnings: string[],
  ctes: CTEInfo[],
  stages: StageStats[],
}

export type ExecuteResult = Result<QueryResult, QueryError>;
