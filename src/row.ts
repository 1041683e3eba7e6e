import { Value } from './value';

export type ValueRecord = { [column: string]: Value };

// A row in flight: table name (or alias) to that table's column record.
// Aggregate results live under AGGREGATE_TABLE and select-list output under
// RESULT_TABLE.
export type Row = { [table: string]: ValueRecord };

export const AGGREGATE_TABLE = '_aggr';
export const RESULT_TABLE = '__result';
