import { ParsedQuery } from '../parser/type';
import { QueryError } from '../errors';
import { QueryResult } from '../executor/type';
import { ExplainResult } from '../planner/type';

export type IssueSeverity = 'info' | 'warning' | 'error';

export type IssueCode = 'select_star' | 'function_on_column' |
  'leading_wildcard' | 'or_different_columns' | 'not_in' |
  'order_without_limit' | 'distinct' | 'subquery' | 'no_where';

export interface QueryIssue {
  code: IssueCode,
  severity: IssueSeverity,
  title: string,
  description: string,
  fix: string | null,
}

export type RecommendationType = 'WHERE filter' | 'ORDER BY' | 'Composite' |
  'Covering';

export interface IndexRecommendation {
  type: RecommendationType,
  table: string,
  columns: string[],
  sql: string,
  reason: string,
}

export interface QueryRewrite {
  originalPattern: string,
  rewritten: string,
  reason: string,
  improvement: string,
}

export type OverallSeverity = 'good' | 'warning' | 'critical';

export type AccessRating = 'good' | 'caution' | 'bad';

export interface QueryAnalysis {
  result: QueryResult | null,
  error: QueryError | null,
  parsed: ParsedQuery | null,
  issues: QueryIssue[],
  overallSeverity: OverallSeverity,
  explain: ExplainResult | null,
  accessRating: AccessRating,
  indexRecommendations: IndexRecommendation[],
  rewrites: QueryRewrite[],
  optimizedQuery: string | null,
  tips: string[],
}
