import { Scalar, Value, ArithmeticOp } from '../value';

export type TokenType = 'word' | 'ident' | 'number' | 'string' | 'op' |
  'comma' | 'dot' | 'lparen' | 'rparen' | 'semicolon' | 'unknown';

export interface Token {
  type: TokenType,
  value: string,
  // Character offsets into the source, end exclusive.
  start: number,
  end: number,
  unterminated?: boolean,
}

export type CompareOp = '=' | '<>' | '<' | '>' | '<=' | '>=';

export type AggregateName = 'count' | 'sum' | 'avg' | 'min' | 'max';

export interface LiteralExpression {
  type: 'literal',
  value: Value,
}

export interface ColumnExpression {
  type: 'column',
  table: string | null,
  name: string,
}

export interface WildcardExpression {
  type: 'wildcard',
  table: string | null,
}

export interface UnaryExpression {
  type: 'unary',
  op: '-' | 'not',
  value: Expression,
}

export interface BinaryExpression {
  type: 'binary',
  op: ArithmeticOp,
  left: Expression,
  right: Expression,
}

export interface CompareExpression {
  type: 'compare',
  op: CompareOp,
  left: Expression,
  right: Expression,
}

export interface LogicalExpression {
  type: 'logical',
  op: 'and' | 'or',
  values: Expression[],
}

export interface LikeExpression {
  type: 'like',
  not: boolean,
  target: Expression,
  pattern: Expression,
}

export interface InExpression {
  type: 'in',
  not: boolean,
  target: Expression,
  values: Expression[],
}

export interface BetweenExpression {
  type: 'between',
  not: boolean,
  target: Expression,
  min: Expression,
  max: Expression,
}

export interface IsNullExpression {
  type: 'isNull',
  not: boolean,
  target: Expression,
}

export interface AggregateExpression {
  type: 'aggregation',
  name: AggregateName,
  distinct: boolean,
  // null stands for COUNT(*).
  value: Expression | null,
}

export interface FunctionExpression {
  type: 'function',
  name: string,
  args: Expression[],
}

export interface SubqueryExpression {
  type: 'subquery',
  text: string,
}

export type Expression = LiteralExpression | ColumnExpression |
  WildcardExpression | UnaryExpression | BinaryExpression | CompareExpression |
  LogicalExpression | LikeExpression | InExpression | BetweenExpression |
  IsNullExpression | AggregateExpression | FunctionExpression |
  SubqueryExpression;

export type StatementType = 'SELECT' | 'INSERT' | 'UPDATE' | 'DELETE' |
  'UNKNOWN';

export type DiagnosticCode = 'unexpected_token' | 'missing_table' |
  'unterminated_string' | 'unsupported';

export interface Diagnostic {
  code: DiagnosticCode,
  message: string,
  // Text of the nearest token, if there is one.
  near: string | null,
  position: number,
}

export interface SelectColumn {
  expression: Expression,
  alias: string | null,
  // Source text as written, used for output naming.
  text: string,
}

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'CROSS';

export interface TableRef {
  table: string,
  alias: string | null,
}

export interface JoinClause extends TableRef {
  type: JoinType,
  on: Expression | null,
  onText: string | null,
}

export type ConditionOp = CompareOp | 'LIKE' | 'NOT LIKE' | 'IN' | 'NOT IN' |
  'BETWEEN' | 'NOT BETWEEN' | 'IS NULL' | 'IS NOT NULL';

export type ConditionValue =
  | { kind: 'literal', value: Scalar }
  | { kind: 'list', values: Scalar[] }
  | { kind: 'range', low: Scalar, high: Scalar }
  | { kind: 'column', table: string | null, column: string }
  | { kind: 'expression', text: string }
  | { kind: 'none' };

export interface Condition {
  table: string | null,
  column: string,
  op: ConditionOp,
  value: ConditionValue,
  // Name of a function wrapped around the column, e.g. YEAR(hire_date).
  wrappedIn: string | null,
  // Reached through AND only, not under OR or NOT.
  conjunct: boolean,
}

export interface HavingCondition {
  expression: string,
  op: ConditionOp,
  value: ConditionValue,
}

export interface OrderByItem {
  expression: Expression,
  direction: 'ASC' | 'DESC',
  text: string,
}

export interface CTEDefinition {
  name: string,
  query: string,
  columns: string[],
  // True when the WITH is RECURSIVE and the body reads from itself.
  isRecursive: boolean,
}

export interface ParsedQuery {
  type: StatementType,
  tables: string[],
  from: TableRef | null,
  columns: SelectColumn[],
  distinct: boolean,
  where: Expression | null,
  whereConditions: Condition[],
  groupBy: Expression[],
  having: Expression | null,
  havingConditions: HavingCondition[],
  orderBy: OrderByItem[],
  limit: number | null,
  offset: number | null,
  joins: JoinClause[],
  ctes: CTEDefinition[],
  isRecursive: boolean,
  // alias (or bare table name) to table name, lower-cased.
  aliases: { [alias: string]: string },
  mainQuery: string,
  raw: string,
  diagnostics: Diagnostic[],
}
