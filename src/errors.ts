import closeMatches from './util/closeMatches';

export type Severity = 'info' | 'warning' | 'error';

export const ErrorCode = {
  QUERY: 'query_error',
  SYNTAX: 'syntax_error',
  UNKNOWN_TABLE: 'unknown_table',
  UNKNOWN_COLUMN: 'unknown_column',
  TYPE_MISMATCH: 'type_mismatch',
  UNSUPPORTED: 'unsupported_feature',
  EMPTY_QUERY: 'empty_query',
  NO_TABLES: 'no_tables',
  CTE_ORDER: 'cte_order',
  CONFIG: 'config_invalid',
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface QueryErrorOptions {
  code?: ErrorCodeValue,
  suggestion?: string | null,
  severity?: Severity,
  context?: { [key: string]: unknown },
}

export interface StructuredQueryError {
  code: ErrorCodeValue,
  message: string,
  suggestion: string | null,
  severity: Severity,
  context: { [key: string]: unknown },
}

/**
 * Base class for everything the engine reports back to the caller. Carries a
 * machine-readable code, a severity, an optional "did you mean" hint and the
 * structured context the error was raised with.
 */
export class QueryError extends Error {
  readonly code: ErrorCodeValue;
  readonly suggestion: string | null;
  readonly severity: Severity;
  readonly context: { [key: string]: unknown };

  constructor(message: string, options: QueryErrorOptions = {}) {
    super(message);
    this.name = 'QueryError';
    this.code = options.code ?? ErrorCode.QUERY;
    this.suggestion = options.suggestion ?? null;
    this.severity = options.severity ?? 'error';
    this.context = options.context ?? {};
  }

  toJSON(): StructuredQueryError {
    return {
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      severity: this.severity,
      context: this.context,
    };
  }
}

const TYPO_FIXES: { [key: string]: string } = {
  selec: 'SELECT',
  slect: 'SELECT',
  form: 'FROM',
  fom: 'FROM',
  whre: 'WHERE',
  wher: 'WHERE',
  oder: 'ORDER',
  ordr: 'ORDER',
  gorup: 'GROUP',
  gruop: 'GROUP',
};

const CLAUSE_KEYWORDS = ['SELECT', 'FROM', 'WHERE', 'GROUP', 'HAVING',
  'ORDER', 'LIMIT', 'JOIN'];

// Keyword a common misspelling stands for, if the word is one.
export function keywordTypo(word: string): string | null {
  return TYPO_FIXES[word.toLowerCase()] ?? null;
}

export class SyntaxError extends QueryError {
  constructor(message: string, near: string | null = null,
    hint: string | null = null,
  ) {
    let suggestion: string | null = hint;
    if (suggestion == null && near != null) {
      let fix = TYPO_FIXES[near.toLowerCase()];
      if (fix == null) fix = closeMatches(near, CLAUSE_KEYWORDS)[0];
      if (fix != null && fix !== near.toUpperCase()) {
        suggestion = `Did you mean: ${fix}?`;
      }
    }
    super(message, {
      code: ErrorCode.SYNTAX,
      suggestion,
      context: { near },
    });
    this.name = 'SyntaxError';
  }
}

export class UnknownTableError extends QueryError {
  constructor(table: string, available: string[], hint?: string) {
    let match = closeMatches(table, available)[0];
    let suggestion = hint ?? (match != null
      ? `Did you mean: ${match}?`
      : `Available tables: ${available.join(', ')}`);
    super(`Unknown table: '${table}'`, {
      code: ErrorCode.UNKNOWN_TABLE,
      suggestion,
      context: { table, available },
    });
    this.name = 'UnknownTableError';
  }
}

export class UnknownColumnError extends QueryError {
  constructor(column: string, table: string, available: string[]) {
    let match = closeMatches(column, available)[0];
    let suggestion = match != null
      ? `Did you mean: ${match}?`
      : `Available columns in ${table}: ${available.join(', ')}`;
    super(`Unknown column: '${column}' in table '${table}'`, {
      code: ErrorCode.UNKNOWN_COLUMN,
      suggestion,
      context: { column, table, available },
    });
    this.name = 'UnknownColumnError';
  }
}

export class TypeMismatchError extends QueryError {
  constructor(left: string, right: string, subject?: string) {
    let message = subject != null
      ? `Type mismatch: ${subject} is ${left}, but compared with ${right}`
      : `Type mismatch: cannot compare ${left} with ${right}`;
    super(message, {
      code: ErrorCode.TYPE_MISMATCH,
      suggestion: `Use a ${left} value for comparison`,
      context: { subject: subject ?? null, expected: left, got: right },
    });
    this.name = 'TypeMismatchError';
  }
}

export class UnsupportedFeatureError extends QueryError {
  constructor(feature: string, alternative?: string) {
    super(`Unsupported feature: ${feature}`, {
      code: ErrorCode.UNSUPPORTED,
      suggestion: alternative ?? 'This feature is not available in the engine',
      severity: 'warning',
      context: { feature },
    });
    this.name = 'UnsupportedFeatureError';
  }
}

export class EmptyQueryError extends QueryError {
  constructor() {
    super('Empty query', {
      code: ErrorCode.EMPTY_QUERY,
      suggestion: 'Enter a SQL query like: SELECT * FROM employees',
      severity: 'info',
    });
    this.name = 'EmptyQueryError';
  }
}

export class NoTablesError extends QueryError {
  constructor() {
    super('No table specified in query', {
      code: ErrorCode.NO_TABLES,
      suggestion: 'Add a FROM clause: SELECT * FROM employees',
    });
    this.name = 'NoTablesError';
  }
}

export class CteOrderError extends QueryError {
  constructor(cte: string, reference: string) {
    super(`CTE '${cte}' references '${reference}', which is defined later ` +
      'in the WITH list', {
      code: ErrorCode.CTE_ORDER,
      suggestion: `Move '${reference}' before '${cte}' in the WITH list`,
      context: { cte, reference },
    });
    this.name = 'CteOrderError';
  }
}

export class ConfigError extends QueryError {
  constructor(message: string, issues: { path: string, message: string }[]) {
    super(message, {
      code: ErrorCode.CONFIG,
      suggestion: issues.map(issue => `${issue.path}: ${issue.message}`)
        .join('; '),
      context: { issues },
    });
    this.name = 'ConfigError';
  }
}
