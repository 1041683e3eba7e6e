import { performance } from 'perf_hooks';

import parse from '../parser';
import { ParsedQuery } from '../parser/type';
import Dataset from '../dataset/type';
import { EmptyQueryError, QueryError } from '../errors';
import { EngineContext, EngineOptions, resolveOptions } from '../config';
import TableRegistry from './registry';
import materializeCtes from './cte';
import runSelect from './select';
import assertExecutable from './validate';
import { ExecuteResult, QueryResult } from './type';

export * from './type';

function run(sql: string, parsed: ParsedQuery, dataset: Dataset,
  context: EngineContext,
): QueryResult {
  let start = performance.now();
  let logger = context.logger.child('executor');
  let warnings = new Set<string>();
  let env = {
    warn: (message: string) => {
      warnings.add(message);
    },
    logger,
    maxRecursionDepth: context.options.maxRecursionDepth,
  };
  logger.debug('Executing query', { sql });
  let registry = new TableRegistry(dataset);
  let ctes = materializeCtes(parsed.ctes, parsed.isRecursive, registry, env);
  let output = runSelect(parsed, registry, env);
  return {
    rows: output.rows,
    columns: output.columns,
    rowCount: output.rows.length,
    elapsedMs: performance.now() - start,
    warnings: Array.from(warnings),
    ctes,
    stages: output.stages,
  };
}

/**
 * Runs one SELECT against the dataset. Problems with the query come back as
 * `{ ok: false, error }`; anything else thrown is a bug and propagates.
 */
export function executeWithContext(sql: string, dataset: Dataset,
  context: EngineContext,
): ExecuteResult {
  try {
    if (sql.trim() === '') throw new EmptyQueryError();
    let parsed = parse(sql);
    if (parsed.mainQuery === '' && parsed.ctes.length === 0 &&
      parsed.diagnostics.length === 0) {
      throw new EmptyQueryError();
    }
    assertExecutable(parsed);
    return { ok: true, value: run(sql, parsed, dataset, context) };
  } catch (e) {
    if (e instanceof QueryError) return { ok: false, error: e };
    throw e;
  }
}

// Invalid options throw a ConfigError instead of coming back as a result.
export default function execute(sql: string, dataset: Dataset,
  options: EngineOptions = {},
): ExecuteResult {
  return executeWithContext(sql, dataset, resolveOptions(options));
}
