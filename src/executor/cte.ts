import parse, { referencesTable, splitUnionAll } from '../parser';
import { CTEDefinition } from '../parser/type';
import { ValueRecord } from '../row';
import { NULL } from '../value';
import { CteOrderError, SyntaxError, UnknownTableError } from '../errors';
import TableRegistry, { MaterializedTable } from './registry';
import runSelect, { RunEnvironment, SelectOutput } from './select';
import assertExecutable from './validate';
import { CTEInfo } from './type';

export interface CTEEnvironment extends RunEnvironment {
  maxRecursionDepth: number,
}

function runBranch(sql: string, registry: TableRegistry,
  env: RunEnvironment,
): SelectOutput {
  let parsed = parse(sql);
  assertExecutable(parsed);
  if (parsed.ctes.length > 0) {
    throw new SyntaxError('WITH is not allowed inside a CTE body', 'WITH',
      'Move the inner CTE into the outer WITH list');
  }
  return runSelect(parsed, registry, env);
}

// Renames rows positionally onto the given column names.
function rename(output: SelectOutput, columns: string[], cte: string,
): ValueRecord[] {
  if (output.columns.length !== columns.length) {
    throw new SyntaxError(`CTE '${cte}' branches return ${columns.length} ` +
      `and ${output.columns.length} columns`, null,
      'Every branch of a UNION ALL must select the same number of columns');
  }
  return output.rows.map(row => {
    let record: ValueRecord = {};
    columns.forEach((name, i) => {
      record[name] = row[output.columns[i]] ?? NULL;
    });
    return record;
  });
}

function outputColumns(cte: CTEDefinition, first: SelectOutput): string[] {
  if (cte.columns.length === 0) return first.columns;
  if (cte.columns.length !== first.columns.length) {
    throw new SyntaxError(`CTE '${cte.name}' lists ${cte.columns.length} ` +
      `columns but its query returns ${first.columns.length}`, null,
      'Make the column list match the SELECT list');
  }
  return cte.columns;
}

function checkOrder(ctes: CTEDefinition[], withRecursive: boolean,
  registry: TableRegistry,
) {
  ctes.forEach((cte, i) => {
    for (let later of ctes.slice(i + 1)) {
      if (later.name !== cte.name && referencesTable(cte.query, later.name)) {
        throw new CteOrderError(cte.name, later.name);
      }
    }
    if (!withRecursive && referencesTable(cte.query, cte.name) &&
      !registry.has(cte.name)) {
      throw new UnknownTableError(cte.name, registry.getNames(),
        `Use WITH RECURSIVE for '${cte.name}' to read from itself`);
    }
  });
}

function materializeSimple(cte: CTEDefinition, registry: TableRegistry,
  env: CTEEnvironment,
): MaterializedTable {
  let outputs = splitUnionAll(cte.query)
    .map(branch => runBranch(branch, registry, env));
  let columns = outputColumns(cte, outputs[0]);
  let rows: ValueRecord[] = [];
  for (let output of outputs) rows.push(...rename(output, columns, cte.name));
  return { name: cte.name, columns, rows };
}

/**
 * Anchor branches run once. Recursive branches then run against the rows
 * the previous pass produced until a pass produces nothing or the depth
 * ceiling is reached.
 */
function materializeRecursive(cte: CTEDefinition, registry: TableRegistry,
  env: CTEEnvironment,
): { table: MaterializedTable, iterations: number } {
  let branches = splitUnionAll(cte.query);
  let anchors = branches.filter(v => !referencesTable(v, cte.name));
  let recursive = branches.filter(v => referencesTable(v, cte.name));
  if (anchors.length === 0) {
    throw new SyntaxError(`Recursive CTE '${cte.name}' has no anchor`, null,
      'Start the body with a SELECT that does not read from the CTE, ' +
      'followed by UNION ALL');
  }
  let anchorOutputs = anchors.map(v => runBranch(v, registry, env));
  let columns = outputColumns(cte, anchorOutputs[0]);
  let rows: ValueRecord[] = [];
  for (let output of anchorOutputs) {
    rows.push(...rename(output, columns, cte.name));
  }
  let working = rows;
  let iterations = 0;
  while (working.length > 0) {
    if (iterations >= env.maxRecursionDepth) {
      let message = `Recursive CTE '${cte.name}' stopped after ` +
        `${env.maxRecursionDepth} iterations and its result is truncated`;
      env.warn(message);
      env.logger.warn(message, { cte: cte.name, rows: rows.length });
      break;
    }
    registry.register({ name: cte.name, columns, rows: working });
    let produced: ValueRecord[] = [];
    for (let branch of recursive) {
      produced.push(
        ...rename(runBranch(branch, registry, env), columns, cte.name));
    }
    iterations++;
    rows = rows.concat(produced);
    working = produced;
  }
  return { table: { name: cte.name, columns, rows }, iterations };
}

/**
 * Materializes the WITH list in order into the registry, so that each CTE
 * and the main query can read the ones before it.
 */
export default function materializeCtes(
  ctes: CTEDefinition[], withRecursive: boolean, registry: TableRegistry,
  env: CTEEnvironment,
): CTEInfo[] {
  checkOrder(ctes, withRecursive, registry);
  return ctes.map(cte => {
    let table: MaterializedTable;
    let iterations = 0;
    if (cte.isRecursive) {
      ({ table, iterations } = materializeRecursive(cte, registry, env));
    } else {
      table = materializeSimple(cte, registry, env);
    }
    registry.register(table);
    env.logger.debug('CTE materialized', {
      name: cte.name, rows: table.rows.length,
    });
    return {
      name: cte.name,
      rowCount: table.rows.length,
      columns: table.columns,
      isRecursive: cte.isRecursive,
      iterations,
    };
  });
}
