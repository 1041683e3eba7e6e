import RowIterator from '../iterator/type';
import { Scope } from '../expression';

export interface ScopeOptions {
  aggregates?: boolean,
  clause?: string,
  warn?: (message: string) => void,
}

// Builds a compile scope from the tables an iterator produces.
export default function getScope(
  input: RowIterator, options: ScopeOptions = {},
): Scope {
  let columns = input.getColumns();
  return {
    tables: input.getTables().map(name => ({
      name,
      columns: columns[name] ?? [],
    })),
    aggregates: options.aggregates ?? false,
    clause: options.clause,
    warn: options.warn,
  };
}
