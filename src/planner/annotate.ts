import { PlanContext, findSource } from './context';
import { AccessType, Annotation, ExplainRow, TableSource } from './type';

const TYPE_EXPLANATIONS: { [key in AccessType]: string } = {
  const: 'At most one row matches, found through a PRIMARY KEY or UNIQUE ' +
    'index. This is as cheap as access gets.',
  eq_ref: 'One row is read per row of the previous table, through a unique ' +
    'index on the join column.',
  ref: 'Every row with a matching index value is read. Typical for ' +
    'non-unique indexes.',
  range: 'Only the index entries inside the requested range are read.',
  index: 'The whole index is read instead of the table. Cheaper than ALL ' +
    'because index entries are smaller than rows.',
  ALL: 'Full table scan: every row of the table is read.',
};

export function createIndexStatement(table: string, column: string): string {
  return `CREATE INDEX idx_${table}_${column} ON ${table}(${column});`;
}

function canonicalColumn(source: TableSource, column: string): string {
  let lower = column.toLowerCase();
  return source.columns.find(name => name.toLowerCase() === lower) ?? column;
}

// Filtered or joined columns of the table that no index covers.
export function unindexedColumns(source: TableSource): string[] {
  let output: string[] = [];
  if (source.isCte) return output;
  for (let cond of source.conditions) {
    if (cond.wrapped || !cond.conjunct) continue;
    let column = canonicalColumn(source, cond.column);
    let lower = column.toLowerCase();
    if (source.indexes.some(index => index.column.toLowerCase() === lower)) {
      continue;
    }
    if (!output.includes(column)) output.push(column);
  }
  return output;
}

function recommendIndex(source: TableSource): string | null {
  let column = unindexedColumns(source)[0];
  return column != null ? createIndexStatement(source.table, column) : null;
}

function annotateType(source: TableSource, row: ExplainRow): Annotation {
  let annotation: Annotation = {
    table: row.table,
    field: 'type',
    value: row.type,
    explanation: TYPE_EXPLANATIONS[row.type],
    severity: 'info',
    recommendation: null,
  };
  if (row.type === 'ALL') {
    let statement = recommendIndex(source);
    if (statement != null) {
      annotation.severity = 'warning';
      annotation.recommendation = statement;
    } else if (source.conditions.some(cond => cond.wrapped)) {
      annotation.severity = 'warning';
      annotation.recommendation = 'Compare the bare column instead of ' +
        'wrapping it in a function, so its index can be used';
    } else if (source.rowCount > 100) {
      annotation.severity = 'caution';
      annotation.recommendation = 'Add a WHERE clause or a LIMIT unless ' +
        'every row is needed';
    }
  } else if (row.type === 'index') {
    annotation.severity = 'caution';
    annotation.recommendation = recommendIndex(source) ??
      `Filter on ${row.key ?? 'the indexed column'} to turn the scan into ` +
      'a lookup';
  }
  return annotation;
}

function annotateKey(row: ExplainRow): Annotation | null {
  if (row.key != null) {
    return {
      table: row.table,
      field: 'key',
      value: row.key,
      explanation: row.type === 'index'
        ? `Every entry of index "${row.key}" is read`
        : `Index "${row.key}" is used to find rows`,
      severity: 'info',
      recommendation: null,
    };
  }
  if (row.possibleKeys.length === 0) return null;
  return {
    table: row.table,
    field: 'key',
    value: 'NULL',
    explanation: 'No index is used although ' +
      `${row.possibleKeys.join(', ')} exist on filtered columns`,
    severity: 'caution',
    recommendation: 'Conditions must compare the bare column with =, ' +
      'a range or a prefix LIKE for the index to apply',
  };
}

function annotateExtra(context: PlanContext, source: TableSource,
  row: ExplainRow, extra: string,
): Annotation | null {
  let base = { table: row.table, field: 'Extra', value: extra };
  switch (extra) {
    case 'Using where':
      return {
        ...base,
        explanation: 'Rows are filtered after being read from the table',
        severity: 'info',
        recommendation: null,
      };
    case 'Using index':
      return {
        ...base,
        explanation: 'The index holds every column the query needs, so ' +
          'the table itself is never read',
        severity: 'info',
        recommendation: null,
      };
    case 'Using index condition':
      return {
        ...base,
        explanation: 'The range condition is checked against index ' +
          'entries before rows are fetched',
        severity: 'info',
        recommendation: null,
      };
    case 'Using filesort': {
      let leading = context.parsed.orderBy[0].expression;
      let recommendation = 'Add an index that matches the ORDER BY';
      if (leading.type === 'column') {
        let owner = findSource(context.sources, leading.table, leading.name);
        if (owner != null && !owner.isCte) {
          recommendation = createIndexStatement(owner.table,
            canonicalColumn(owner, leading.name));
        }
      }
      return {
        ...base,
        explanation: 'Rows are sorted in an extra pass after being read',
        severity: 'caution',
        recommendation,
      };
    }
    case 'Using temporary':
      return {
        ...base,
        explanation: 'A temporary table holds the groups before they are ' +
          'sorted',
        severity: 'caution',
        recommendation: 'GROUP BY and ORDER BY on the same column avoid ' +
          'the temporary table',
      };
    case 'Using join buffer (Block Nested Loop)': {
      let join = source.conditions.find(cond => cond.ref != null);
      return {
        ...base,
        explanation: 'No index helps the join, so every row of this table ' +
          'is compared with every row read so far',
        severity: 'warning',
        recommendation: join != null
          ? createIndexStatement(source.table,
            canonicalColumn(source, join.column))
          : 'Join on a column that has an index',
      };
    }
    default:
      return null;
  }
}

export default function annotateRow(context: PlanContext,
  source: TableSource, row: ExplainRow,
): Annotation[] {
  let output: Annotation[] = [annotateType(source, row)];
  let key = annotateKey(row);
  if (key != null) output.push(key);
  output.push({
    table: row.table,
    field: 'rows',
    value: row.rows,
    explanation: `About ${row.rows} of ${source.rowCount} rows are examined`,
    severity: row.rows > 100 ? 'caution' : 'info',
    recommendation: row.rows > 100 ? recommendIndex(source) : null,
  });
  if (row.filtered < 100) {
    output.push({
      table: row.table,
      field: 'filtered',
      value: row.filtered,
      explanation: `About ${row.filtered}% of examined rows are expected ` +
        'to pass the remaining conditions',
      severity: 'info',
      recommendation: null,
    });
  }
  for (let extra of row.extra) {
    let annotation = annotateExtra(context, source, row, extra);
    if (annotation != null) output.push(annotation);
  }
  return output;
}
