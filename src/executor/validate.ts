import { ParsedQuery } from '../parser/type';
import {
  NoTablesError, SyntaxError, UnsupportedFeatureError,
} from '../errors';

const ALTERNATIVES: { [feature: string]: string } = {
  'Subqueries': 'Rewrite the subquery as a JOIN or a CTE',
  'UNION': 'Use UNION ALL inside a CTE and SELECT DISTINCT from it',
  'Derived tables': 'Move the inner query into a WITH clause',
  'FULL OUTER JOIN': 'Combine a LEFT JOIN and a RIGHT JOIN in a CTE ' +
    'with UNION ALL',
  'JOIN ... USING': 'Spell the condition out with ON a.col = b.col',
};

/**
 * Turns what the parser could not make sense of into the matching error.
 * Only the first diagnostic is reported.
 */
export default function assertExecutable(parsed: ParsedQuery): void {
  let diagnostic = parsed.diagnostics[0];
  if (diagnostic != null) {
    switch (diagnostic.code) {
      case 'missing_table':
        throw new NoTablesError();
      case 'unsupported':
        throw new UnsupportedFeatureError(diagnostic.message,
          ALTERNATIVES[diagnostic.message]);
      default: {
        let near = diagnostic.near != null ? ` near '${diagnostic.near}'` : '';
        throw new SyntaxError(`${diagnostic.message}${near}`,
          diagnostic.near);
      }
    }
  }
  if (parsed.type === 'UNKNOWN') {
    // Only reachable when nothing follows a WITH clause.
    throw new SyntaxError('Expected a SELECT statement', null,
      'Follow the WITH clause with the main SELECT');
  }
  if (parsed.type !== 'SELECT') {
    throw new UnsupportedFeatureError(`${parsed.type} statements`,
      'Only SELECT queries can be executed against the read-only dataset');
  }
}
