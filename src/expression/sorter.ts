import { OrderByItem } from '../parser/type';
import { Row } from '../row';
import { sortCompare } from '../value';
import compileExpression, { Scope } from '.';

/**
 * NULL is the lowest value, so it sorts first ascending and last descending.
 */
export default function compileSorter(scope: Scope, order: OrderByItem[]) {
  // Compile each evaluators
  let directions = order.map(item => item.direction === 'DESC');
  let evaluators = order.map(item =>
    compileExpression(scope, item.expression));
  return (a: Row, b: Row): number => {
    for (let i = 0; i < evaluators.length; ++i) {
      let evaluator = evaluators[i];
      let result = sortCompare(evaluator(a), evaluator(b));
      if (result !== 0) return directions[i] ? -result : result;
    }
    return 0;
  };
}
