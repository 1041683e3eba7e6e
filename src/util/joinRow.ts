import { Row } from '../row';

const createJoinRow = (
  leftTables: string[], rightTables: string[],
) => (left: Row, right: Row): Row => {
  let output: Row = {};
  for (let i = 0; i < leftTables.length; ++i) {
    let key = leftTables[i];
    output[key] = left[key];
  }
  for (let i = 0; i < rightTables.length; ++i) {
    let key = rightTables[i];
    output[key] = right[key];
  }
  return output;
};

export default createJoinRow;
