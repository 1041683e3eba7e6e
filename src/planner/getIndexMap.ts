import { IndexDefinition } from '../dataset/type';

export type IndexMap = { [column: string]: IndexDefinition[] };

// Lower-cased column name to the indexes on it, in definition order.
export default function getIndexMap(indexes: IndexDefinition[]): IndexMap {
  let output: IndexMap = {};
  indexes.forEach((index) => {
    let key = index.column.toLowerCase();
    if (output[key] == null) output[key] = [];
    output[key].push(index);
  });
  return output;
}
