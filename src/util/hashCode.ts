import { Value, stringify } from '../value';

// Integers and floats that compare equal share a key.
export function valueKey(value: Value): string {
  switch (value.type) {
    case 'null':
      return 'null';
    case 'integer':
    case 'float':
      return 'n:' + value.value;
    case 'date':
      return 'd:' + value.value.getTime();
    case 'boolean':
      return 'b:' + value.value;
    default:
      return 't:' + stringify(value);
  }
}

// Same hash code routine that Java uses. Collisions are possible, so callers
// confirm matches with deep-equal on the keys.
export default function hashCode(value: string | string[]): number {
  if (Array.isArray(value)) {
    let result = 17;
    for (let i = 0; i < value.length; ++i) {
      result = 31 * result + hashCode(value[i]) | 0;
    }
    return result;
  }
  let result = 17;
  for (let i = 0; i < value.length; ++i) {
    result = 31 * result + value.charCodeAt(i) | 0;
  }
  return result;
}
