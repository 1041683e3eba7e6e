export default function drainIterator<T>(iterable: Iterable<T[]>): T[] {
  let output: T[] = [];
  for (let value of iterable) {
    for (let i = 0; i < value.length; ++i) {
      output.push(value[i]);
    }
  }
  return output;
}
