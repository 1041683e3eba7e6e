import { Row } from '../row';

export default interface RowIterator extends IterableIterator<Row[]> {
  getTables(): string[];
  getColumns(): { [table: string]: string[] };
  // Rewinds the iterator to first position so it can be drained again.
  rewind(): void;
}
