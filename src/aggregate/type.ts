import { Value } from '../value';

export default interface Aggregate {
  init(): void;
  // NULL inputs are skipped by every aggregate; COUNT(*) feeds a non-null
  // marker per row.
  next(value: Value): void;
  finalize(): Value;
}
