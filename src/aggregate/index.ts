import Aggregate from './type';
import { AggregateName } from '../parser/type';
import {
  NULL, Value, arithmetic, float, integer, sortCompare,
} from '../value';
import { TypeMismatchError } from '../errors';

function checkNumeric(value: Value): void {
  if (value.type !== 'integer' && value.type !== 'float' &&
    value.type !== 'boolean') {
    throw new TypeMismatchError('float', value.type);
  }
}

export class SumAggregate implements Aggregate {
  sum: Value = NULL;
  init() {
    this.sum = NULL;
  }
  next(value: Value) {
    if (value.type === 'null') return;
    checkNumeric(value);
    this.sum = this.sum.type === 'null' ? arithmetic('+', integer(0), value)
      : arithmetic('+', this.sum, value);
  }
  finalize() {
    return this.sum;
  }
}

export class CountAggregate implements Aggregate {
  count: number = 0;
  init() {
    this.count = 0;
  }
  next(value: Value) {
    if (value.type === 'null') return;
    this.count += 1;
  }
  finalize() {
    return integer(this.count);
  }
}

export class AvgAggregate implements Aggregate {
  sum: number = 0;
  count: number = 0;
  init() {
    this.sum = 0;
    this.count = 0;
  }
  next(value: Value) {
    if (value.type === 'null') return;
    checkNumeric(value);
    if (value.type === 'boolean') this.sum += value.value ? 1 : 0;
    else if (value.type === 'integer' || value.type === 'float') {
      this.sum += value.value;
    }
    this.count += 1;
  }
  finalize() {
    if (this.count === 0) return NULL;
    return float(this.sum / this.count);
  }
}

export class MaxAggregate implements Aggregate {
  max: Value = NULL;
  init() {
    this.max = NULL;
  }
  next(value: Value) {
    if (value.type === 'null') return;
    if (this.max.type === 'null' || sortCompare(value, this.max) > 0) {
      this.max = value;
    }
  }
  finalize() {
    return this.max;
  }
}

export class MinAggregate implements Aggregate {
  min: Value = NULL;
  init() {
    this.min = NULL;
  }
  next(value: Value) {
    if (value.type === 'null') return;
    if (this.min.type === 'null' || sortCompare(value, this.min) < 0) {
      this.min = value;
    }
  }
  finalize() {
    return this.min;
  }
}

const AggregateTypes: { [key in AggregateName]: () => Aggregate } = {
  sum: () => new SumAggregate(),
  count: () => new CountAggregate(),
  avg: () => new AvgAggregate(),
  min: () => new MinAggregate(),
  max: () => new MaxAggregate(),
};

export default AggregateTypes;
