/**
 * Aggregation Utilities
 *
 * Grouping and descriptive statistics shared by the aggregator and the
 * data-quality checks. Every statistic skips null values.
 */

import type { AggregateFunction, GroupKeyValue, SortDirection } from '../types.js';
import { roundHalfAwayFromZero, roundQuotient } from './rounding.js';

/**
 * Values of a list that are present and finite
 */
export function presentValues(values: ReadonlyArray<number | null | undefined>): number[] {
  return values.filter((v): v is number => typeof v === 'number' && Number.isFinite(v));
}

export function sum(values: number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

export function minimum(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((min, v) => (v < min ? v : min), values[0]);
}

export function maximum(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((max, v) => (v > max ? v : max), values[0]);
}

/**
 * Sample standard deviation (n - 1 denominator); null below two values
 */
export function sampleStdDev(values: number[]): number | null {
  if (values.length < 2) return null;

  const mean = sum(values) / values.length;
  let sumSq = 0;
  for (const v of values) {
    const d = v - mean;
    sumSq += d * d;
  }
  return Math.sqrt(sumSq / (values.length - 1));
}

/**
 * Apply one aggregate function to a group's values and round the result
 */
export function computeMetric(
  fn: AggregateFunction,
  rawValues: ReadonlyArray<number | null | undefined>,
  decimalPlaces: number
): number | null {
  const values = presentValues(rawValues);

  switch (fn) {
    case 'count':
      return values.length;
    case 'mean':
      return values.length > 0 ? roundQuotient(sum(values), values.length, decimalPlaces) : null;
    case 'min':
      return roundOrNull(minimum(values), decimalPlaces);
    case 'max':
      return roundOrNull(maximum(values), decimalPlaces);
    case 'stddev':
      return roundOrNull(sampleStdDev(values), decimalPlaces);
  }
}

function roundOrNull(value: number | null, decimalPlaces: number): number | null {
  return value === null ? null : roundHalfAwayFromZero(value, decimalPlaces);
}

/**
 * Partition items by a composite key, keeping first-seen order of groups
 */
export function groupByKey<T>(
  items: Iterable<T>,
  keyExtractor: (item: T) => GroupKeyValue[]
): Map<string, { key: GroupKeyValue[]; items: T[] }> {
  const groups = new Map<string, { key: GroupKeyValue[]; items: T[] }>();

  for (const item of items) {
    const key = keyExtractor(item);
    // JSON keeps 1 and "1" apart
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.items.push(item);
    } else {
      groups.set(id, { key, items: [item] });
    }
  }

  return groups;
}

/**
 * Ascending order for a single key value: numbers before strings,
 * numbers numerically, strings by code unit
 */
export function compareKeyValues(a: GroupKeyValue, b: GroupKeyValue): number {
  if (typeof a === 'number' && typeof b === 'number') {
    return a - b;
  }
  if (typeof a === 'number') return -1;
  if (typeof b === 'number') return 1;
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Ascending order for composite keys, field by field
 */
export function compareKeys(a: GroupKeyValue[], b: GroupKeyValue[]): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = compareKeyValues(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

/**
 * Compare two sort values in the given direction; nulls always last
 */
export function compareSortValues(
  a: GroupKeyValue | null,
  b: GroupKeyValue | null,
  direction: SortDirection
): number {
  if (a === null && b === null) return 0;
  if (a === null) return 1;
  if (b === null) return -1;

  const diff = compareKeyValues(a, b);
  return direction === 'desc' ? -diff : diff;
}
