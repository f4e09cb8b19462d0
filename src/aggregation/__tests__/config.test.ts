import { describe, it, expect } from 'vitest';
import { DEFAULT_METRICS, resolveAggregationConfig } from '../config.js';
import { ValidationError } from '../../utils/errors.js';

function issuesOf(run: () => unknown): string[] {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('resolveAggregationConfig', () => {
  it('should apply defaults', () => {
    expect(resolveAggregationConfig()).toEqual({
      filterClassification: null,
      groupBy: ['stayYears'],
      metrics: DEFAULT_METRICS,
      sort: [{ key: 'stayYears', direction: 'desc' }],
      limit: undefined
    });
  });

  it('should name metrics without an alias after function and field', () => {
    const config = resolveAggregationConfig({
      metrics: [{ field: 'acculturativeStressScore', fn: 'max', decimalPlaces: 0 }]
    });

    expect(config.metrics[0].as).toBe('max_acculturativeStressScore');
  });

  it('should default the sort key to the first group field', () => {
    expect(resolveAggregationConfig({ groupBy: ['academicLevel', 'stayYears'] }).sort).toEqual([
      { key: 'academicLevel', direction: 'desc' }
    ]);
  });

  it('should report an unknown metric field by path', () => {
    const config = JSON.parse('{"metrics":[{"field":"gpa","fn":"mean","decimalPlaces":2}]}');

    expect(issuesOf(() => resolveAggregationConfig(config))).toEqual([
      'metrics.0.field: unknown metric field "gpa"'
    ]);
  });

  it('should report negative decimal places', () => {
    const issues = issuesOf(() =>
      resolveAggregationConfig({ metrics: [{ field: 'depressionScore', fn: 'mean', decimalPlaces: -1 }] })
    );

    expect(issues).toEqual(['metrics.0.decimalPlaces: decimalPlaces must not be negative']);
  });

  it('should report limits that are not positive integers', () => {
    expect(issuesOf(() => resolveAggregationConfig({ limit: 0 }))).toEqual([
      'limit: limit must be a positive integer'
    ]);
    expect(issuesOf(() => resolveAggregationConfig({ limit: 2.5 }))).toEqual([
      'limit: limit must be an integer'
    ]);
  });

  it('should report an unknown group field', () => {
    const config = JSON.parse('{"groupBy":"faculty"}');

    expect(issuesOf(() => resolveAggregationConfig(config))).toEqual([
      'groupBy.0: unknown group field "faculty"'
    ]);
  });

  it('should reject a sort key that names no column', () => {
    expect(issuesOf(() => resolveAggregationConfig({ sortKey: 'meanGpa' }))).toEqual([
      'sortKey: "meanGpa" is not a group field, "count" or a metric alias'
    ]);
  });

  it('should reject duplicate and reserved metric aliases', () => {
    const issues = issuesOf(() =>
      resolveAggregationConfig({
        metrics: [
          { field: 'depressionScore', fn: 'mean', decimalPlaces: 2, as: 'phq' },
          { field: 'depressionScore', fn: 'max', decimalPlaces: 2, as: 'phq' },
          { field: 'depressionScore', fn: 'min', decimalPlaces: 2, as: 'count' }
        ]
      })
    );

    expect(issues).toEqual([
      'metrics: duplicate alias "phq"',
      'metrics: alias "count" collides with a built-in column'
    ]);
  });

  it('should accept a sort key naming a metric alias', () => {
    expect(resolveAggregationConfig({ sortKey: 'meanConnectedness', sortDirection: 'asc' }).sort).toEqual([
      { key: 'meanConnectedness', direction: 'asc' }
    ]);
  });

  it('should resolve a list of sort keys, filling in the default direction', () => {
    const config = resolveAggregationConfig({
      groupBy: ['classification', 'stayYears'],
      sortKey: [{ key: 'classification', direction: 'asc' }, { key: 'count' }],
      sortDirection: 'desc'
    });

    expect(config.sort).toEqual([
      { key: 'classification', direction: 'asc' },
      { key: 'count', direction: 'desc' }
    ]);
  });

  it('should reject repeated and unknown keys in a sort list', () => {
    const issues = issuesOf(() =>
      resolveAggregationConfig({
        sortKey: [{ key: 'stayYears' }, { key: 'meanGpa' }, { key: 'stayYears', direction: 'asc' }]
      })
    );

    expect(issues).toEqual([
      'sortKey: "meanGpa" is not a group field, "count" or a metric alias',
      'sortKey: keys must not repeat'
    ]);
  });

  it('should report a bad direction in a sort list by path', () => {
    const config = JSON.parse('{"sortKey":[{"key":"stayYears","direction":"up"}]}');

    const issues = issuesOf(() => resolveAggregationConfig(config));

    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^sortKey\.0\.direction: /);
  });
});
