/**
 * Student Wellbeing Aggregator
 *
 * Filters student records, groups them by one or more fields and computes
 * the configured metrics per group. Pure and synchronous: the whole record
 * set is buffered, since sort and limit depend on complete groups.
 */

import { logger } from '../utils/logger.js';
import { DEFAULT_METRICS, DEFAULT_STAY_LIMIT, resolveAggregationConfig } from './config.js';
import {
  compareKeys,
  compareSortValues,
  computeMetric,
  groupByKey
} from './core/aggregation-utils.js';
import type {
  AggregateRow,
  AggregationConfig,
  AggregationResult,
  GroupField,
  GroupKeyValue,
  ResolvedAggregationConfig,
  StaySummaryOptions,
  StudentRecord,
  SummaryRow
} from './types.js';

/**
 * Read a group-by field; null when the record cannot be grouped on it
 */
function groupValue(record: StudentRecord, field: GroupField): GroupKeyValue | null {
  const value = record[field];
  return value === undefined ? null : value;
}

function sortValue(row: AggregateRow, key: string, groupBy: GroupField[]): GroupKeyValue | null {
  if (key === 'count') {
    return row.count;
  }
  const groupField = groupBy.find(field => field === key);
  if (groupField) {
    return row.group[groupField] ?? null;
  }
  return row.metrics[key] ?? null;
}

/**
 * Order rows by each sort key in turn, then by ascending group key
 */
function compareRows(a: AggregateRow, b: AggregateRow, config: ResolvedAggregationConfig): number {
  for (const { key, direction } of config.sort) {
    const diff = compareSortValues(
      sortValue(a, key, config.groupBy),
      sortValue(b, key, config.groupBy),
      direction
    );
    if (diff !== 0) return diff;
  }
  return compareKeys(groupKeyOf(a, config.groupBy), groupKeyOf(b, config.groupBy));
}

function groupKeyOf(row: AggregateRow, groupBy: GroupField[]): GroupKeyValue[] {
  return groupBy.map(field => row.group[field] ?? '');
}

/**
 * Aggregate records and report what was filtered and dropped along the way
 * @throws ValidationError when the config is malformed
 */
export function aggregateWithDiagnostics(
  records: readonly StudentRecord[],
  config: AggregationConfig = {}
): AggregationResult {
  const resolved = resolveAggregationConfig(config);
  const { filterClassification, groupBy, metrics, limit } = resolved;

  // A null classification never matches a configured filter
  const filtered = filterClassification
    ? records.filter(r => r.classification === filterClassification)
    : [...records];

  const groupable: Array<{ record: StudentRecord; key: GroupKeyValue[] }> = [];
  let excludedNullKey = 0;

  for (const record of filtered) {
    const key: GroupKeyValue[] = [];
    for (const field of groupBy) {
      const value = groupValue(record, field);
      if (value === null) break;
      key.push(value);
    }

    if (key.length === groupBy.length) {
      groupable.push({ record, key });
    } else {
      excludedNullKey++;
    }
  }

  const groups = groupByKey(groupable, entry => entry.key);

  const rows: AggregateRow[] = [];
  for (const { key, items } of groups.values()) {
    const group: AggregateRow['group'] = {};
    groupBy.forEach((field, i) => {
      group[field] = key[i];
    });

    const values: AggregateRow['metrics'] = {};
    for (const metric of metrics) {
      values[metric.as] = computeMetric(
        metric.fn,
        items.map(({ record }) => record[metric.field]),
        metric.decimalPlaces
      );
    }

    rows.push({ group, count: items.length, metrics: values });
  }

  rows.sort((a, b) => compareRows(a, b, resolved));

  const limited = limit !== undefined ? rows.slice(0, limit) : rows;

  const diagnostics = {
    inputCount: records.length,
    filteredCount: filtered.length,
    excludedNullKey,
    groupCount: rows.length,
    truncatedGroups: rows.length - limited.length
  };

  logger.debug('Aggregation complete', diagnostics);
  if (excludedNullKey > 0) {
    logger.debug(`Excluded ${excludedNullKey} record(s) with a null ${groupBy.join('/')} value`);
  }

  return { rows: limited, diagnostics };
}

/**
 * Aggregate records into one row per group
 * @throws ValidationError when the config is malformed
 */
export function aggregate(
  records: readonly StudentRecord[],
  config: AggregationConfig = {}
): AggregateRow[] {
  return aggregateWithDiagnostics(records, config).rows;
}

/**
 * International students by length of stay: count and mean PHQ-9, SCS and
 * ASISS per stay, longest stay first, at most nine rows
 */
export function summarizeByStay(
  records: readonly StudentRecord[],
  options: StaySummaryOptions = {}
): SummaryRow[] {
  const rows = aggregate(records, {
    filterClassification:
      options.filterClassification === undefined ? 'International' : options.filterClassification,
    groupBy: 'stayYears',
    metrics: DEFAULT_METRICS,
    sortKey: 'stayYears',
    sortDirection: options.sortDirection ?? 'desc',
    limit: options.limit ?? DEFAULT_STAY_LIMIT
  });

  return rows.map(toSummaryRow);
}

/**
 * Convert a stay-grouped row carrying the default metric aliases
 */
export function toSummaryRow(row: AggregateRow): SummaryRow {
  const stayYears = row.group.stayYears;
  if (typeof stayYears !== 'number') {
    throw new TypeError('Summary rows require a numeric stayYears group');
  }

  return {
    stayYears,
    count: row.count,
    meanDepression: row.metrics.meanDepression ?? null,
    meanConnectedness: row.metrics.meanConnectedness ?? null,
    meanAcculturativeStress: row.metrics.meanAcculturativeStress ?? null
  };
}
