/**
 * Data-quality checks run before aggregation.
 * They report problems and never drop, clamp or rewrite records.
 */

import { ValidationError } from '../utils/errors.js';
import { maximum, minimum, presentValues } from './core/aggregation-utils.js';
import type { MetricField, StudentRecord } from './types.js';

export type NullableField = keyof Omit<StudentRecord, 'id'>;

export interface InstrumentDomain {
  label: string;
  min: number;
  max: number;
}

/**
 * Documented score range of each questionnaire, plus the expected stay range
 */
export const INSTRUMENT_DOMAINS: Record<MetricField, InstrumentDomain> = {
  stayYears: { label: 'Stay (years)', min: 1, max: 10 },
  depressionScore: { label: 'PHQ-9 (depression)', min: 0, max: 27 },
  connectednessScore: { label: 'SCS (social connectedness)', min: 20, max: 80 },
  acculturativeStressScore: { label: 'ASISS (acculturative stress)', min: 24, max: 120 }
};

export const SCORE_FIELDS: MetricField[] = [
  'depressionScore',
  'connectednessScore',
  'acculturativeStressScore'
];

export interface RangeSummary {
  field: MetricField;
  label: string;
  min: number | null;
  max: number | null;
  nonNull: number;
  /** All records examined, null or not */
  total: number;
}

/**
 * Count null (or absent) values per field
 */
export function countNulls(
  records: readonly StudentRecord[],
  fields: readonly NullableField[]
): Record<string, number> {
  return Object.fromEntries(
    fields.map(field => [
      field,
      records.filter(record => record[field] === null || record[field] === undefined).length
    ])
  );
}

/**
 * Ids of records whose value lies outside [expectedMin, expectedMax].
 * Null values are not violations.
 * @throws ValidationError when expectedMin exceeds expectedMax
 */
export function rangeCheck(
  records: readonly StudentRecord[],
  field: MetricField,
  expectedMin: number,
  expectedMax: number
): string[] {
  if (Number.isNaN(expectedMin) || Number.isNaN(expectedMax) || expectedMin > expectedMax) {
    throw new ValidationError(
      `Invalid range for ${field}: [${expectedMin}, ${expectedMax}]`
    );
  }

  return records
    .filter(record => {
      const value = record[field];
      return value !== null && (value < expectedMin || value > expectedMax);
    })
    .map(record => record.id);
}

/**
 * Observed minimum and maximum per field
 */
export function summarizeRanges(
  records: readonly StudentRecord[],
  fields: readonly MetricField[] = SCORE_FIELDS
): RangeSummary[] {
  return fields.map(field => {
    const values = presentValues(records.map(record => record[field]));
    return {
      field,
      label: INSTRUMENT_DOMAINS[field].label,
      min: minimum(values),
      max: maximum(values),
      nonNull: values.length,
      total: records.length
    };
  });
}

/**
 * Range-check every field against its documented instrument domain
 */
export function checkInstrumentDomains(
  records: readonly StudentRecord[]
): Record<MetricField, string[]> {
  const check = (field: MetricField): string[] =>
    rangeCheck(records, field, INSTRUMENT_DOMAINS[field].min, INSTRUMENT_DOMAINS[field].max);

  return {
    stayYears: check('stayYears'),
    depressionScore: check('depressionScore'),
    connectednessScore: check('connectednessScore'),
    acculturativeStressScore: check('acculturativeStressScore')
  };
}
