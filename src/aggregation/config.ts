/**
 * Aggregation configuration: defaults and validation
 */

import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import {
  AGGREGATE_FUNCTIONS,
  CLASSIFICATIONS,
  GROUP_FIELDS,
  METRIC_FIELDS,
  type AggregationConfig,
  type GroupField,
  type MetricSpec,
  type ResolvedAggregationConfig,
  type ResolvedSort,
  type SortSpec
} from './types.js';

/**
 * Mean PHQ-9, SCS and ASISS at two decimal places
 */
export const DEFAULT_METRICS: MetricSpec[] = [
  { field: 'depressionScore', fn: 'mean', decimalPlaces: 2, as: 'meanDepression' },
  { field: 'connectednessScore', fn: 'mean', decimalPlaces: 2, as: 'meanConnectedness' },
  { field: 'acculturativeStressScore', fn: 'mean', decimalPlaces: 2, as: 'meanAcculturativeStress' }
];

export const DEFAULT_AGGREGATION_CONFIG = {
  filterClassification: null,
  groupBy: 'stayYears',
  metrics: DEFAULT_METRICS,
  sortDirection: 'desc'
} as const satisfies AggregationConfig;

/** Row cap of the international-students-by-stay report */
export const DEFAULT_STAY_LIMIT = 9;

export const MAX_DECIMAL_PLACES = 15;

const metricSchema = z.object({
  field: z.enum(METRIC_FIELDS, {
    errorMap: (_issue, ctx) => ({ message: `unknown metric field "${String(ctx.data)}"` })
  }),
  fn: z.enum(AGGREGATE_FUNCTIONS),
  decimalPlaces: z
    .number()
    .int('decimalPlaces must be an integer')
    .min(0, 'decimalPlaces must not be negative')
    .max(MAX_DECIMAL_PLACES, `decimalPlaces must be at most ${MAX_DECIMAL_PLACES}`),
  as: z.string().min(1).optional()
});

const groupFieldSchema = z.enum(GROUP_FIELDS, {
  errorMap: (_issue, ctx) => ({ message: `unknown group field "${String(ctx.data)}"` })
});

const sortDirectionSchema = z.enum(['asc', 'desc']);

const sortSpecSchema = z.object({
  key: z.string().min(1),
  direction: sortDirectionSchema.optional()
});

const configSchema = z.object({
  filterClassification: z.enum(CLASSIFICATIONS).nullable().optional(),
  // A single field is shorthand for a one-element list
  groupBy: z
    .preprocess(value => (typeof value === 'string' ? [value] : value), z.array(groupFieldSchema).min(1))
    .optional(),
  metrics: z.array(metricSchema).optional(),
  sortKey: z
    .preprocess(value => (typeof value === 'string' ? [{ key: value }] : value), z.array(sortSpecSchema).min(1))
    .optional(),
  sortDirection: sortDirectionSchema.optional(),
  limit: z.number().int('limit must be an integer').positive('limit must be a positive integer').optional()
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const location = issue.path.join('.');
    return location ? `${location}: ${issue.message}` : issue.message;
  });
}

function fail(issues: string[]): never {
  throw new ValidationError(`Invalid aggregation config: ${issues.join('; ')}`, issues);
}

/**
 * Validate a caller-supplied config and apply defaults.
 * @throws ValidationError listing every problem found
 */
export function resolveAggregationConfig(config: AggregationConfig = {}): ResolvedAggregationConfig {
  const parsed = configSchema.safeParse(config);
  if (!parsed.success) {
    fail(formatIssues(parsed.error));
  }

  const input = parsed.data;
  const groupBy: GroupField[] = input.groupBy ?? [DEFAULT_AGGREGATION_CONFIG.groupBy];

  const metrics = (input.metrics ?? DEFAULT_METRICS).map(metric => ({
    field: metric.field,
    fn: metric.fn,
    decimalPlaces: metric.decimalPlaces,
    as: metric.as ?? `${metric.fn}_${metric.field}`
  }));

  const issues: string[] = [];

  if (new Set(groupBy).size !== groupBy.length) {
    issues.push('groupBy: fields must not repeat');
  }

  const aliases = new Set<string>();
  for (const metric of metrics) {
    if (aliases.has(metric.as)) {
      issues.push(`metrics: duplicate alias "${metric.as}"`);
    }
    if (metric.as === 'count' || groupBy.some(field => field === metric.as)) {
      issues.push(`metrics: alias "${metric.as}" collides with a built-in column`);
    }
    aliases.add(metric.as);
  }

  const sortDirection = input.sortDirection ?? DEFAULT_AGGREGATION_CONFIG.sortDirection;
  const requested: SortSpec[] = input.sortKey ?? [{ key: groupBy[0] }];
  const sort: ResolvedSort[] = requested.map(spec => ({
    key: spec.key,
    direction: spec.direction ?? sortDirection
  }));

  for (const { key } of sort) {
    const sortable = key === 'count' || aliases.has(key) || groupBy.some(field => field === key);
    if (!sortable) {
      issues.push(`sortKey: "${key}" is not a group field, "count" or a metric alias`);
    }
  }
  if (new Set(sort.map(spec => spec.key)).size !== sort.length) {
    issues.push('sortKey: keys must not repeat');
  }

  if (issues.length > 0) {
    fail(issues);
  }

  return {
    filterClassification: input.filterClassification ?? DEFAULT_AGGREGATION_CONFIG.filterClassification,
    groupBy,
    metrics,
    sort,
    limit: input.limit
  };
}
