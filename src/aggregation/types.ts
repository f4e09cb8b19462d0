/**
 * Aggregation types for student wellbeing summaries
 */

export const CLASSIFICATIONS = ['International', 'Domestic'] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

/**
 * One survey respondent. Scores are questionnaire totals:
 * PHQ-9 depression [0,27], SCS connectedness [20,80], ASISS stress [24,120].
 */
export interface StudentRecord {
  readonly id: string;
  readonly classification: Classification | null;
  /** Length of stay in years, expected 1-10 */
  readonly stayYears: number | null;
  readonly depressionScore: number | null;
  readonly connectednessScore: number | null;
  readonly acculturativeStressScore: number | null;
  readonly academicLevel?: string | null;
}

export const METRIC_FIELDS = [
  'stayYears',
  'depressionScore',
  'connectednessScore',
  'acculturativeStressScore'
] as const;

/** Numeric fields a metric can read */
export type MetricField = (typeof METRIC_FIELDS)[number];

export const GROUP_FIELDS = ['stayYears', 'classification', 'academicLevel'] as const;

export type GroupField = (typeof GROUP_FIELDS)[number];

export type GroupKeyValue = string | number;

export const AGGREGATE_FUNCTIONS = ['mean', 'count', 'min', 'max', 'stddev'] as const;

export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

export type SortDirection = 'asc' | 'desc';

export interface SortSpec {
  /** Group field, 'count', or a metric alias */
  key: string;
  /** Falls back to the config's sortDirection */
  direction?: SortDirection;
}

export type ResolvedSort = Required<SortSpec>;

export interface MetricSpec {
  field: MetricField;
  fn: AggregateFunction;
  decimalPlaces: number;
  /** Output column name, defaults to `<fn>_<field>` */
  as?: string;
}

/**
 * Aggregation configuration as accepted from callers.
 * Every field is optional; see DEFAULT_AGGREGATION_CONFIG.
 */
export interface AggregationConfig {
  filterClassification?: Classification | null;
  groupBy?: GroupField | GroupField[];
  metrics?: MetricSpec[];
  /**
   * A single key, or keys compared in turn. Rows still tied are ordered
   * by ascending group key.
   */
  sortKey?: string | SortSpec[];
  sortDirection?: SortDirection;
  limit?: number;
}

export interface ResolvedMetric {
  field: MetricField;
  fn: AggregateFunction;
  decimalPlaces: number;
  as: string;
}

/**
 * Validated configuration with defaults applied
 */
export interface ResolvedAggregationConfig {
  filterClassification: Classification | null;
  groupBy: GroupField[];
  metrics: ResolvedMetric[];
  sort: ResolvedSort[];
  limit?: number;
}

/**
 * One output group. `group` and `metrics` keep configured order.
 */
export interface AggregateRow {
  group: Partial<Record<GroupField, GroupKeyValue>>;
  count: number;
  metrics: Record<string, number | null>;
}

export interface AggregationDiagnostics {
  inputCount: number;
  filteredCount: number;
  /** Filtered records dropped for a null group key */
  excludedNullKey: number;
  /** Distinct groups before the limit was applied */
  groupCount: number;
  truncatedGroups: number;
}

export interface AggregationResult {
  rows: AggregateRow[];
  diagnostics: AggregationDiagnostics;
}

/**
 * Reference report row: international students by length of stay
 */
export interface SummaryRow {
  stayYears: number;
  count: number;
  meanDepression: number | null;
  meanConnectedness: number | null;
  meanAcculturativeStress: number | null;
}

export interface StaySummaryOptions {
  filterClassification?: Classification | null;
  limit?: number;
  sortDirection?: SortDirection;
}
