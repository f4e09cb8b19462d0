import { Command } from 'commander';
import chalk from 'chalk';
import { aggregateWithDiagnostics, toSummaryRow } from '../../aggregation/aggregator.js';
import { DEFAULT_METRICS, resolveAggregationConfig } from '../../aggregation/config.js';
import { withRiskProfiles } from '../../aggregation/risk.js';
import {
  GROUP_FIELDS,
  type AggregationConfig,
  type AggregationDiagnostics,
  type GroupField,
  type MetricSpec,
  type SortDirection,
  type SortSpec,
  type StudentRecord
} from '../../aggregation/types.js';
import { loadStudentRecords } from '../../data/loader.js';
import { loadStayscopeConfig, resolveFilterOption, type StayscopeConfig } from '../../utils/config.js';
import { formatErrorForUser, ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { describeDiagnostics, flattenRow, renderTable, type FlatRow } from '../formatter.js';

export interface SummaryCommandOptions {
  filter?: string;
  groupBy?: string;
  sort?: string;
  order?: string;
  limit?: string;
  stats?: boolean;
  risk?: boolean;
  json?: boolean;
}

export interface SummaryReport {
  columns: string[];
  rows: FlatRow[];
  diagnostics: AggregationDiagnostics;
  groupBy: GroupField[];
}

function parseGroupBy(value: string): GroupField[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const field = GROUP_FIELDS.find(candidate => candidate === part);
      if (!field) {
        throw new ValidationError(`Unknown group field "${part}". Expected one of: ${GROUP_FIELDS.join(', ')}`);
      }
      return field;
    });
}

function parseOrder(value: string): SortDirection {
  if (value !== 'asc' && value !== 'desc') {
    throw new ValidationError(`Invalid order "${value}". Expected asc or desc`);
  }
  return value;
}

/**
 * Parse `key[:direction]` pairs, e.g. `classification:asc,stayYears:desc`.
 * A key without a direction takes --order.
 */
function parseSort(value: string): SortSpec[] {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const [key, direction, ...rest] = part.split(':');
      if (!key || rest.length > 0) {
        throw new ValidationError(`Invalid sort "${part}". Expected key or key:asc|desc`);
      }
      return direction === undefined ? { key } : { key, direction: parseOrder(direction) };
    });
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`Invalid limit "${value}". Expected a positive integer`);
  }
  return limit;
}

/**
 * Depression spread per group
 */
function statsMetrics(decimalPlaces: number): MetricSpec[] {
  return [
    { field: 'depressionScore', fn: 'stddev', decimalPlaces, as: 'stddevDepression' },
    { field: 'depressionScore', fn: 'min', decimalPlaces, as: 'minDepression' },
    { field: 'depressionScore', fn: 'max', decimalPlaces, as: 'maxDepression' }
  ];
}

/**
 * Translate command-line options into an aggregation config
 */
export function buildAggregationConfig(
  options: SummaryCommandOptions,
  config: StayscopeConfig
): AggregationConfig {
  const filterClassification = resolveFilterOption(options.filter, config.filterClassification);
  const groupBy: GroupField[] = options.groupBy ? parseGroupBy(options.groupBy) : ['stayYears'];
  if (groupBy.length === 0) {
    throw new ValidationError('--group-by needs at least one field');
  }

  const metrics: MetricSpec[] = DEFAULT_METRICS.map(metric => ({
    ...metric,
    decimalPlaces: config.decimalPlaces
  }));
  if (options.stats) {
    metrics.push(...statsMetrics(config.decimalPlaces));
  }

  return {
    filterClassification,
    groupBy,
    metrics,
    sortKey: options.sort ? parseSort(options.sort) : groupBy[0],
    sortDirection: options.order ? parseOrder(options.order) : config.sortDirection,
    limit: options.limit ? parseLimit(options.limit) : config.limit
  };
}

/**
 * Aggregate records into a printable report
 * @throws ValidationError for bad options
 */
export function buildSummaryReport(
  records: readonly StudentRecord[],
  options: SummaryCommandOptions,
  config: StayscopeConfig
): SummaryReport {
  const aggregationConfig = buildAggregationConfig(options, config);
  const { groupBy, metrics } = resolveAggregationConfig(aggregationConfig);

  if (options.risk && (groupBy.length !== 1 || groupBy[0] !== 'stayYears')) {
    throw new ValidationError('--risk is only available when grouping by stayYears');
  }

  const { rows, diagnostics } = aggregateWithDiagnostics(records, aggregationConfig);
  const columns = [...groupBy, 'count', ...metrics.map(metric => metric.as)];

  if (!options.risk) {
    return { columns, rows: rows.map(flattenRow), diagnostics, groupBy };
  }

  const profiles = withRiskProfiles(rows.map(toSummaryRow));
  return {
    columns: [...columns, 'riskProfile'],
    rows: rows.map((row, i) => ({ ...flattenRow(row), riskProfile: profiles[i].riskProfile })),
    diagnostics,
    groupBy
  };
}

export function createSummaryCommand(): Command {
  const command = new Command('summary');

  command
    .description('Summarise wellbeing scores per group (default: international students by length of stay)')
    .argument('<file>', 'Survey export (.csv or .json)')
    .option('-f, --filter <classification>', 'International, Domestic or all')
    .option('-g, --group-by <fields>', `Comma-separated group fields (${GROUP_FIELDS.join(', ')})`)
    .option('-s, --sort <keys>', 'Comma-separated sort keys (group field, count or metric column), each optionally :asc or :desc')
    .option('-o, --order <direction>', 'asc or desc')
    .option('-l, --limit <n>', 'Maximum number of rows')
    .option('--stats', 'Add depression standard deviation, min and max')
    .option('--risk', 'Add a risk profile per stay group')
    .option('--json', 'Print JSON instead of a table')
    .action(async (file: string, options: SummaryCommandOptions) => {
      try {
        const config = loadStayscopeConfig();
        const records = await loadStudentRecords(file);
        const report = buildSummaryReport(records, options, config);

        if (options.json) {
          console.log(JSON.stringify({ rows: report.rows, diagnostics: report.diagnostics }, null, 2));
          return;
        }

        if (report.rows.length === 0) {
          console.log(chalk.yellow('\nNo groups to report.\n'));
        } else {
          console.log();
          console.log(renderTable(report.columns, report.rows));
          console.log();
        }

        for (const line of describeDiagnostics(report.diagnostics, report.groupBy.join('/'))) {
          console.log(chalk.dim(line));
        }
      } catch (error: unknown) {
        logger.error('Failed to build summary:', formatErrorForUser(error));
        process.exitCode = 1;
      }
    });

  return command;
}
