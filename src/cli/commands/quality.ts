import { Command } from 'commander';
import chalk from 'chalk';
import {
  checkInstrumentDomains,
  countNulls,
  INSTRUMENT_DOMAINS,
  summarizeRanges,
  type NullableField,
  type RangeSummary
} from '../../aggregation/quality.js';
import { METRIC_FIELDS, type Classification, type MetricField, type StudentRecord } from '../../aggregation/types.js';
import { loadStudentRecords } from '../../data/loader.js';
import { loadStayscopeConfig, resolveFilterOption } from '../../utils/config.js';
import { formatErrorForUser } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatIdList, rangeSummaryRows, renderTable } from '../formatter.js';

export interface QualityCommandOptions {
  filter?: string;
  json?: boolean;
}

export interface QualityReport {
  filterClassification: Classification | null;
  recordCount: number;
  nullCounts: Record<string, number>;
  ranges: RangeSummary[];
  outOfRange: Record<MetricField, string[]>;
}

const NULL_CHECK_FIELDS: NullableField[] = ['classification', ...METRIC_FIELDS];

/**
 * Run the pre-aggregation checks over the records that pass the filter
 */
export function buildQualityReport(
  records: readonly StudentRecord[],
  filterClassification: Classification | null
): QualityReport {
  const scoped = filterClassification
    ? records.filter(record => record.classification === filterClassification)
    : records;

  return {
    filterClassification,
    recordCount: scoped.length,
    nullCounts: countNulls(scoped, NULL_CHECK_FIELDS),
    ranges: summarizeRanges(scoped),
    outOfRange: checkInstrumentDomains(scoped)
  };
}

function printReport(report: QualityReport): void {
  const scope = report.filterClassification ?? 'all';
  console.log(chalk.bold(`\nData quality: ${report.recordCount} record(s), classification ${scope}\n`));

  console.log(chalk.bold('Missing values:'));
  for (const [field, count] of Object.entries(report.nullCounts)) {
    const line = `  ${field.padEnd(26)} ${count}`;
    console.log(count > 0 ? chalk.yellow(line) : line);
  }
  console.log();

  console.log(renderTable(['metric', 'min', 'max', 'n', 'missing'], rangeSummaryRows(report.ranges)));
  console.log();

  console.log(chalk.bold('Outside documented range:'));
  for (const field of METRIC_FIELDS) {
    const ids = report.outOfRange[field];
    const domain = INSTRUMENT_DOMAINS[field];
    const label = `${domain.label} [${domain.min}, ${domain.max}]`;
    if (ids.length === 0) {
      console.log(`  ${chalk.green('✓')} ${label}`);
    } else {
      console.log(`  ${chalk.yellow('⚠')} ${label}: ${ids.length} record(s): ${formatIdList(ids)}`);
    }
  }
  console.log();
}

export function createQualityCommand(): Command {
  const command = new Command('quality');

  command
    .description('Report missing values and out-of-range scores before aggregating')
    .argument('<file>', 'Survey export (.csv or .json)')
    .option('-f, --filter <classification>', 'International, Domestic or all')
    .option('--json', 'Print JSON instead of text')
    .action(async (file: string, options: QualityCommandOptions) => {
      try {
        const filterClassification = resolveFilterOption(
          options.filter,
          loadStayscopeConfig().filterClassification
        );

        const records = await loadStudentRecords(file);
        const report = buildQualityReport(records, filterClassification);

        if (options.json) {
          console.log(JSON.stringify(report, null, 2));
        } else {
          printReport(report);
        }
      } catch (error: unknown) {
        logger.error('Failed to check data quality:', formatErrorForUser(error));
        process.exitCode = 1;
      }
    });

  return command;
}
