/**
 * Table and report formatting for CLI output
 */

import chalk from 'chalk';
import type { AggregateRow, AggregationDiagnostics, GroupKeyValue } from '../aggregation/types.js';
import type { RangeSummary } from '../aggregation/quality.js';

export type Cell = GroupKeyValue | null;

export type FlatRow = Record<string, Cell>;

/**
 * Group fields, then count, then metrics, in configured order
 */
export function flattenRow(row: AggregateRow): FlatRow {
  const flat: FlatRow = {};
  for (const [field, value] of Object.entries(row.group)) {
    if (value !== undefined) {
      flat[field] = value;
    }
  }
  flat.count = row.count;
  return Object.assign(flat, row.metrics);
}

export function formatCell(value: Cell): string {
  if (value === null) return '-';
  return String(value);
}

/**
 * Render rows as a fixed-width text table. Numbers are right-aligned.
 */
export function renderTable(columns: string[], rows: FlatRow[]): string {
  const widths = columns.map(column =>
    Math.max(column.length, ...rows.map(row => formatCell(row[column] ?? null).length))
  );

  const header = columns.map((column, i) => chalk.bold(column.padEnd(widths[i]))).join('  ');
  const rule = widths.map(width => '─'.repeat(width)).join('  ');
  const body = rows.map(row =>
    columns
      .map((column, i) => {
        const value = row[column] ?? null;
        const text = formatCell(value);
        return typeof value === 'number' ? text.padStart(widths[i]) : text.padEnd(widths[i]);
      })
      .join('  ')
      .trimEnd()
  );

  return [header.trimEnd(), chalk.dim(rule), ...body].join('\n');
}

export function describeDiagnostics(diagnostics: AggregationDiagnostics, groupLabel: string): string[] {
  const lines = [
    `${diagnostics.filteredCount} of ${diagnostics.inputCount} record(s) matched the filter`
  ];

  if (diagnostics.excludedNullKey > 0) {
    lines.push(`${diagnostics.excludedNullKey} record(s) excluded for a missing ${groupLabel}`);
  }
  if (diagnostics.truncatedGroups > 0) {
    lines.push(`${diagnostics.truncatedGroups} group(s) beyond the row limit not shown`);
  }

  return lines;
}

export function rangeSummaryRows(summaries: RangeSummary[]): FlatRow[] {
  return summaries.map(summary => ({
    metric: summary.label,
    min: summary.min,
    max: summary.max,
    n: summary.total,
    missing: summary.total - summary.nonNull
  }));
}

/**
 * List ids, capped so a badly broken export does not flood the terminal
 */
export function formatIdList(ids: string[], max = 10): string {
  if (ids.length <= max) {
    return ids.join(', ');
  }
  return `${ids.slice(0, max).join(', ')} and ${ids.length - max} more`;
}
