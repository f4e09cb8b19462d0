/**
 * Student record loader
 *
 * Reads survey exports (CSV with a header row, or a JSON array of objects)
 * into StudentRecord values. Accepts both the survey's short column names
 * (inter_dom, stay, todep, tosc, toas, academic) and camelCase field names.
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { Classification, StudentRecord } from '../aggregation/types.js';
import { DataLoadError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

type RawRow = Record<string, unknown>;

const rowsSchema = z.array(z.record(z.unknown()));

/**
 * Source column names accepted for each record field, first match wins
 */
export const COLUMN_ALIASES = {
  id: ['id'],
  classification: ['inter_dom', 'classification'],
  stayYears: ['stay', 'stayYears'],
  depressionScore: ['todep', 'depressionScore'],
  connectednessScore: ['tosc', 'connectednessScore'],
  acculturativeStressScore: ['toas', 'acculturativeStressScore'],
  academicLevel: ['academic', 'academicLevel']
} as const satisfies Record<keyof StudentRecord, readonly string[]>;

const CLASSIFICATION_VALUES: Record<string, Classification> = {
  inter: 'International',
  international: 'International',
  dom: 'Domestic',
  domestic: 'Domestic'
};

const MISSING_MARKERS = new Set(['', 'na', 'n/a', 'null']);

/** Plain decimal notation; no hex, binary or exponent forms */
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Raised for a single bad cell; the loader adds the file path
 */
export class RowParseError extends Error {
  constructor(
    public readonly rowNumber: number,
    public readonly column: string,
    reason: string
  ) {
    super(`row ${rowNumber}, column "${column}": ${reason}`);
    this.name = 'RowParseError';
  }
}

function pick(row: RawRow, aliases: readonly string[]): { column: string; value: unknown } {
  for (const column of aliases) {
    if (column in row) {
      return { column, value: row[column] };
    }
  }
  return { column: aliases[0], value: undefined };
}

function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  return typeof value === 'string' && MISSING_MARKERS.has(value.trim().toLowerCase());
}

function parseNumber(row: RawRow, aliases: readonly string[], rowNumber: number): number | null {
  const { column, value } = pick(row, aliases);
  if (isMissing(value)) return null;

  const num =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && DECIMAL_PATTERN.test(value.trim())
        ? Number(value.trim())
        : NaN;
  if (!Number.isFinite(num)) {
    throw new RowParseError(rowNumber, column, `expected a number, got "${String(value)}"`);
  }
  return num;
}

function parseClassification(row: RawRow, rowNumber: number): Classification | null {
  const { column, value } = pick(row, COLUMN_ALIASES.classification);
  if (isMissing(value)) return null;

  const classification = CLASSIFICATION_VALUES[String(value).trim().toLowerCase()];
  if (!classification) {
    logger.warn(`Row ${rowNumber}: unrecognised ${column} value "${String(value)}", treated as missing`);
    return null;
  }
  return classification;
}

function parseText(row: RawRow, aliases: readonly string[]): string | null {
  const { value } = pick(row, aliases);
  if (isMissing(value)) return null;
  return String(value).trim();
}

/**
 * Map raw rows to student records. Row numbers in errors are 1-based
 * over data rows, not counting a CSV header.
 * @throws RowParseError on a malformed numeric cell
 */
export function parseStudentRecords(rows: readonly RawRow[]): StudentRecord[] {
  return rows.map((row, index) => {
    const rowNumber = index + 1;

    const stayYears = parseNumber(row, COLUMN_ALIASES.stayYears, rowNumber);
    if (stayYears !== null && !Number.isInteger(stayYears)) {
      throw new RowParseError(rowNumber, pick(row, COLUMN_ALIASES.stayYears).column, `stay must be a whole number of years, got ${stayYears}`);
    }

    return {
      id: parseText(row, COLUMN_ALIASES.id) ?? `row-${rowNumber}`,
      classification: parseClassification(row, rowNumber),
      stayYears,
      depressionScore: parseNumber(row, COLUMN_ALIASES.depressionScore, rowNumber),
      connectednessScore: parseNumber(row, COLUMN_ALIASES.connectednessScore, rowNumber),
      acculturativeStressScore: parseNumber(row, COLUMN_ALIASES.acculturativeStressScore, rowNumber),
      academicLevel: parseText(row, COLUMN_ALIASES.academicLevel)
    };
  });
}

function parseRows(content: string, format: 'csv' | 'json'): unknown {
  if (format === 'csv') {
    return parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true
    });
  }
  return JSON.parse(content);
}

/**
 * Load student records from a .csv or .json file
 * @throws DataLoadError when the file is missing, unsupported or malformed
 */
export async function loadStudentRecords(filePath: string): Promise<StudentRecord[]> {
  const extension = extname(filePath).toLowerCase();
  if (extension !== '.csv' && extension !== '.json') {
    throw new DataLoadError(filePath, `unsupported file type "${extension || '(none)'}", expected .csv or .json`);
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DataLoadError(filePath, getErrorMessage(error));
  }

  let raw: unknown;
  try {
    raw = parseRows(content, extension === '.csv' ? 'csv' : 'json');
  } catch (error) {
    throw new DataLoadError(filePath, getErrorMessage(error));
  }

  const parsed = rowsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataLoadError(filePath, 'expected a list of records with named fields');
  }

  try {
    const records = parseStudentRecords(parsed.data);
    logger.debug(`Loaded ${records.length} record(s) from ${filePath}`);
    return records;
  } catch (error) {
    throw new DataLoadError(filePath, getErrorMessage(error));
  }
}
