/**
 * Stayscope configuration utilities
 * Handles loading and merging report defaults from multiple sources
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CLASSIFICATIONS, type Classification, type SortDirection } from '../aggregation/types.js';
import { DEFAULT_STAY_LIMIT, MAX_DECIMAL_PLACES } from '../aggregation/config.js';
import { ValidationError } from './errors.js';
import { logger } from './logger.js';
import { getStayscopePath } from './stayscope-home.js';

export interface StayscopeConfig {
  /** null reports every classification */
  filterClassification: Classification | null;
  limit: number;
  sortDirection: SortDirection;
  decimalPlaces: number;
}

export const DEFAULT_STAYSCOPE_CONFIG: StayscopeConfig = {
  filterClassification: 'International',
  limit: DEFAULT_STAY_LIMIT,
  sortDirection: 'desc',
  decimalPlaces: 2
};

const filterSchema = z
  .union([z.enum(CLASSIFICATIONS), z.literal('all'), z.null()])
  .transform(value => (value === 'all' ? null : value));

const limitSchema = z.number().int().positive();

const decimalPlacesSchema = z.number().int().min(0).max(MAX_DECIMAL_PLACES);

const fileConfigSchema = z
  .object({
    filterClassification: filterSchema,
    limit: limitSchema,
    sortDirection: z.enum(['asc', 'desc']),
    decimalPlaces: decimalPlacesSchema
  })
  .partial();

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse a classification filter as typed on the command line or in env
 * @returns the filter, or undefined when the value is not recognised
 */
export function parseFilterValue(value: string): Classification | null | undefined {
  const lower = value.trim().toLowerCase();
  const parsed = filterSchema.safeParse(CLASSIFICATIONS.find(c => c.toLowerCase() === lower) ?? lower);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Resolve a --filter option against the configured default
 * @throws ValidationError when the option is not recognised
 */
export function resolveFilterOption(
  option: string | undefined,
  fallback: Classification | null
): Classification | null {
  if (option === undefined) {
    return fallback;
  }

  const filter = parseFilterValue(option);
  if (filter === undefined) {
    throw new ValidationError(`Invalid filter "${option}". Expected International, Domestic or all`);
  }
  return filter;
}

/**
 * Read an integer env variable against the same schema as the config file
 */
function parseIntegerEnv(name: string, schema: z.ZodType<number>, expected: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined) return undefined;

  const trimmed = raw.trim();
  if (INTEGER_PATTERN.test(trimmed)) {
    const parsed = schema.safeParse(Number(trimmed));
    if (parsed.success) {
      return parsed.data;
    }
  }

  logger.warn(`Ignoring ${name}="${raw}": expected ${expected}`);
  return undefined;
}

function readConfigFile(): Partial<StayscopeConfig> {
  const configPath = getStayscopePath('config.json');

  let content: string;
  try {
    content = readFileSync(configPath, 'utf-8');
  } catch {
    // No config file, continue with defaults
    return {};
  }

  try {
    const parsed = fileConfigSchema.safeParse(JSON.parse(content));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn(`Ignoring invalid config file ${configPath}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  } catch {
    logger.warn(`Ignoring unparsable config file ${configPath}`);
  }
  return {};
}

/**
 * Load stayscope configuration with environment variable overrides
 * Priority: Environment variables > baseConfig > config file > Defaults
 */
export function loadStayscopeConfig(baseConfig?: Partial<StayscopeConfig>): StayscopeConfig {
  const config: StayscopeConfig = {
    ...DEFAULT_STAYSCOPE_CONFIG,
    ...readConfigFile()
  };

  if (baseConfig) {
    Object.assign(config, baseConfig);
  }

  if (process.env.STAYSCOPE_FILTER !== undefined) {
    const filter = parseFilterValue(process.env.STAYSCOPE_FILTER);
    if (filter === undefined) {
      logger.warn(`Ignoring STAYSCOPE_FILTER="${process.env.STAYSCOPE_FILTER}": expected International, Domestic or all`);
    } else {
      config.filterClassification = filter;
    }
  }

  const limit = parseIntegerEnv('STAYSCOPE_LIMIT', limitSchema, 'an integer >= 1');
  if (limit !== undefined) {
    config.limit = limit;
  }

  const decimalPlaces = parseIntegerEnv(
    'STAYSCOPE_DECIMALS',
    decimalPlacesSchema,
    `an integer from 0 to ${MAX_DECIMAL_PLACES}`
  );
  if (decimalPlaces !== undefined) {
    config.decimalPlaces = decimalPlaces;
  }

  return config;
}
