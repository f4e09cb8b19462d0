// Main exports for the stayscope package

// Aggregation
export * from './aggregation/index.js';

// Data loading
export { loadStudentRecords, parseStudentRecords, COLUMN_ALIASES, RowParseError } from './data/loader.js';

// Utils
export { logger } from './utils/logger.js';
export { loadStayscopeConfig, DEFAULT_STAYSCOPE_CONFIG } from './utils/config.js';
export type { StayscopeConfig } from './utils/config.js';
export * from './utils/errors.js';
