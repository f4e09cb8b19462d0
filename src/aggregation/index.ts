/**
 * Student Wellbeing Aggregation - Public API
 */

export * from './types.js';
export * from './config.js';
export * from './aggregator.js';
export * from './quality.js';
export * from './risk.js';
export * from './core/aggregation-utils.js';
export * from './core/rounding.js';
