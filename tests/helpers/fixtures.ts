/**
 * Record builders shared by tests
 */

import type { StudentRecord } from '../../src/aggregation/types.js';

let nextId = 1;

export function student(overrides: Partial<StudentRecord> = {}): StudentRecord {
  return {
    id: `s${nextId++}`,
    classification: 'International',
    stayYears: 1,
    depressionScore: 5,
    connectednessScore: 40,
    acculturativeStressScore: 60,
    academicLevel: 'Under',
    ...overrides
  };
}

/**
 * Three international first-year students and two domestic ones
 */
export function firstYearCohort(): StudentRecord[] {
  return [
    student({ id: 'i1', depressionScore: 5, connectednessScore: 40, acculturativeStressScore: 60 }),
    student({ id: 'i2', depressionScore: 6, connectednessScore: 42, acculturativeStressScore: 62 }),
    student({ id: 'i3', depressionScore: 7, connectednessScore: 44, acculturativeStressScore: 64 }),
    student({ id: 'd1', classification: 'Domestic', depressionScore: 20, connectednessScore: 70, acculturativeStressScore: 100 }),
    student({ id: 'd2', classification: 'Domestic', depressionScore: 22, connectednessScore: 72, acculturativeStressScore: 110 })
  ];
}
