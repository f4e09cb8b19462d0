/**
 * CLI Summary Command Integration Test
 *
 * Runs 'stayscope summary' against the survey fixture and checks
 * both the JSON and the table output.
 */

import { describe, it, expect } from 'vitest';
import { createSummaryCommand } from '../../../src/cli/commands/summary.js';
import { runCommand, SURVEY_FIXTURE } from '../../helpers/cli.js';

describe('Summary Command', () => {
  it('should summarise international students by stay as JSON', async () => {
    const result = await runCommand(createSummaryCommand(), [SURVEY_FIXTURE, '--json']);

    expect(result.exitCode).toBe(0);
    expect(JSON.parse(result.stdout)).toEqual({
      rows: [
        { stayYears: 3, count: 2, meanDepression: 30, meanConnectedness: 45, meanAcculturativeStress: 70 },
        { stayYears: 2, count: 2, meanDepression: 9, meanConnectedness: 32.5, meanAcculturativeStress: 85 },
        { stayYears: 1, count: 3, meanDepression: 6, meanConnectedness: 42, meanAcculturativeStress: 62 }
      ],
      diagnostics: {
        inputCount: 10,
        filteredCount: 8,
        excludedNullKey: 1,
        groupCount: 3,
        truncatedGroups: 0
      }
    });
  });

  it('should add risk profiles per stay', async () => {
    const result = await runCommand(createSummaryCommand(), [SURVEY_FIXTURE, '--risk', '--json']);

    const { rows } = JSON.parse(result.stdout);
    expect(rows.map((row: { riskProfile: string }) => row.riskProfile)).toEqual([
      'Elevated Depression',
      'High Risk',
      'Standard'
    ]);
  });

  it('should add depression spread with --stats', async () => {
    const result = await runCommand(createSummaryCommand(), [SURVEY_FIXTURE, '--stats', '--json']);

    const { rows } = JSON.parse(result.stdout);
    expect(rows[0]).toMatchObject({ stayYears: 3, stddevDepression: null, minDepression: 30, maxDepression: 30 });
    expect(rows[1]).toMatchObject({ stayYears: 2, stddevDepression: 1.41, minDepression: 8, maxDepression: 10 });
    expect(rows[2]).toMatchObject({ stayYears: 1, stddevDepression: 1, minDepression: 5, maxDepression: 7 });
  });

  it('should group by classification across all students', async () => {
    const result = await runCommand(createSummaryCommand(), [
      SURVEY_FIXTURE,
      '--filter',
      'all',
      '--group-by',
      'classification',
      '--sort',
      'count',
      '--json'
    ]);

    const { rows } = JSON.parse(result.stdout);
    expect(rows.map((row: { classification: string; count: number }) => [row.classification, row.count])).toEqual([
      ['International', 8],
      ['Domestic', 2]
    ]);
  });

  it('should compare classifications with stays longest first within each', async () => {
    const result = await runCommand(createSummaryCommand(), [
      SURVEY_FIXTURE,
      '--filter',
      'all',
      '--group-by',
      'classification,stayYears',
      '--sort',
      'classification:asc,stayYears:desc',
      '--json'
    ]);

    expect(result.exitCode).toBe(0);
    const { rows } = JSON.parse(result.stdout);
    expect(rows.map((row: { classification: string; stayYears: number }) => [row.classification, row.stayYears])).toEqual([
      ['Domestic', 2],
      ['Domestic', 1],
      ['International', 3],
      ['International', 2],
      ['International', 1]
    ]);
  });

  it('should fail on a malformed sort direction', async () => {
    const result = await runCommand(createSummaryCommand(), [SURVEY_FIXTURE, '--sort', 'stayYears:up']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe('✗ Failed to build summary:\nInvalid order "up". Expected asc or desc');
  });

  it('should honour limit and order', async () => {
    const result = await runCommand(createSummaryCommand(), [
      SURVEY_FIXTURE,
      '--limit',
      '2',
      '--order',
      'asc',
      '--json'
    ]);

    const { rows, diagnostics } = JSON.parse(result.stdout);
    expect(rows.map((row: { stayYears: number }) => row.stayYears)).toEqual([1, 2]);
    expect(diagnostics.truncatedGroups).toBe(1);
  });

  it('should print a table with diagnostics', async () => {
    const result = await runCommand(createSummaryCommand(), [SURVEY_FIXTURE]);

    const lines = result.stdout.split('\n');
    expect(lines).toContain(
      'stayYears  count  meanDepression  meanConnectedness  meanAcculturativeStress'
    );
    expect(lines).toContain('8 of 10 record(s) matched the filter');
    expect(lines).toContain('1 record(s) excluded for a missing stayYears');
  });

  it('should fail on an unknown filter', async () => {
    const result = await runCommand(createSummaryCommand(), [SURVEY_FIXTURE, '--filter', 'exchange']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toBe(
      '✗ Failed to build summary:\nInvalid filter "exchange". Expected International, Domestic or all'
    );
  });

  it('should refuse risk profiles for other groupings', async () => {
    const result = await runCommand(createSummaryCommand(), [
      SURVEY_FIXTURE,
      '--group-by',
      'academicLevel',
      '--risk'
    ]);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('--risk is only available when grouping by stayYears');
  });

  it('should fail on a missing file', async () => {
    const result = await runCommand(createSummaryCommand(), ['does-not-exist.csv']);

    expect(result.exitCode).toBe(1);
    expect(result.stderr).toContain('Failed to load does-not-exist.csv');
  });
});
