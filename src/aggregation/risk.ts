/**
 * Cohort risk profiles over stay summaries
 */

import type { SummaryRow } from './types.js';

export type RiskProfile =
  | 'High Risk'
  | 'Elevated Depression'
  | 'Low Social Connection'
  | 'Standard';

export interface RiskThresholds {
  /** Mean PHQ-9 strictly above this is elevated */
  depressionAbove: number;
  /** Mean SCS strictly below this is low */
  connectednessBelow: number;
}

export const DEFAULT_RISK_THRESHOLDS: RiskThresholds = {
  depressionAbove: 7,
  connectednessBelow: 40
};

export type RiskProfiledRow = SummaryRow & { riskProfile: RiskProfile };

export function classifyRisk(
  row: Pick<SummaryRow, 'meanDepression' | 'meanConnectedness'>,
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS
): RiskProfile {
  // A null mean satisfies no threshold
  const elevatedDepression =
    row.meanDepression !== null && row.meanDepression > thresholds.depressionAbove;
  const lowConnection =
    row.meanConnectedness !== null && row.meanConnectedness < thresholds.connectednessBelow;

  if (elevatedDepression && lowConnection) return 'High Risk';
  if (elevatedDepression) return 'Elevated Depression';
  if (lowConnection) return 'Low Social Connection';
  return 'Standard';
}

export function withRiskProfiles(
  rows: readonly SummaryRow[],
  thresholds: RiskThresholds = DEFAULT_RISK_THRESHOLDS
): RiskProfiledRow[] {
  return rows.map(row => ({ ...row, riskProfile: classifyRisk(row, thresholds) }));
}
