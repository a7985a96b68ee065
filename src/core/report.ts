/**
 * Scenario report builders.
 */

import type { ScenarioOutcome, ScenarioPhase, ScenarioReport } from '@shared/types';

export interface ReportDetails {
  baselineNodes?: string[];
  remainingNodes?: string[];
  removedNode?: string;
}

export function buildReport(
  outcome: ScenarioOutcome,
  phase: ScenarioPhase,
  message: string,
  startedAt: number,
  details: ReportDetails = {}
): ScenarioReport {
  return {
    outcome,
    phase,
    message,
    baselineNodes: details.baselineNodes ?? [],
    remainingNodes: details.remainingNodes ?? [],
    removedNode: details.removedNode,
    durationMs: Date.now() - startedAt,
  };
}
