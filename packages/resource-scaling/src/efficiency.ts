/**
 * @module @crew-control/resource-scaling/efficiency
 * Did adding agents pay for itself?
 */

import type { RunState, TaskExecutionRecord, TeamName } from '@crew-control/contracts';
import { deadlineMet, duration, mean } from '@crew-control/metrics';

export interface TeamPerformance {
  avgQuality: number;
  successRate: number;
  avgDurationMs: number;
  deadlineMetRate: number;
}

export const ZERO_PERFORMANCE: TeamPerformance = {
  avgQuality: 0,
  successRate: 0,
  avgDurationMs: 0,
  deadlineMetRate: 0,
};

/**
 * Performance over an arbitrary record set; all zeros when empty.
 */
export function performanceOf(records: readonly TaskExecutionRecord[]): TeamPerformance {
  if (records.length === 0) {
    return { ...ZERO_PERFORMANCE };
  }
  return {
    avgQuality: mean(records.map((r) => r.quality)),
    successRate: records.filter((r) => r.success).length / records.length,
    avgDurationMs: mean(records.map(duration)),
    deadlineMetRate: records.filter(deadlineMet).length / records.length,
  };
}

/**
 * Performance of `team` over records made while it held exactly `agentCount` agents.
 */
export function teamPerformance(state: RunState, team: TeamName, agentCount: number): TeamPerformance {
  return performanceOf(state.records.filter((r) => r.team === team && r.agentCount === agentCount));
}

function ratio(after: number, before: number): number {
  return before > 0 ? after / before : 1.0;
}

/**
 * `performanceChange / resourceRatio − 1`. Positive means the gain outpaced
 * the added capacity. Zero when either agent count is zero.
 */
export function efficiencyChange(
  before: TeamPerformance,
  after: TeamPerformance,
  oldAgents: number,
  newAgents: number
): number {
  if (oldAgents === 0 || newAgents === 0) {
    return 0;
  }

  const resourceRatio = newAgents / oldAgents;
  const qualityRatio = ratio(after.avgQuality, before.avgQuality);
  const successRatio = ratio(after.successRate, before.successRate);
  // lower duration is better
  const speedRatio = after.avgDurationMs > 0 ? before.avgDurationMs / after.avgDurationMs : 1.0;
  const deadlineRatio = ratio(after.deadlineMetRate, before.deadlineMetRate);

  const performanceChange = 0.3 * qualityRatio + 0.2 * successRatio + 0.3 * speedRatio + 0.2 * deadlineRatio;
  return performanceChange / resourceRatio - 1.0;
}

export type EfficiencyBand = 'highly_successful' | 'modestly_successful' | 'neutral' | 'inefficient';

export function efficiencyBand(change: number): EfficiencyBand {
  if (change > 0.2) {
    return 'highly_successful';
  }
  if (change > 0) {
    return 'modestly_successful';
  }
  if (change > -0.1) {
    return 'neutral';
  }
  return 'inefficient';
}

export interface ResourceMonitorResult {
  success: boolean;
  narrative: string;
  efficiencyChange: number;
  band: EfficiencyBand;
}

function percent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

/**
 * Compare the team at `oldAgents` and `newAgents` and describe the outcome.
 */
export function monitorNewResource(
  state: RunState,
  team: TeamName,
  oldAgents: number,
  newAgents: number
): ResourceMonitorResult {
  const before = teamPerformance(state, team, oldAgents);
  const after = teamPerformance(state, team, newAgents);
  const change = efficiencyChange(before, after, oldAgents, newAgents);
  const band = efficiencyBand(change);

  let narrative: string;
  switch (band) {
    case 'highly_successful':
      narrative =
        `Resource scaling for ${team} team was highly successful. ` +
        `Efficiency improved by ${percent(change)}.`;
      break;
    case 'modestly_successful':
      narrative =
        `Resource scaling for ${team} team was modestly successful. ` +
        `Efficiency improved by ${percent(change)}.`;
      break;
    case 'neutral':
      narrative =
        `Resource scaling for ${team} team had neutral impact. ` +
        `Efficiency changed by ${percent(change)}.`;
      break;
    case 'inefficient':
      narrative =
        `Resource scaling for ${team} team was inefficient. ` +
        `Efficiency decreased by ${percent(Math.abs(change))}. ` +
        'Consider optimizing or reverting the resource allocation.';
      break;
  }

  return { success: change > 0, narrative, efficiencyChange: change, band };
}

export function resourceRecommendation(change: number): string {
  if (change > 0.1) {
    return 'Keep the new resource allocation.';
  }
  if (change > -0.1) {
    return 'Continue monitoring the resource allocation.';
  }
  return 'Consider reverting to the previous resource allocation.';
}
