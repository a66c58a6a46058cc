/**
 * @module @crew-control/evaluation-engine/scaling
 * Effectiveness of applied resource changes.
 */

import { TEAM_NAMES, type ResourceChange, type RunState, type TeamName } from '@crew-control/contracts';
import { efficiencyChange, performanceOf, type TeamPerformance } from '@crew-control/resource-scaling';

export interface TeamScalingResult {
  oldAgents: number;
  newAgents: number;
  resourceIncrease: number;
  before: TeamPerformance;
  after: TeamPerformance;
  efficiencyChange: number;
}

export type ResourceScalingReport =
  | {
      status: 'no_scaling';
      timestamp: number;
      scalingEffectiveness: 0;
      summary: string;
    }
  | {
      status: 'evaluated';
      timestamp: number;
      teams: Partial<Record<TeamName, TeamScalingResult>>;
      /** Mean efficiency change over teams with records on both sides. */
      overallEffectiveness: number;
      summary: string;
    };

function latestChange(changes: readonly ResourceChange[], team: TeamName): ResourceChange | undefined {
  let latest: ResourceChange | undefined;
  for (const change of changes) {
    if (change.team === team && (!latest || change.appliedAt >= latest.appliedAt)) {
      latest = change;
    }
  }
  return latest;
}

/**
 * For each team with an applied change, compare records started before the
 * latest change with those started at or after it. Teams missing records on
 * either side are left out.
 */
export function evaluateResourceScaling(state: RunState, timestamp: number = Date.now()): ResourceScalingReport {
  if (state.resourceChanges.length === 0) {
    return {
      status: 'no_scaling',
      timestamp,
      scalingEffectiveness: 0,
      summary: 'No resource scaling has been performed.',
    };
  }

  const teams: Partial<Record<TeamName, TeamScalingResult>> = {};
  const changes: number[] = [];

  for (const team of TEAM_NAMES) {
    const change = latestChange(state.resourceChanges, team);
    if (!change) {
      continue;
    }
    const records = state.records.filter((r) => r.team === team);
    const before = records.filter((r) => r.startedAt < change.appliedAt);
    const after = records.filter((r) => r.startedAt >= change.appliedAt);
    if (before.length === 0 || after.length === 0) {
      continue;
    }

    const beforePerf = performanceOf(before);
    const afterPerf = performanceOf(after);
    const efficiency = efficiencyChange(beforePerf, afterPerf, change.previousAgents, change.newAgents);
    teams[team] = {
      oldAgents: change.previousAgents,
      newAgents: change.newAgents,
      resourceIncrease: change.previousAgents > 0 ? change.newAgents / change.previousAgents : 1,
      before: beforePerf,
      after: afterPerf,
      efficiencyChange: efficiency,
    };
    changes.push(efficiency);
  }

  const overallEffectiveness = changes.length > 0 ? changes.reduce((sum, c) => sum + c, 0) / changes.length : 0;

  return {
    status: 'evaluated',
    timestamp,
    teams,
    overallEffectiveness,
    summary: `Resource scaling effectiveness: ${(overallEffectiveness * 100).toFixed(1)}%`,
  };
}
