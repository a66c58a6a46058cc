/**
 * @module @crew-control/resource-scaling/apply
 * The only code path that writes a team's agent count.
 */

import {
  withTeam,
  type ResourceChange,
  type ResourceChangeRequest,
  type RunState,
} from '@crew-control/contracts';
import { monitorNewResource, resourceRecommendation } from './efficiency.js';

export interface AppliedResourceChange {
  state: RunState;
  change: ResourceChange;
}

/**
 * Apply a request: clamp into the team's bounds, consume the request from
 * the outstanding list and append to the change history.
 */
export function applyResourceChange(
  state: RunState,
  request: ResourceChangeRequest,
  appliedAt: number
): AppliedResourceChange {
  const config = state.resources[request.team];
  const newAgents = Math.min(config.maxAgents, Math.max(config.minAgents, request.recommendedAgents));

  const change: ResourceChange = {
    team: request.team,
    previousAgents: config.currentAgents,
    newAgents,
    reason: request.reason,
    appliedAt,
  };

  return {
    change,
    state: {
      ...state,
      resources: withTeam(state.resources, request.team, { ...config, currentAgents: newAgents }),
      resourceRequests: state.resourceRequests.filter((r) => r !== request),
      resourceChanges: [...state.resourceChanges, change],
    },
  };
}

/**
 * Most recent outstanding request, if any.
 */
export function latestRequest(state: RunState): ResourceChangeRequest | undefined {
  return state.resourceRequests[state.resourceRequests.length - 1];
}

function formatDateTime(timestamp: number): string {
  const date = new Date(timestamp);
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Markdown report on how an applied change is doing.
 */
export function buildMonitoringReport(state: RunState, change: ResourceChange): string {
  const result = monitorNewResource(state, change.team, change.previousAgents, change.newAgents);

  return [
    '## Resource Change Monitoring Report',
    '',
    `Team: ${change.team}`,
    `Previous agent count: ${change.previousAgents}`,
    `New agent count: ${change.newAgents}`,
    `Change timestamp: ${formatDateTime(change.appliedAt)}`,
    '',
    '### Performance Analysis',
    '',
    `Efficiency change: ${(result.efficiencyChange * 100).toFixed(1)}%`,
    `Status: ${result.success ? '✅ Success' : '❌ Suboptimal'}`,
    '',
    '### Comments',
    '',
    result.narrative,
    '',
    '### Recommendation',
    '',
    resourceRecommendation(result.efficiencyChange),
  ].join('\n');
}
