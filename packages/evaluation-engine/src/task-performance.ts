/**
 * @module @crew-control/evaluation-engine/task-performance
 * Aggregate task performance over the whole run.
 */

import { TEAM_NAMES, type RunState, type TeamName } from '@crew-control/contracts';
import { observedValue, overallScore, summarizeRecords, type ObservedValues } from '@crew-control/metrics';

export const INSUFFICIENT_DATA_SUMMARY = 'Insufficient data to evaluate task performance.';

export interface TaskPerformanceMetrics {
  totalTasks: number;
  successRate: number;
  avgQuality: number;
  deadlineMetRate: number;
  avgTaskSize: number;
  avgDurationMs: number;
  overallScore: number;
}

export interface TeamBreakdown {
  taskCount: number;
  successRate: number;
  avgQuality: number;
  deadlineMetRate: number;
}

export interface TargetAchievement {
  target: number;
  current: number;
  achieved: boolean;
  /** How far below target; 0 once achieved. */
  gap: number;
}

export type TaskPerformanceReport =
  | {
      status: 'insufficient_data';
      timestamp: number;
      summary: string;
    }
  | {
      status: 'evaluated';
      timestamp: number;
      metrics: TaskPerformanceMetrics;
      teams: Partial<Record<TeamName, TeamBreakdown>>;
      targets: Record<string, TargetAchievement>;
      summary: string;
    };

/**
 * Observed values for target comparison, including the task completion rate
 * once at least one task has been generated.
 */
export function observedValues(state: RunState): ObservedValues {
  const summary = summarizeRecords(state.records);
  if (state.generatedTaskCount === 0) {
    return summary;
  }
  return { ...summary, taskCompletionRate: state.completedTasks.length / state.generatedTaskCount };
}

export function evaluateTaskPerformance(state: RunState, timestamp: number = Date.now()): TaskPerformanceReport {
  if (state.records.length === 0) {
    return { status: 'insufficient_data', timestamp, summary: INSUFFICIENT_DATA_SUMMARY };
  }

  const observed = observedValues(state);
  const score = overallScore(observed);

  const teams: Partial<Record<TeamName, TeamBreakdown>> = {};
  for (const team of TEAM_NAMES) {
    const records = state.records.filter((r) => r.team === team);
    if (records.length === 0) {
      continue;
    }
    const summary = summarizeRecords(records);
    teams[team] = {
      taskCount: summary.count,
      successRate: summary.successRate,
      avgQuality: summary.avgQuality,
      deadlineMetRate: summary.deadlineMetRate,
    };
  }

  const targets: Record<string, TargetAchievement> = {};
  for (const [metric, target] of Object.entries(state.performanceTargets)) {
    const current = observedValue(metric, observed) ?? 0;
    targets[metric] = {
      target: target.target,
      current,
      achieved: current >= target.target,
      gap: current < target.target ? target.target - current : 0,
    };
  }

  return {
    status: 'evaluated',
    timestamp,
    metrics: {
      totalTasks: observed.count,
      successRate: observed.successRate,
      avgQuality: observed.avgQuality,
      deadlineMetRate: observed.deadlineMetRate,
      avgTaskSize: observed.avgTaskSize,
      avgDurationMs: observed.avgDurationMs,
      overallScore: score,
    },
    teams,
    targets,
    summary: `Overall system performance score: ${score.toFixed(2)}/1.0`,
  };
}
