/**
 * @module @crew-control/metrics/targets
 * Performance targets and their update from observed values.
 */

import type { PerformanceTarget } from '@crew-control/contracts';
import type { RecordSummary } from './summary.js';

const TARGET_DESCRIPTIONS: Readonly<Record<string, string>> = {
  avg_response_time: 'Average time to complete a task (seconds)',
  success_rate: 'Percentage of tasks completed successfully',
  response_quality: 'Average quality score of responses',
  task_completion_rate: 'Percentage of tasks completed fully',
};

export function describeMetric(metric: string): string {
  return TARGET_DESCRIPTIONS[metric] ?? `Performance metric: ${metric}`;
}

export function createPerformanceTargets(
  targets: Readonly<Record<string, number>>
): Record<string, PerformanceTarget> {
  const result: Record<string, PerformanceTarget> = {};
  for (const [metric, target] of Object.entries(targets)) {
    result[metric] = { metric, target, current: 0, description: describeMetric(metric) };
  }
  return result;
}

/**
 * `current ≥ target`. Note this reads "higher is better" for every metric,
 * including response time.
 */
export function isTargetMet(target: PerformanceTarget): boolean {
  return target.current >= target.target;
}

export interface ObservedValues extends RecordSummary {
  /** Completed tasks / generated tasks; absent when nothing was generated. */
  taskCompletionRate?: number;
}

/**
 * Observed value for a named metric, or undefined when it has no mapping.
 */
export function observedValue(metric: string, observed: ObservedValues): number | undefined {
  switch (metric) {
    case 'success_rate':
      return observed.successRate;
    case 'response_quality':
    case 'avg_quality':
      return observed.avgQuality;
    case 'avg_response_time':
    case 'avg_duration':
      return observed.avgDurationMs / 1000;
    case 'deadline_met_rate':
      return observed.deadlineMetRate;
    case 'task_completion_rate':
      return observed.taskCompletionRate;
    default:
      return undefined;
  }
}

export function updateTargetValues(
  targets: Readonly<Record<string, PerformanceTarget>>,
  observed: ObservedValues
): Record<string, PerformanceTarget> {
  const result: Record<string, PerformanceTarget> = {};
  for (const [metric, target] of Object.entries(targets)) {
    const value = observedValue(metric, observed);
    result[metric] = value === undefined ? target : { ...target, current: value };
  }
  return result;
}
