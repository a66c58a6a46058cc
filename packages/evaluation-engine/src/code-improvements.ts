/**
 * @module @crew-control/evaluation-engine/code-improvements
 * Impact of applied code changes against a baseline snapshot.
 */

import type { RunState } from '@crew-control/contracts';
import { currentMetrics, findBaseline, type SnapshotMetrics } from './snapshots.js';

export const COMPARED_METRICS = ['overallScore', 'successRate', 'avgQuality', 'deadlineMetRate'] as const;

export type ComparedMetric = (typeof COMPARED_METRICS)[number];

export interface MetricChange {
  baseline: number;
  current: number;
  absoluteChange: number;
  /** Relative to the baseline; the current value itself when the baseline is 0. */
  relativeChange: number;
}

export interface ChangeSummary {
  changeId: string;
  timestamp: number;
  issuesFixed: readonly string[];
}

export type CodeImprovementReport =
  | {
      status: 'no_changes';
      timestamp: number;
      improvementImpact: 0;
      summary: string;
    }
  | {
      status: 'no_baseline';
      timestamp: number;
      fixesImplemented: number;
      improvementImpact: 0;
      current: SnapshotMetrics;
      summary: string;
    }
  | {
      status: 'evaluated';
      timestamp: number;
      baselineId: string;
      fixesImplemented: number;
      improvements: Record<ComparedMetric, MetricChange>;
      /** ≥ 1; current / baseline task size when tasks got larger. */
      complexityFactor: number;
      overallImprovement: number;
      changes: ChangeSummary[];
      current: SnapshotMetrics;
      baseline: SnapshotMetrics;
      summary: string;
    };

function compare(baseline: number, current: number): MetricChange {
  return {
    baseline,
    current,
    absoluteChange: current - baseline,
    relativeChange: baseline > 0 ? (current - baseline) / baseline : current,
  };
}

export function complexityFactor(baselineSize: number, currentSize: number): number {
  return baselineSize > 0 && currentSize > baselineSize ? currentSize / baselineSize : 1.0;
}

export function evaluateCodeImprovements(
  state: RunState,
  baselineId?: string,
  timestamp: number = Date.now()
): CodeImprovementReport {
  if (state.codeChanges.length === 0) {
    return {
      status: 'no_changes',
      timestamp,
      improvementImpact: 0,
      summary: 'No code improvements have been implemented.',
    };
  }

  const current = currentMetrics(state);
  const baseline = findBaseline(state, baselineId);
  if (!baseline) {
    return {
      status: 'no_baseline',
      timestamp,
      fixesImplemented: state.fixesImplemented.length,
      improvementImpact: 0,
      current,
      summary: 'No baseline metrics available for comparison.',
    };
  }

  const improvements = {
    overallScore: compare(baseline.overallScore, current.overallScore),
    successRate: compare(baseline.successRate, current.successRate),
    avgQuality: compare(baseline.avgQuality, current.avgQuality),
    deadlineMetRate: compare(baseline.deadlineMetRate, current.deadlineMetRate),
  } satisfies Record<ComparedMetric, MetricChange>;

  const factor = complexityFactor(baseline.avgTaskSize, current.avgTaskSize);
  const overallImprovement = improvements.overallScore.relativeChange * factor;

  const changes = [...state.codeChanges]
    .filter((change) => change.issuesFixed.length > 0)
    .sort((a, b) => a.timestamp - b.timestamp)
    .map((change) => ({ changeId: change.changeId, timestamp: change.timestamp, issuesFixed: change.issuesFixed }));

  const { snapshotId, timestamp: _taken, ...baselineMetrics } = baseline;

  return {
    status: 'evaluated',
    timestamp,
    baselineId: snapshotId,
    fixesImplemented: state.fixesImplemented.length,
    improvements,
    complexityFactor: factor,
    overallImprovement,
    changes,
    current,
    baseline: baselineMetrics,
    summary: `Code improvements resulted in ${(overallImprovement * 100).toFixed(1)}% performance gain.`,
  };
}
