/**
 * @module @crew-control/metrics/summary
 * Aggregate rates over a set of task records.
 */

import type { TaskExecutionRecord } from '@crew-control/contracts';
import { deadlineMet, duration } from './task-record.js';

export interface RecordSummary {
  count: number;
  successRate: number;
  avgQuality: number;
  avgDurationMs: number;
  deadlineMetRate: number;
  avgTaskSize: number;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Empty input: success and quality 0, deadline-met rate 1 (nothing to
 * violate), task size 1.
 */
export function summarizeRecords(records: readonly TaskExecutionRecord[]): RecordSummary {
  if (records.length === 0) {
    return {
      count: 0,
      successRate: 0,
      avgQuality: 0,
      avgDurationMs: 0,
      deadlineMetRate: 1.0,
      avgTaskSize: 1.0,
    };
  }

  const count = records.length;
  return {
    count,
    successRate: records.filter((r) => r.success).length / count,
    avgQuality: mean(records.map((r) => r.quality)),
    avgDurationMs: mean(records.map(duration)),
    deadlineMetRate: records.filter(deadlineMet).length / count,
    avgTaskSize: mean(records.map((r) => r.taskSize)),
  };
}

/** Weighted health score used by evaluation and snapshots. */
export function overallScore(summary: Pick<RecordSummary, 'successRate' | 'avgQuality' | 'deadlineMetRate'>): number {
  return 0.25 * summary.successRate + 0.35 * summary.avgQuality + 0.4 * summary.deadlineMetRate;
}
