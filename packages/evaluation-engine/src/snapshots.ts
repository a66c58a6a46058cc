/**
 * @module @crew-control/evaluation-engine/snapshots
 * Baseline snapshots of aggregate metrics, kept in the run state.
 */

import { randomUUID } from 'node:crypto';
import type { EvaluationSnapshot, RunState } from '@crew-control/contracts';
import { overallScore, summarizeRecords } from '@crew-control/metrics';

export type SnapshotMetrics = Omit<EvaluationSnapshot, 'snapshotId' | 'timestamp'>;

export function currentMetrics(state: RunState): SnapshotMetrics {
  const summary = summarizeRecords(state.records);
  return {
    overallScore: overallScore(summary),
    successRate: summary.successRate,
    avgQuality: summary.avgQuality,
    deadlineMetRate: summary.deadlineMetRate,
    avgTaskSize: summary.avgTaskSize,
  };
}

/**
 * Record the current aggregate as a snapshot. Returns the new state and the
 * snapshot so callers can reference its id as a baseline.
 */
export function takeSnapshot(
  state: RunState,
  timestamp: number = Date.now(),
  snapshotId: string = randomUUID()
): { state: RunState; snapshot: EvaluationSnapshot } {
  const snapshot: EvaluationSnapshot = { snapshotId, timestamp, ...currentMetrics(state) };
  return {
    state: { ...state, evaluationSnapshots: [...state.evaluationSnapshots, snapshot] },
    snapshot,
  };
}

/**
 * Snapshot by id, or the earliest one when no id is given or the id is unknown.
 */
export function findBaseline(state: RunState, snapshotId?: string): EvaluationSnapshot | undefined {
  if (snapshotId !== undefined) {
    const match = state.evaluationSnapshots.find((s) => s.snapshotId === snapshotId);
    if (match) {
      return match;
    }
  }
  let earliest: EvaluationSnapshot | undefined;
  for (const snapshot of state.evaluationSnapshots) {
    if (!earliest || snapshot.timestamp < earliest.timestamp) {
      earliest = snapshot;
    }
  }
  return earliest;
}
