/**
 * @module @crew-control/metrics/performance
 * Per-team performance record and the needs-improvement predicate.
 */

import type { AgentPerformanceRecord, ImprovementThresholds, TeamName } from '@crew-control/contracts';
import { mean } from './summary.js';

export const DEFAULT_IMPROVEMENT_THRESHOLDS: ImprovementThresholds = {
  maxErrors: 3,
  minQualitySamples: 3,
  minAvgQuality: 0.5,
  minAttemptsForSuccessRate: 5,
  minSuccessRate: 0.7,
};

export function emptyPerformance(team: TeamName): AgentPerformanceRecord {
  return { team, qualityScores: [], successCount: 0, errorCount: 0, totalTimeMs: 0 };
}

export function avgQuality(perf: AgentPerformanceRecord): number {
  return mean(perf.qualityScores);
}

/** 1.0 with no data. */
export function successRate(perf: AgentPerformanceRecord): number {
  const total = perf.successCount + perf.errorCount;
  return total === 0 ? 1.0 : perf.successCount / total;
}

export function totalAttempts(perf: AgentPerformanceRecord): number {
  return perf.successCount + perf.errorCount;
}

/**
 * Errors past the limit, a low average over enough scores, or a low success
 * rate over enough attempts.
 */
export function needsImprovement(
  perf: AgentPerformanceRecord,
  thresholds: ImprovementThresholds = DEFAULT_IMPROVEMENT_THRESHOLDS
): boolean {
  if (perf.errorCount >= thresholds.maxErrors) {
    return true;
  }
  if (perf.qualityScores.length >= thresholds.minQualitySamples && avgQuality(perf) < thresholds.minAvgQuality) {
    return true;
  }
  return totalAttempts(perf) >= thresholds.minAttemptsForSuccessRate && successRate(perf) < thresholds.minSuccessRate;
}

/**
 * Record a graded output. Producing gradable output counts as a success.
 */
export function recordGrade(perf: AgentPerformanceRecord, score: number, durationMs = 0): AgentPerformanceRecord {
  return {
    ...perf,
    qualityScores: [...perf.qualityScores, score],
    successCount: perf.successCount + 1,
    totalTimeMs: perf.totalTimeMs + Math.max(0, durationMs),
  };
}

/** Record a run that produced no gradable output. */
export function recordFailure(perf: AgentPerformanceRecord, durationMs = 0): AgentPerformanceRecord {
  return {
    ...perf,
    errorCount: perf.errorCount + 1,
    totalTimeMs: perf.totalTimeMs + Math.max(0, durationMs),
  };
}
