/**
 * @module @crew-control/evaluation-engine
 * System evaluation engine.
 */

export {
  INSUFFICIENT_DATA_SUMMARY,
  evaluateTaskPerformance,
  observedValues,
} from './task-performance.js';
export type {
  TaskPerformanceMetrics,
  TaskPerformanceReport,
  TargetAchievement,
  TeamBreakdown,
} from './task-performance.js';

export { COMPARED_METRICS, complexityFactor, evaluateCodeImprovements } from './code-improvements.js';
export type { ChangeSummary, CodeImprovementReport, ComparedMetric, MetricChange } from './code-improvements.js';

export { evaluateResourceScaling } from './scaling.js';
export type { ResourceScalingReport, TeamScalingResult } from './scaling.js';

export { currentMetrics, findBaseline, takeSnapshot } from './snapshots.js';
export type { SnapshotMetrics } from './snapshots.js';

export {
  EvaluationEngine,
  FALLBACK_NARRATIVE,
  FALLBACK_RECOMMENDATION,
  formatReport,
} from './evaluation-engine.js';
export type { EvaluationEngineOptions, EvaluationReport } from './evaluation-engine.js';
