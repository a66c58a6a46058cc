/**
 * @module @crew-control/metrics
 * Metrics model: task records, performance records, targets.
 */

export {
  createTaskRecord,
  clampScore,
  duration,
  deadlineMet,
  withinDeadline,
  deadlineBuffer,
  patchQuality,
  recentRecords,
} from './task-record.js';
export type { TaskRecordInput } from './task-record.js';

export { summarizeRecords, overallScore, mean } from './summary.js';
export type { RecordSummary } from './summary.js';

export {
  DEFAULT_IMPROVEMENT_THRESHOLDS,
  emptyPerformance,
  avgQuality,
  successRate,
  totalAttempts,
  needsImprovement,
  recordGrade,
  recordFailure,
} from './performance.js';

export {
  createPerformanceTargets,
  describeMetric,
  isTargetMet,
  observedValue,
  updateTargetValues,
} from './targets.js';
export type { ObservedValues } from './targets.js';
