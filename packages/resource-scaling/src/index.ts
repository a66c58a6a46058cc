/**
 * @module @crew-control/resource-scaling
 * Resource scaling evaluator.
 */

export {
  ZERO_PERFORMANCE,
  performanceOf,
  teamPerformance,
  efficiencyChange,
  efficiencyBand,
  monitorNewResource,
  resourceRecommendation,
} from './efficiency.js';
export type { TeamPerformance, EfficiencyBand, ResourceMonitorResult } from './efficiency.js';

export { applyResourceChange, latestRequest, buildMonitoringReport } from './apply.js';
export type { AppliedResourceChange } from './apply.js';
