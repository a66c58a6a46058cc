/**
 * @module @crew-control/workload-manager
 * Workload & deadline manager.
 */

export { WorkloadManager, RESOURCE_WINDOW } from './workload-manager.js';
export type { WorkloadManagerOptions, WorkloadThresholds, WorkloadChange } from './workload-manager.js';
