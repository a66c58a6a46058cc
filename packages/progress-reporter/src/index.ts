/**
 * @module @crew-control/progress-reporter
 * UX-only progress feedback for control runs.
 *
 * Events are invisible to the control logic. The CLI logs them; any other
 * surface can subscribe through the callback.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@crew-control/progress-reporter';
 *
 * const reporter = new ProgressReporter(logger, (event) => {
 *   socket.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  CycleStartedEvent,
  TeamEvent,
  TeamGradedEvent,
  EscalatedEvent,
  ResourcesScaledEvent,
  RunCompletedEvent,
} from './types.js';
