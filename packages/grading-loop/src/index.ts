/**
 * @module @crew-control/grading-loop
 * Grading & feedback loop.
 */

export { GradingLoop } from './grading-loop.js';
export type { GradingLoopOptions, GradeOutcome } from './grading-loop.js';
export { EscalationPolicy } from './escalation.js';
export type { EscalationDecision, EscalationReason } from './escalation.js';
