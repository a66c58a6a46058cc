/**
 * @module @crew-control/oracle
 * Oracle adapters.
 *
 * - **Heuristic**: offline, deterministic, free
 * - **LLM**: model-backed, structured replies validated with zod
 * - **Hybrid**: heuristic when confident, model otherwise
 *
 * @example
 * ```typescript
 * import { HybridOracle } from '@crew-control/oracle';
 *
 * const oracle = new HybridOracle(llm, logger);
 * const grade = await oracle.grade({ team: 'writing', task, result });
 * ```
 */

export { HeuristicOracle, significantTerms } from './heuristic-oracle.js';
export type { HeuristicAssessment, HeuristicOracleOptions } from './heuristic-oracle.js';
export { LLMOracle } from './llm-oracle.js';
export type { LLMOracleOptions } from './llm-oracle.js';
export { HybridOracle } from './hybrid-oracle.js';
export type { HybridOracleStats } from './hybrid-oracle.js';
export { bulletLines, extractJson, parseStructured } from './parsing.js';
