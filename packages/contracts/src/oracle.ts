/**
 * @module @crew-control/contracts/oracle
 * Typed port to the language-model oracle.
 *
 * Adapters turn model text into these structures. When they cannot, they throw
 * {@link OracleResponseError}; every call site in the control core catches it
 * and substitutes a neutral default.
 */

import type { RunMessage, TeamName } from './types.js';

export interface GradeRequest {
  team: TeamName;
  task: string;
  result: string;
}

export interface GradeResult {
  /** In [0, 1]. */
  score: number;
  comments: string;
  issues: string[];
}

export interface RouteRequest {
  /** Name of the deciding supervisor, e.g. `supervisor` or `research_supervisor`. */
  supervisor: string;
  /** Valid next hops. Anything else is treated as not actionable. */
  options: readonly string[];
  task?: string;
  history: readonly RunMessage[];
}

export interface TaskRequest {
  category: string;
  cycle: number;
}

export interface WorkRequest {
  team: TeamName;
  worker: string;
  task: string;
  /** Prior output the worker builds on, if any. */
  context?: string;
}

export interface WorkResult {
  output: string;
  tokensUsed: number;
}

export interface CodeFixRequest {
  issues: readonly string[];
  priorFixes: readonly string[];
}

export interface CodeFixProposal {
  narrative: string;
  fixes: string[];
  /** Optional snippet to validate in the sandbox before recording. */
  code?: string;
}

export interface ReviewRequest {
  task: string;
  result: string;
}

export interface ReviewResult {
  score: number;
  comments: string;
  strengths: string[];
  areasForImprovement: string[];
}

export interface SynthesisRequest {
  overallScore?: number;
  unmetTargets: string[];
  teamsNeedingImprovement: string[];
  resourceEffectiveness?: number;
  codeImprovement?: number;
  /** Full numeric reports, serialised for the model. */
  summaries: Record<string, unknown>;
}

export interface SynthesisResult {
  narrative: string;
  recommendations: string[];
}

/**
 * Oracle port. Every method may reject; callers own the fallback.
 */
export interface Oracle {
  readonly name: string;
  grade(request: GradeRequest): Promise<GradeResult>;
  route(request: RouteRequest): Promise<string>;
  generateTask(request: TaskRequest): Promise<string>;
  work(request: WorkRequest): Promise<WorkResult>;
  review(request: ReviewRequest): Promise<ReviewResult>;
  proposeCodeFix(request: CodeFixRequest): Promise<CodeFixProposal>;
  synthesize(request: SynthesisRequest): Promise<SynthesisResult>;
}
