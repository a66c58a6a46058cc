/**
 * @module @crew-control/oracle/hybrid-oracle
 * Heuristic first, model when the heuristic is unsure.
 *
 * 1. Grade and review with the heuristic
 * 2. High confidence → done
 * 3. Low confidence → ask the model; if the model fails, keep the heuristic answer
 *
 * Content generation always goes to the model, with the heuristic as fallback.
 * Routing stays heuristic, since the router's own rules cover the rest.
 */

import {
  errorMessage,
  silentLogger,
  type CodeFixProposal,
  type CodeFixRequest,
  type GradeRequest,
  type GradeResult,
  type ILLM,
  type ILogger,
  type Oracle,
  type ReviewRequest,
  type ReviewResult,
  type RouteRequest,
  type SynthesisRequest,
  type SynthesisResult,
  type TaskRequest,
  type WorkRequest,
  type WorkResult,
} from '@crew-control/contracts';
import { HeuristicOracle } from './heuristic-oracle.js';
import { LLMOracle, type LLMOracleOptions } from './llm-oracle.js';

export interface HybridOracleStats {
  heuristicCount: number;
  llmCount: number;
  fallbackCount: number;
  heuristicRate: number;
}

export class HybridOracle implements Oracle {
  readonly name = 'hybrid';
  private readonly heuristic: HeuristicOracle;
  private readonly llm: LLMOracle;
  private heuristicCount = 0;
  private llmCount = 0;
  private fallbackCount = 0;

  constructor(
    llm: ILLM,
    private readonly logger: ILogger = silentLogger,
    options: LLMOracleOptions = {}
  ) {
    this.heuristic = new HeuristicOracle();
    this.llm = new LLMOracle(llm, options);
  }

  async grade(request: GradeRequest): Promise<GradeResult> {
    const assessment = this.heuristic.assess(request.task, request.result);
    if (assessment.confidence === 'high') {
      this.heuristicCount++;
      return this.heuristic.grade(request);
    }
    return this.withFallback('grade', () => this.llm.grade(request), () => this.heuristic.grade(request));
  }

  async review(request: ReviewRequest): Promise<ReviewResult> {
    const assessment = this.heuristic.assess(request.task, request.result);
    if (assessment.confidence === 'high') {
      this.heuristicCount++;
      return this.heuristic.review(request);
    }
    return this.withFallback('review', () => this.llm.review(request), () => this.heuristic.review(request));
  }

  async route(request: RouteRequest): Promise<string> {
    this.heuristicCount++;
    return this.heuristic.route(request);
  }

  async generateTask(request: TaskRequest): Promise<string> {
    return this.withFallback('generateTask', () => this.llm.generateTask(request), () => this.heuristic.generateTask(request));
  }

  async work(request: WorkRequest): Promise<WorkResult> {
    return this.withFallback('work', () => this.llm.work(request), () => this.heuristic.work(request));
  }

  async proposeCodeFix(request: CodeFixRequest): Promise<CodeFixProposal> {
    return this.withFallback(
      'proposeCodeFix',
      () => this.llm.proposeCodeFix(request),
      () => this.heuristic.proposeCodeFix(request)
    );
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    return this.withFallback('synthesize', () => this.llm.synthesize(request), () => this.heuristic.synthesize(request));
  }

  /**
   * How often each stage answered.
   */
  getStats(): HybridOracleStats {
    const total = this.heuristicCount + this.llmCount;
    return {
      heuristicCount: this.heuristicCount,
      llmCount: this.llmCount,
      fallbackCount: this.fallbackCount,
      heuristicRate: total === 0 ? 0 : this.heuristicCount / total,
    };
  }

  private async withFallback<T>(operation: string, primary: () => Promise<T>, fallback: () => Promise<T>): Promise<T> {
    try {
      const result = await primary();
      this.llmCount++;
      return result;
    } catch (error) {
      this.fallbackCount++;
      this.heuristicCount++;
      this.logger.warn(`LLM ${operation} failed, using heuristic`, { error: errorMessage(error) });
      return fallback();
    }
  }
}
