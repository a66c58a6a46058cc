/**
 * @module @crew-control/evaluation-engine/evaluation-engine
 * Composes the three evaluations into one report with an oracle narrative.
 */

import {
  TEAM_NAMES,
  errorMessage,
  silentLogger,
  systemRuntime,
  type ILogger,
  type ImprovementThresholds,
  type Oracle,
  type RunState,
  type Runtime,
  type SynthesisResult,
  type TeamName,
} from '@crew-control/contracts';
import { DEFAULT_IMPROVEMENT_THRESHOLDS, avgQuality, needsImprovement, successRate } from '@crew-control/metrics';
import { evaluateCodeImprovements, type CodeImprovementReport } from './code-improvements.js';
import { evaluateResourceScaling, type ResourceScalingReport } from './scaling.js';
import { evaluateTaskPerformance, type TaskPerformanceReport } from './task-performance.js';

export const FALLBACK_NARRATIVE = 'Analysis error: Could not parse LLM output.';
export const FALLBACK_RECOMMENDATION = 'Review system logs for detailed metrics.';

export interface EvaluationReport {
  runId: string;
  timestamp: number;
  performance: TaskPerformanceReport;
  codeImprovements: CodeImprovementReport;
  resourceScaling: ResourceScalingReport;
  missedDeadlines: number;
  analysis: SynthesisResult;
  /** The oracle fell back to the fixed narrative. */
  fallback: boolean;
}

export interface EvaluationEngineOptions {
  oracle: Oracle;
  thresholds?: ImprovementThresholds;
  runtime?: Runtime;
  logger?: ILogger;
}

export class EvaluationEngine {
  private readonly oracle: Oracle;
  private readonly thresholds: ImprovementThresholds;
  private readonly runtime: Runtime;
  private readonly logger: ILogger;

  constructor(options: EvaluationEngineOptions) {
    this.oracle = options.oracle;
    this.thresholds = options.thresholds ?? DEFAULT_IMPROVEMENT_THRESHOLDS;
    this.runtime = options.runtime ?? systemRuntime;
    this.logger = options.logger ?? silentLogger;
  }

  evaluateTaskPerformance(state: RunState): TaskPerformanceReport {
    return evaluateTaskPerformance(state, this.runtime.now());
  }

  evaluateCodeImprovements(state: RunState, baselineId?: string): CodeImprovementReport {
    return evaluateCodeImprovements(state, baselineId, this.runtime.now());
  }

  evaluateResourceScaling(state: RunState): ResourceScalingReport {
    return evaluateResourceScaling(state, this.runtime.now());
  }

  teamsNeedingImprovement(state: RunState): TeamName[] {
    return TEAM_NAMES.filter((team) => needsImprovement(state.performance[team], this.thresholds));
  }

  /**
   * Issues for the improvement team: unmet targets first, then teams whose
   * performance record trips the improvement thresholds.
   */
  identifyIssues(state: RunState): string[] {
    const issues: string[] = [];
    const performance = this.evaluateTaskPerformance(state);
    if (performance.status === 'evaluated') {
      for (const [metric, achievement] of Object.entries(performance.targets)) {
        if (!achievement.achieved) {
          issues.push(
            `Target not met: ${metric} is ${achievement.current.toFixed(2)}, target ${achievement.target.toFixed(2)}`
          );
        }
      }
    }
    for (const team of this.teamsNeedingImprovement(state)) {
      const perf = state.performance[team];
      issues.push(
        `Team ${team} needs improvement: avg quality ${avgQuality(perf).toFixed(2)}, success rate ${successRate(perf).toFixed(2)}, errors ${perf.errorCount}`
      );
    }
    return issues;
  }

  async generateReport(state: RunState): Promise<EvaluationReport> {
    const performance = this.evaluateTaskPerformance(state);
    const codeImprovements = this.evaluateCodeImprovements(state);
    const resourceScaling = this.evaluateResourceScaling(state);

    const unmetTargets =
      performance.status === 'evaluated'
        ? Object.entries(performance.targets)
            .filter(([, achievement]) => !achievement.achieved)
            .map(([metric]) => metric)
        : [];

    let analysis: SynthesisResult;
    let fallback = false;
    try {
      analysis = await this.oracle.synthesize({
        ...(performance.status === 'evaluated' ? { overallScore: performance.metrics.overallScore } : {}),
        unmetTargets,
        teamsNeedingImprovement: this.teamsNeedingImprovement(state),
        ...(resourceScaling.status === 'evaluated'
          ? { resourceEffectiveness: resourceScaling.overallEffectiveness }
          : {}),
        ...(codeImprovements.status === 'evaluated' ? { codeImprovement: codeImprovements.overallImprovement } : {}),
        summaries: {
          performance: performance.status === 'evaluated' ? performance.metrics : performance.summary,
          codeImprovements: {
            summary: codeImprovements.summary,
            fixesImplemented: state.fixesImplemented.length,
          },
          resourceScaling: resourceScaling.summary,
          missedDeadlines: state.missedDeadlines,
        },
      });
    } catch (error) {
      this.logger.warn('Report synthesis failed, using fallback narrative', { error: errorMessage(error) });
      analysis = { narrative: FALLBACK_NARRATIVE, recommendations: [FALLBACK_RECOMMENDATION] };
      fallback = true;
    }

    return {
      runId: state.runId,
      timestamp: this.runtime.now(),
      performance,
      codeImprovements,
      resourceScaling,
      missedDeadlines: state.missedDeadlines,
      analysis,
      fallback,
    };
  }
}

/**
 * Plain-text rendering for the CLI and the evaluator's message.
 */
export function formatReport(report: EvaluationReport): string {
  const parts = ['# System Evaluation', '', report.performance.summary];

  if (report.performance.status === 'evaluated') {
    const m = report.performance.metrics;
    parts.push(
      '',
      `Tasks: ${m.totalTasks}`,
      `Success rate: ${(m.successRate * 100).toFixed(1)}%`,
      `Average quality: ${m.avgQuality.toFixed(2)}`,
      `Deadline met rate: ${(m.deadlineMetRate * 100).toFixed(1)}%`,
      `Average task size: ${m.avgTaskSize.toFixed(2)}x`
    );
    const targets = Object.entries(report.performance.targets);
    if (targets.length > 0) {
      parts.push('', '## Targets');
      for (const [metric, t] of targets) {
        parts.push(`- ${metric}: ${t.current.toFixed(2)} / ${t.target.toFixed(2)} ${t.achieved ? '✅' : '❌'}`);
      }
    }
  }

  parts.push('', report.codeImprovements.summary, report.resourceScaling.summary);
  parts.push(`Missed deadlines: ${report.missedDeadlines}`);
  parts.push('', '## Analysis', report.analysis.narrative);
  if (report.analysis.recommendations.length > 0) {
    parts.push('', '## Recommendations', ...report.analysis.recommendations.map((r) => `- ${r}`));
  }
  return parts.join('\n');
}
