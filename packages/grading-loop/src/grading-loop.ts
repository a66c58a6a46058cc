/**
 * @module @crew-control/grading-loop/grading-loop
 * Grades each completed team output and feeds the result back into the run.
 *
 * Flow per graded output:
 * 1. Workload adjustments (size, deadline, resource need)
 * 2. Oracle grade, or a neutral 0.5 when the oracle fails
 * 3. Deadline check, performance record, streak and missed-deadline counters
 * 4. Feedback message, then at most one escalation message
 * 5. Deadline and size reset once every active worker team has been graded
 */

import {
  activeTeams,
  appendMessages,
  createMessage,
  errorMessage,
  isWorkerTeam,
  silentLogger,
  systemRuntime,
  withTeam,
  type GradeResult,
  type ILogger,
  type Oracle,
  type ReviewResult,
  type RunConfig,
  type RunState,
  type Runtime,
  type TaskExecutionRecord,
  type WorkerTeam,
} from '@crew-control/contracts';
import {
  clampScore,
  duration,
  patchQuality,
  recordFailure,
  recordGrade,
  withinDeadline,
} from '@crew-control/metrics';
import { latestRequest } from '@crew-control/resource-scaling';
import type { WorkloadManager } from '@crew-control/workload-manager';
import { EscalationPolicy, type EscalationDecision } from './escalation.js';

export interface GradingLoopOptions {
  oracle: Oracle;
  workload: WorkloadManager;
  config: RunConfig;
  runtime?: Runtime;
  logger?: ILogger;
}

export interface GradeOutcome {
  state: RunState;
  /** Undefined when there was no current task to grade against. */
  grade?: GradeResult;
  deadlineMet: boolean;
  escalation?: EscalationDecision;
  /** The oracle failed and the neutral default was used. */
  fallback: boolean;
}

export class GradingLoop {
  private readonly oracle: Oracle;
  private readonly workload: WorkloadManager;
  private readonly config: RunConfig;
  private readonly runtime: Runtime;
  private readonly logger: ILogger;
  private readonly escalation: EscalationPolicy;

  constructor(options: GradingLoopOptions) {
    this.oracle = options.oracle;
    this.workload = options.workload;
    this.config = options.config;
    this.runtime = options.runtime ?? systemRuntime;
    this.logger = options.logger ?? silentLogger;
    this.escalation = new EscalationPolicy(options.config.escalation);
  }

  /**
   * Grade `result`, produced by `team` and logged as `record`.
   */
  async grade(
    state: RunState,
    team: WorkerTeam,
    result: string,
    record?: TaskExecutionRecord
  ): Promise<GradeOutcome> {
    let next = this.workload.applyAdjustments(state);
    const task = next.currentTask;
    if (!task) {
      return { state: next, deadlineMet: true, fallback: false };
    }

    const { grade, fallback } = await this.requestGrade(team, task.description, result);
    const now = this.runtime.now();
    const met = withinDeadline(now, next.deadline);

    // performance, streak, missed deadlines
    const passed = grade.score >= this.config.qualityThreshold;
    next = {
      ...next,
      performance: withTeam(
        next.performance,
        team,
        recordGrade(next.performance[team], grade.score, record ? duration(record) : 0)
      ),
      lowQualityStreaks: withTeam(next.lowQualityStreaks, team, passed ? 0 : next.lowQualityStreaks[team] + 1),
      missedDeadlines: met ? next.missedDeadlines : next.missedDeadlines + 1,
      records: record ? patchRecord(next.records, record.recordId, grade.score) : next.records,
      supervisorFeedback: withTeam(next.supervisorFeedback, team, [
        ...next.supervisorFeedback[team],
        grade.comments,
      ]),
    };

    next = appendMessages(
      next,
      createMessage('supervisor', 'supervisor', 'feedback', this.feedbackText(team, grade, now, next.deadline), now)
    );

    this.logger.info(`Graded ${team} output`, {
      team,
      score: grade.score,
      deadlineMet: met,
      streak: next.lowQualityStreaks[team],
      fallback,
    });

    const decision = this.escalation.decide(next, team, latestRequest(next));
    if (decision) {
      next = appendMessages(
        {
          ...next,
          pendingRoute: 'juno_team',
          issuesIdentified: [...next.issuesIdentified, ...grade.issues.map((issue) => `${team}: ${issue}`)],
        },
        createMessage(
          'supervisor',
          'supervisor',
          'improvement_request',
          this.escalation.buildMessage(next, decision, grade.issues),
          now
        )
      );
      this.logger.info('Escalating to improvement team', { team, reasons: decision.reasons });
    }

    next = this.markGraded(next, team);

    return {
      state: next,
      grade,
      deadlineMet: met,
      fallback,
      ...(decision ? { escalation: decision } : {}),
    };
  }

  /**
   * Count a run that produced no gradable output against the team.
   */
  recordFailure(state: RunState, record: TaskExecutionRecord): RunState {
    this.logger.warn(`Team ${record.team} failed`, { team: record.team, error: record.error });
    return {
      ...state,
      performance: withTeam(state.performance, record.team, recordFailure(state.performance[record.team], duration(record))),
    };
  }

  /**
   * Review the final output of the current task. Stores the score and
   * comments keyed by task description.
   */
  async reviewTask(state: RunState, result: string): Promise<RunState> {
    const task = state.currentTask;
    if (!task || result.trim().length === 0) {
      return state;
    }

    let review: ReviewResult;
    try {
      const raw = await this.oracle.review({ task: task.description, result });
      review = { ...raw, score: clampScore(raw.score) };
    } catch (error) {
      this.logger.warn('Review oracle failed, using neutral score', { error: errorMessage(error) });
      review = {
        score: 0.5,
        comments: `Error in review: ${errorMessage(error)}`,
        strengths: [],
        areasForImprovement: [],
      };
    }

    const parts = [
      'Task Review Results:',
      '',
      `Task: ${task.description}`,
      '',
      `Score: ${review.score.toFixed(2)}/1.0`,
      '',
      `Comments: ${review.comments}`,
    ];
    if (review.strengths.length > 0) {
      parts.push('', 'Strengths:', ...review.strengths.map((s) => `- ${s}`));
    }
    if (review.areasForImprovement.length > 0) {
      parts.push('', 'Areas for Improvement:', ...review.areasForImprovement.map((a) => `- ${a}`));
    }

    const now = this.runtime.now();
    return appendMessages(
      {
        ...state,
        reviewScores: { ...state.reviewScores, [task.description]: review.score },
        reviewComments: { ...state.reviewComments, [task.description]: review.comments },
      },
      createMessage('reviewer', 'reviewer', 'review', parts.join('\n'), now)
    );
  }

  private async requestGrade(
    team: WorkerTeam,
    task: string,
    result: string
  ): Promise<{ grade: GradeResult; fallback: boolean }> {
    try {
      const grade = await this.oracle.grade({ team, task, result });
      return { grade: { ...grade, score: clampScore(grade.score) }, fallback: false };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn('Grading oracle failed, using neutral score', { team, error: message });
      return {
        grade: {
          score: 0.5,
          comments: `Error parsing grade response: ${message}`,
          issues: [`Error in grading (parse error): ${message}`],
        },
        fallback: true,
      };
    }
  }

  private feedbackText(team: WorkerTeam, grade: GradeResult, now: number, deadline?: number): string {
    const parts = [`Supervisor Feedback for ${team} team:`, '', `Score: ${grade.score.toFixed(2)}/1.0`];

    if (deadline !== undefined) {
      const seconds = Math.abs(deadline - now) / 1000;
      parts.push(
        withinDeadline(now, deadline)
          ? `✅ Deadline met with ${seconds.toFixed(1)} seconds remaining.`
          : `❌ Deadline missed by ${seconds.toFixed(1)} seconds.`
      );
    }

    parts.push('', `Comments: ${grade.comments}`);
    if (grade.issues.length > 0) {
      parts.push('', 'Issues:', ...grade.issues.map((issue) => `- ${issue}`));
    }
    return parts.join('\n');
  }

  /**
   * Once every active worker team has output for this task, the next task
   * starts from a standard size with no deadline.
   */
  private markGraded(state: RunState, team: WorkerTeam): RunState {
    const graded = state.gradedTeams.includes(team) ? state.gradedTeams : [...state.gradedTeams, team];
    const required = activeTeams(this.config).filter(isWorkerTeam);

    if (required.every((t) => graded.includes(t))) {
      this.logger.debug('All worker teams graded, resetting deadline and size');
      const { deadline: _deadline, ...rest } = state;
      return { ...rest, taskSizeMultiplier: 1.0, gradedTeams: [] };
    }
    return { ...state, gradedTeams: graded };
  }
}

function patchRecord(
  records: readonly TaskExecutionRecord[],
  recordId: string,
  score: number
): TaskExecutionRecord[] {
  return records.map((r) => (r.recordId === recordId ? patchQuality(r, score) : r));
}
