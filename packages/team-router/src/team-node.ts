/**
 * @module @crew-control/team-router/team-node
 * Wraps a nested team router as one top-level node.
 *
 * Flow per team run:
 * 1. Nested supervisor routes between the team's workers until `end`
 * 2. A TaskExecutionRecord for the whole team run (success or failure)
 * 3. Worker teams: grading (plus review for the writing team)
 *    Improvement team: counters reset, then back to the pipeline
 *
 * Nothing a worker throws leaves this node: failures become a failed record
 * and a `team_error` message. After MAX_FAILED_ATTEMPTS on one task a worker
 * team hands the task to the next stage.
 */

import {
  END,
  RecursionLimitError,
  TeamExecutionError,
  activeTeams,
  appendMessages,
  createMessage,
  errorMessage,
  isWorkerTeam,
  silentLogger,
  systemRuntime,
  teamNode,
  type ILogger,
  type Oracle,
  type RouteTarget,
  type RunConfig,
  type RunState,
  type Runtime,
  type TaskExecutionRecord,
  type TeamName,
} from '@crew-control/contracts';
import type { GradingLoop } from '@crew-control/grading-loop';
import { createTaskRecord } from '@crew-control/metrics';
import type { ProgressReporter } from '@crew-control/progress-reporter';
import { SupervisorRouter, type MemberNode } from './supervisor-router.js';
import { nextIdleWorker, startTeamWork, type TeamWorkState, type Worker } from './team-state.js';

/** Failed runs of one team on one task before the task moves on without it. */
export const MAX_FAILED_ATTEMPTS = 2;

const RECORD_DESCRIPTIONS: Readonly<Record<TeamName, (task: string) => string>> = {
  research: (task) => `Research for: ${task}`,
  writing: (task) => `Writing for: ${task}`,
  juno: () => 'System evaluation and improvement',
};

export interface TeamNodeDeps {
  config: RunConfig;
  oracle: Oracle;
  grading: GradingLoop;
  runtime?: Runtime;
  logger?: ILogger;
  reporter?: ProgressReporter;
}

/**
 * Team-level router: oracle decides, the first idle worker is the fallback.
 */
export function createTeamRouter(
  team: TeamName,
  workers: Readonly<Record<string, Worker>>,
  deps: Pick<TeamNodeDeps, 'config' | 'oracle' | 'logger'>
): SupervisorRouter<TeamWorkState, string> {
  const members = Object.keys(workers);
  const supervisor = `${team}_supervisor`;
  return new SupervisorRouter<TeamWorkState, string>({
    name: supervisor,
    members,
    nodes: workers,
    decide: (state, options) =>
      deps.oracle.route({ supervisor, options, task: state.task, history: state.history }),
    fallback: (state) => nextIdleWorker(state, members) ?? END,
    stepLimit: deps.config.recursionLimit,
    ...(deps.logger ? { logger: deps.logger } : {}),
  });
}

export function createTeamNode(
  team: TeamName,
  workers: Readonly<Record<string, Worker>>,
  deps: TeamNodeDeps
): MemberNode<RunState> {
  const runtime = deps.runtime ?? systemRuntime;
  const logger = deps.logger ?? silentLogger;
  const router = createTeamRouter(team, workers, deps);
  const workerTeams = activeTeams(deps.config).filter(isWorkerTeam);
  const lastWorkerTeam = workerTeams.at(-1);
  const following = workerTeams[workerTeams.findIndex((t) => t === team) + 1];
  const nextStage: RouteTarget = following ? teamNode(following) : 'task_generator';
  const activeNodes = new Set(activeTeams(deps.config).map(teamNode));
  const routable = (target: RouteTarget): boolean =>
    target === END || target === 'task_generator' || activeNodes.has(target);

  const recordFor = (run: RunState, startedAt: number, extra: { success: boolean; error?: string; tokens?: number }) =>
    createTaskRecord({
      taskId: run.currentTask?.id ?? `cycle-${run.cycle}`,
      team,
      agent: teamNode(team),
      description: RECORD_DESCRIPTIONS[team](run.currentTask?.description ?? 'Unknown task'),
      startedAt,
      endedAt: runtime.now(),
      ...(run.deadline !== undefined ? { deadline: run.deadline } : {}),
      success: extra.success,
      ...(extra.error !== undefined ? { error: extra.error } : {}),
      taskSize: run.taskSizeMultiplier,
      tokensUsed: extra.tokens ?? 0,
      agentCount: run.resources[team].currentAgents,
    });

  /**
   * Counters reset after the improvement team. The task closes once the last
   * worker team has delivered; before that the pipeline picks up where the
   * pre-emption interrupted it.
   */
  const afterImprovement = (run: RunState): RunState => {
    const { pendingRoute, ...rest } = run;
    const delivered = lastWorkerTeam === undefined || run.teamResults[lastWorkerTeam] !== undefined;
    const resume = pendingRoute !== undefined && pendingRoute !== END && pendingRoute !== teamNode(team) ? pendingRoute : undefined;
    const next: RouteTarget | undefined = delivered ? 'task_generator' : resume;
    return {
      ...rest,
      lowQualityStreaks: { research: 0, writing: 0, juno: 0 },
      missedDeadlines: 0,
      lastImprovementCycle: run.cycle,
      ...(next !== undefined ? { pendingRoute: next } : {}),
    };
  };

  const succeed = async (run: RunState, record: TaskExecutionRecord, output: string): Promise<RunState> => {
    let next: RunState = appendMessages(
      {
        ...run,
        records: [...run.records, record],
        teamResults: { ...run.teamResults, [team]: output },
      },
      createMessage('team', teamNode(team), 'team_output', output, record.endedAt)
    );

    if (!isWorkerTeam(team)) {
      return afterImprovement(next);
    }

    const outcome = await deps.grading.grade(next, team, output, record);
    next = outcome.state;
    if (outcome.grade) {
      deps.reporter?.graded(team, outcome.grade.score, outcome.deadlineMet);
    }
    if (outcome.escalation) {
      deps.reporter?.escalated(team, outcome.escalation.reasons);
    }
    if (team === 'writing') {
      next = await deps.grading.reviewTask(next, output);
    }
    if (next.pendingRoute !== undefined && !routable(next.pendingRoute)) {
      const { pendingRoute: dropped, ...rest } = next;
      logger.debug('Escalation target is disabled', { route: dropped });
      next = rest;
    }
    if (team === lastWorkerTeam && next.pendingRoute === undefined) {
      next = { ...next, pendingRoute: 'task_generator' };
    }
    return next;
  };

  return async (run) => {
    const startedAt = runtime.now();
    deps.reporter?.team(team, 'started');
    logger.info(`Running ${team} team`, { team, cycle: run.cycle });

    let finished: TeamWorkState;
    try {
      const result = await router.run(startTeamWork(run, run.currentTask?.description ?? ''));
      if (result.exhausted) {
        throw new RecursionLimitError(router.name, deps.config.recursionLimit);
      }
      finished = result.state;
    } catch (error) {
      return fail(run, startedAt, error);
    }

    const last = finished.outputs.at(-1);
    if (!last) {
      return fail(finished.run, startedAt, new TeamExecutionError(team, `${team} team produced no output`));
    }

    const output = isWorkerTeam(team) ? last.output : finished.outputs.map((o) => o.output).join('\n\n');
    const tokens = finished.outputs.reduce((sum, o) => sum + o.tokensUsed, 0);
    const record = recordFor(finished.run, startedAt, { success: true, tokens });
    deps.reporter?.team(team, 'completed', { durationMs: record.endedAt - startedAt });
    return succeed(finished.run, record, output);
  };

  function fail(run: RunState, startedAt: number, error: unknown): RunState {
    const message = errorMessage(error);
    const record = recordFor(run, startedAt, { success: false, error: message });
    deps.reporter?.team(team, 'failed', { error: message, durationMs: record.endedAt - startedAt });

    const next = appendMessages(
      deps.grading.recordFailure({ ...run, records: [...run.records, record] }, record),
      createMessage('team', teamNode(team), 'team_error', `Error in ${team} team: ${message}`, record.endedAt)
    );
    if (!isWorkerTeam(team)) {
      return afterImprovement(next);
    }

    const attempts = next.records.filter((r) => r.team === team && r.taskId === record.taskId && !r.success).length;
    if (attempts < MAX_FAILED_ATTEMPTS || next.pendingRoute !== undefined) {
      return next;
    }
    logger.warn(`Moving on without the ${team} team`, { team, attempts, next: nextStage });
    return { ...next, pendingRoute: nextStage };
  }
}
