/**
 * @module @crew-control/team-router/run-controller
 * Top-level supervisor over the teams and the task generator.
 *
 * Routing order at the top level:
 * 1. A pending `end` stops the run
 * 2. No current task: task generator (or stop and wait for input)
 * 3. A struggling team with fresh records pre-empts to the improvement team;
 *    any other pending route is kept for when it finishes
 * 4. A pending route left by a node is taken and cleared
 * 5. Oracle decision, falling back to the research team
 */

import { randomUUID } from 'node:crypto';
import {
  END,
  IMPROVEMENT_TEAM,
  TEAM_NAMES,
  TOP_LEVEL_NODES,
  activeTeams,
  appendMessages,
  createMessage,
  createRunState,
  messagesForCurrentTask,
  silentLogger,
  systemRuntime,
  teamNode,
  type ILogger,
  type Oracle,
  type RunConfig,
  type RunState,
  type Runtime,
  type SandboxExecutor,
  type StopReason,
  type TeamName,
  type TopLevelNode,
  type WebScrapeTool,
  type WebSearchTool,
} from '@crew-control/contracts';
import { EvaluationEngine } from '@crew-control/evaluation-engine';
import { GradingLoop } from '@crew-control/grading-loop';
import { createPerformanceTargets, needsImprovement } from '@crew-control/metrics';
import type { ProgressReporter } from '@crew-control/progress-reporter';
import type { DocumentWorkspace } from '@crew-control/workspace-tools';
import { WorkloadManager } from '@crew-control/workload-manager';
import { createImprovementWorkers } from './improvement.js';
import { SupervisorRouter, type MemberNode, type RuleResult } from './supervisor-router.js';
import { TaskGenerator } from './task-generator.js';
import { createTeamNode } from './team-node.js';
import { createResearchWorkers, createWritingWorkers } from './workers.js';

export interface RunTools {
  search?: WebSearchTool;
  scrape?: WebScrapeTool;
  documents?: DocumentWorkspace;
  sandbox?: SandboxExecutor;
}

export interface RunControllerOptions {
  config: RunConfig;
  oracle: Oracle;
  tools?: RunTools;
  runtime?: Runtime;
  logger?: ILogger;
  reporter?: ProgressReporter;
  runId?: string;
  initialAgents?: Partial<Record<TeamName, number>>;
}

export interface RunResult {
  state: RunState;
  stopReason: StopReason;
  cycles: number;
}

export class RunController {
  readonly engine: EvaluationEngine;
  private readonly config: RunConfig;
  private readonly oracle: Oracle;
  private readonly tools: RunTools;
  private readonly runtime: Runtime;
  private readonly logger: ILogger;
  private readonly reporter: ProgressReporter | undefined;
  private readonly grading: GradingLoop;
  private readonly generator: TaskGenerator;
  private readonly enabled: ReadonlySet<TopLevelNode>;

  constructor(private readonly options: RunControllerOptions) {
    this.config = options.config;
    this.oracle = options.oracle;
    this.tools = options.tools ?? {};
    this.runtime = options.runtime ?? systemRuntime;
    this.logger = options.logger ?? silentLogger;
    this.reporter = options.reporter;

    const shared = { runtime: this.runtime, logger: this.logger };
    const workload = new WorkloadManager({
      workload: this.config.workload,
      resources: this.config.resources,
      ...shared,
    });
    this.grading = new GradingLoop({ oracle: this.oracle, workload, config: this.config, ...shared });
    this.engine = new EvaluationEngine({ oracle: this.oracle, thresholds: this.config.improvement, ...shared });
    this.generator = new TaskGenerator({ oracle: this.oracle, config: this.config, ...shared });
    this.enabled = new Set<TopLevelNode>([...activeTeams(this.config).map(teamNode), 'task_generator']);
  }

  /**
   * Run until the generator stops, the supervisor ends the run, or the step
   * limit is reached. With `initialTask` the first cycle uses it instead of a
   * generated task.
   */
  async run(initialTask?: string): Promise<RunResult> {
    const initial = this.initialState(initialTask);
    const stop: { reason?: StopReason } = {};
    const router = this.createRouter((reason) => {
      stop.reason = reason;
    });

    this.logger.info('Run started', { runId: initial.runId, teams: [...this.enabled] });
    const result = await router.run(initial);
    const state = result.state;

    let stopReason: StopReason;
    if (result.exhausted) {
      stopReason = 'recursion_limit';
    } else if (stop.reason !== undefined) {
      stopReason = stop.reason;
    } else {
      stopReason = !state.currentTask && !this.config.autoGenerateTasks ? 'awaiting_input' : 'end';
    }

    this.logger.info('Run finished', { runId: state.runId, stopReason, cycles: state.cycle, steps: result.steps });
    this.reporter?.complete(stopReason, state.cycle);
    return { state, stopReason, cycles: state.cycle };
  }

  /**
   * Teams whose performance calls for an improvement cycle now.
   * A team only counts when it has records newer than the last improvement
   * run, so a standing error count cannot keep the improvement team busy.
   */
  teamsNeedingAttention(state: RunState): TeamName[] {
    if (!this.enabled.has('juno_team') || state.lastImprovementCycle === state.cycle) {
      return [];
    }

    let lastImprovement = -1;
    state.records.forEach((r, i) => {
      if (r.team === IMPROVEMENT_TEAM) {
        lastImprovement = i;
      }
    });
    return TEAM_NAMES.filter((team) => {
      if (team === IMPROVEMENT_TEAM) {
        return false;
      }
      const struggling =
        needsImprovement(state.performance[team], this.config.improvement) ||
        state.lowQualityStreaks[team] >= this.config.escalation.lowQualityStreak;
      return struggling && state.records.some((r, i) => i > lastImprovement && r.team === team);
    });
  }

  private initialState(initialTask: string | undefined): RunState {
    const state = createRunState(this.config, {
      ...(this.options.runId !== undefined ? { runId: this.options.runId } : {}),
      ...(this.options.initialAgents ? { initialAgents: this.options.initialAgents } : {}),
    });
    if (initialTask === undefined || initialTask.trim().length === 0) {
      return state;
    }

    const description = initialTask.trim();
    const now = this.runtime.now();
    this.reporter?.cycleStarted(1, description);
    return appendMessages(
      {
        ...state,
        currentTask: { id: randomUUID(), description, category: 'User' },
        cycle: 1,
        generatedTaskCount: 1,
        performanceTargets: createPerformanceTargets(this.config.performanceTargets),
        pendingRoute: 'research_team',
      },
      createMessage('user', 'user', 'task', `Task #1: ${description}`, now)
    );
  }

  private createRouter(onStop: (reason: StopReason) => void): SupervisorRouter<RunState, TopLevelNode> {
    const nodeDeps = {
      config: this.config,
      oracle: this.oracle,
      grading: this.grading,
      runtime: this.runtime,
      logger: this.logger,
      ...(this.reporter ? { reporter: this.reporter } : {}),
    };
    const workerDeps = { oracle: this.oracle, runtime: this.runtime, logger: this.logger };

    const taskGenerator: MemberNode<RunState> = async (state) => {
      const generated = await this.generator.next(state);
      if (generated.stop) {
        onStop(generated.stop);
      } else if (generated.state.currentTask) {
        this.reporter?.cycleStarted(generated.state.cycle, generated.state.currentTask.description);
      }
      return generated.state;
    };

    const nodes: Record<TopLevelNode, MemberNode<RunState>> = {
      research_team: createTeamNode(
        'research',
        createResearchWorkers({
          ...workerDeps,
          ...(this.tools.search ? { search: this.tools.search } : {}),
          ...(this.tools.scrape ? { scrape: this.tools.scrape } : {}),
        }),
        nodeDeps
      ),
      writing_team: createTeamNode(
        'writing',
        createWritingWorkers({
          ...workerDeps,
          ...(this.tools.documents ? { documents: this.tools.documents } : {}),
        }),
        nodeDeps
      ),
      juno_team: createTeamNode(
        'juno',
        createImprovementWorkers({
          ...workerDeps,
          engine: this.engine,
          config: this.config,
          ...(this.tools.sandbox ? { sandbox: this.tools.sandbox } : {}),
          ...(this.reporter ? { reporter: this.reporter } : {}),
        }),
        nodeDeps
      ),
      task_generator: taskGenerator,
    };

    return new SupervisorRouter<RunState, TopLevelNode>({
      name: 'supervisor',
      members: TOP_LEVEL_NODES,
      nodes,
      decide: (state, options) =>
        this.oracle.route({
          supervisor: 'supervisor',
          options,
          ...(state.currentTask ? { task: state.currentTask.description } : {}),
          history: messagesForCurrentTask(state),
        }),
      fallback: 'research_team',
      rules: (state) => this.rules(state),
      isEnabled: (member) => this.enabled.has(member),
      stepLimit: this.config.recursionLimit,
      logger: this.logger,
    });
  }

  private rules(state: RunState): RuleResult<RunState, TopLevelNode> | undefined {
    const { pendingRoute, ...rest } = state;

    if (pendingRoute === END) {
      return { next: END, state: rest };
    }
    if (!state.currentTask) {
      return { next: this.config.autoGenerateTasks ? 'task_generator' : END };
    }

    const struggling = this.teamsNeedingAttention(state);
    if (struggling.length > 0) {
      this.logger.info('Pre-empting to improvement team', { teams: struggling });
      return {
        next: 'juno_team',
        state: appendMessages(
          pendingRoute === 'juno_team' ? rest : state,
          createMessage(
            'supervisor',
            'supervisor',
            'improvement_request',
            `Performance review requested for: ${struggling.join(', ')}`,
            this.runtime.now()
          )
        ),
      };
    }

    if (pendingRoute === undefined) {
      return undefined;
    }
    if (!this.enabled.has(pendingRoute)) {
      this.logger.debug('Dropping pending route to disabled node', { node: pendingRoute });
      return { state: rest };
    }
    return { next: pendingRoute, state: rest };
  }
}
