/**
 * @module @crew-control/team-router/task-generator
 * Closes the current task and opens the next cycle.
 */

import { randomUUID } from 'node:crypto';
import {
  END,
  activeTeams,
  appendMessages,
  createMessage,
  errorMessage,
  isWorkerTeam,
  pickOne,
  silentLogger,
  systemRuntime,
  type ILogger,
  type Oracle,
  type RunConfig,
  type RunState,
  type Runtime,
  type StopReason,
} from '@crew-control/contracts';
import { observedValues } from '@crew-control/evaluation-engine';
import { createPerformanceTargets, updateTargetValues } from '@crew-control/metrics';

export interface TaskGeneratorOptions {
  oracle: Oracle;
  config: RunConfig;
  runtime?: Runtime;
  logger?: ILogger;
}

export interface GeneratedCycle {
  state: RunState;
  /** Set when the run should end here. */
  stop?: StopReason;
}

export function fallbackTask(category: string): string {
  return `Complete a ${category.toLowerCase()} task on a topic of your choice and report the results.`;
}

export class TaskGenerator {
  private readonly oracle: Oracle;
  private readonly config: RunConfig;
  private readonly runtime: Runtime;
  private readonly logger: ILogger;

  constructor(options: TaskGeneratorOptions) {
    this.oracle = options.oracle;
    this.config = options.config;
    this.runtime = options.runtime ?? systemRuntime;
    this.logger = options.logger ?? silentLogger;
  }

  async next(state: RunState): Promise<GeneratedCycle> {
    const now = this.runtime.now();
    const closed = this.closeCurrentTask(state);

    if (closed.cycle >= this.config.maxCycles) {
      this.logger.info('Cycle limit reached', { cycle: closed.cycle, maxCycles: this.config.maxCycles });
      return {
        state: appendMessages(
          { ...closed, pendingRoute: END },
          createMessage(
            'system',
            'task_generator',
            'cycle_limit',
            `Maximum cycle count (${this.config.maxCycles}) reached. Stopping autonomous execution.`,
            now
          )
        ),
        stop: 'max_cycles',
      };
    }

    if (!this.config.autoGenerateTasks) {
      this.logger.info('Task generation disabled, waiting for input');
      return { state: { ...closed, pendingRoute: END }, stop: 'awaiting_input' };
    }

    const category = pickOne(this.runtime.random, this.config.taskCategories) ?? 'General';
    const cycle = closed.cycle + 1;
    const description = await this.generate(category, cycle);

    const base = Object.keys(closed.performanceTargets).length > 0
      ? closed.performanceTargets
      : createPerformanceTargets(this.config.performanceTargets);
    const { deadline: _deadline, ...rest } = closed;

    this.logger.info('New task generated', { cycle, category });
    return {
      state: appendMessages(
        {
          ...rest,
          currentTask: { id: randomUUID(), description, category },
          cycle,
          generatedTaskCount: closed.generatedTaskCount + 1,
          taskSizeMultiplier: 1.0,
          gradedTeams: [],
          teamResults: {},
          performanceTargets: updateTargetValues(base, observedValues(closed)),
          pendingRoute: 'research_team',
        },
        createMessage('system', 'task_generator', 'task', `Task #${cycle}: ${description}`, now)
      ),
    };
  }

  /**
   * A task counts as completed only when the last worker team delivered output
   * for it.
   */
  private closeCurrentTask(state: RunState): RunState {
    const { currentTask: task, ...rest } = state;
    if (!task) {
      return state;
    }
    const finalTeam = activeTeams(this.config).filter(isWorkerTeam).at(-1);
    if (finalTeam !== undefined && state.teamResults[finalTeam] === undefined) {
      this.logger.warn('Task closed without final output', { task: task.description, team: finalTeam });
      return rest;
    }
    return { ...rest, completedTasks: [...state.completedTasks, task.description] };
  }

  private async generate(category: string, cycle: number): Promise<string> {
    try {
      const text = (await this.oracle.generateTask({ category, cycle })).trim();
      if (text.length > 0) {
        return text;
      }
      this.logger.warn('Task oracle returned empty text, using fallback task', { category });
    } catch (error) {
      this.logger.warn('Task oracle failed, using fallback task', { category, error: errorMessage(error) });
    }
    return fallbackTask(category);
  }
}
