/**
 * @module @crew-control/workload-manager/workload-manager
 * Supervisor pressure applied before grading: bigger tasks, deadlines, and
 * requests for more agents when deadlines keep slipping.
 */

import {
  appendMessages,
  createMessage,
  formatClockTime,
  silentLogger,
  systemRuntime,
  uniform,
  type ILogger,
  type ResourceChangeRequest,
  type ResourcesConfig,
  type RunState,
  type Runtime,
  type TeamName,
  type WorkloadConfig,
} from '@crew-control/contracts';
import { deadlineMet, recentRecords } from '@crew-control/metrics';

/** Records considered when looking for resource pressure. */
export const RESOURCE_WINDOW = 10;

export interface WorkloadThresholds {
  /** Miss rate at or above which capacity is questioned. */
  missRate: number;
  /** Average quality at or below which capacity is questioned. */
  quality: number;
}

export interface WorkloadManagerOptions {
  workload: WorkloadConfig;
  resources: Pick<ResourcesConfig, 'scaling'>;
  thresholds?: Partial<WorkloadThresholds>;
  runtime?: Runtime;
  logger?: ILogger;
}

export interface WorkloadChange {
  changed: boolean;
  sizeMultiplier: number;
}

export class WorkloadManager {
  private readonly workload: WorkloadConfig;
  private readonly scaling: boolean;
  private readonly thresholds: WorkloadThresholds;
  private readonly runtime: Runtime;
  private readonly logger: ILogger;

  constructor(options: WorkloadManagerOptions) {
    this.workload = options.workload;
    this.scaling = options.resources.scaling;
    this.thresholds = {
      missRate: options.thresholds?.missRate ?? 0.2,
      quality: options.thresholds?.quality ?? 0.7,
    };
    this.runtime = options.runtime ?? systemRuntime;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Possibly grow the task size multiplier by 0.2–0.5, capped and rounded
   * to one decimal.
   */
  maybeIncreaseWorkload(state: RunState): WorkloadChange {
    const current = state.taskSizeMultiplier;
    const unchanged: WorkloadChange = { changed: false, sizeMultiplier: current };

    if (!this.workload.dynamic) {
      return unchanged;
    }
    if (this.runtime.random() > this.workload.increaseProbability) {
      return unchanged;
    }
    if (current >= this.workload.maxMultiplier) {
      return unchanged;
    }

    const grown = Math.min(this.workload.maxMultiplier, current + uniform(this.runtime.random, 0.2, 0.5));
    return { changed: true, sizeMultiplier: Math.round(grown * 10) / 10 };
  }

  /**
   * `now + defaultDeadlineMinutes × 60s × taskSize × U(0.9, 1.1)`.
   */
  computeDeadline(taskSize: number): number {
    const baseMs = this.workload.defaultDeadlineMinutes * 60 * 1000;
    const jitter = uniform(this.runtime.random, 0.9, 1.1);
    return this.runtime.now() + baseMs * taskSize * jitter;
  }

  /**
   * Request one more agent for the team with the most missed deadlines in
   * the recent window, unless things look healthy or the team is at its cap.
   */
  evaluateResourceNeed(state: RunState): ResourceChangeRequest | undefined {
    if (!this.scaling) {
      return undefined;
    }

    const window = recentRecords(state.records, RESOURCE_WINDOW);
    if (window.length === 0) {
      return undefined;
    }

    const missed = window.filter((record) => !deadlineMet(record));
    const missRate = missed.length / window.length;
    const avgQuality = window.reduce((sum, record) => sum + record.quality, 0) / window.length;

    if (missRate < this.thresholds.missRate && avgQuality > this.thresholds.quality) {
      return undefined;
    }

    const team = mostMissed(missed.map((record) => record.team));
    if (!team) {
      return undefined;
    }

    const resources = state.resources[team];
    if (resources.currentAgents >= resources.maxAgents) {
      this.logger.debug('Resource request suppressed, team at max agents', {
        team,
        currentAgents: resources.currentAgents,
      });
      return undefined;
    }

    return {
      team,
      currentAgents: resources.currentAgents,
      recommendedAgents: resources.currentAgents + 1,
      reason: `High deadline miss rate (${(missRate * 100).toFixed(1)}%) for team ${team}`,
      timestamp: this.runtime.now(),
    };
  }

  /**
   * Workload increase, then deadline (only when none is set), then resource
   * need. Each change that fires leaves a notice in the message log.
   */
  applyAdjustments(state: RunState): RunState {
    if (!state.currentTask) {
      return state;
    }

    let next = state;
    const now = this.runtime.now();

    const workload = this.maybeIncreaseWorkload(next);
    if (workload.changed) {
      next = appendMessages(
        { ...next, taskSizeMultiplier: workload.sizeMultiplier },
        createMessage(
          'system',
          'supervisor',
          'notice',
          `NOTICE: Supervisor has increased the workload. Task size is now ${workload.sizeMultiplier.toFixed(1)}x standard.`,
          now
        )
      );
      this.logger.info('Workload increased', { sizeMultiplier: workload.sizeMultiplier });
    }

    if (next.deadline === undefined) {
      const deadline = this.computeDeadline(next.taskSizeMultiplier);
      next = appendMessages(
        { ...next, deadline },
        createMessage(
          'system',
          'supervisor',
          'deadline',
          `DEADLINE: This task must be completed by ${formatClockTime(deadline)}.`,
          now
        )
      );
      this.logger.debug('Deadline assigned', { deadline, taskSize: next.taskSizeMultiplier });
    }

    const request = this.evaluateResourceNeed(next);
    if (request) {
      next = recordRequest(next, request);
      this.logger.info('Resource request raised', {
        team: request.team,
        from: request.currentAgents,
        to: request.recommendedAgents,
      });

      if (next.pendingRoute === undefined) {
        next = appendMessages(
          { ...next, pendingRoute: 'juno_team' },
          createMessage(
            'system',
            'supervisor',
            'resource_request',
            `RESOURCE REQUEST: Team ${request.team} requires additional resources. ` +
              `Recommendation: increase from ${request.currentAgents} to ${request.recommendedAgents} agents. ` +
              `Reason: ${request.reason}`,
            now
          )
        );
      }
    }

    return next;
  }
}

/**
 * Team with the most entries; ties go to the first seen.
 */
function mostMissed(teams: readonly TeamName[]): TeamName | undefined {
  const counts = new Map<TeamName, number>();
  for (const team of teams) {
    counts.set(team, (counts.get(team) ?? 0) + 1);
  }

  let best: TeamName | undefined;
  let bestCount = 0;
  for (const [team, count] of counts) {
    if (count > bestCount) {
      best = team;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Outstanding requests hold at most one entry per team; a newer request
 * replaces the older one.
 */
function recordRequest(state: RunState, request: ResourceChangeRequest): RunState {
  return {
    ...state,
    resourceRequests: [...state.resourceRequests.filter((r) => r.team !== request.team), request],
  };
}
