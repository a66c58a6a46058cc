/**
 * @module @crew-control/progress-reporter/reporter
 * Progress reporter for control runs.
 *
 * UX-only component - events are NOT visible to the router or grading logic.
 * Used for live feedback in the CLI or any other surface given a callback.
 */

import type { ILogger, StopReason, TeamName } from '@crew-control/contracts';
import type { ProgressEvent, ProgressCallback } from './types.js';

const TEAM_EVENT = {
  started: 'team_started',
  completed: 'team_completed',
  failed: 'team_failed',
} as const;

const TEAM_EMOJI: Readonly<Record<TeamName, string>> = {
  research: '🔎',
  writing: '✍️',
  juno: '🛠️',
};

/**
 * Progress reporter - emits UX-only progress events.
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter(logger, (event) => {
 *   process.stdout.write(JSON.stringify(event) + '\n');
 * });
 *
 * reporter.cycleStarted(1, 'Summarize battery storage options');
 * reporter.team('research', 'started');
 * reporter.team('research', 'completed', { durationMs: 1200 });
 * reporter.graded('research', 0.82, true);
 * reporter.complete('max_cycles', 1);
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];
  private startTime: number | undefined;

  constructor(
    private logger: ILogger,
    private onProgress?: ProgressCallback,
    private now: () => number = Date.now
  ) {}

  /**
   * Report the start of a cycle. The first call also starts the run clock.
   */
  cycleStarted(cycle: number, task: string): void {
    const timestamp = this.now();
    this.startTime ??= timestamp;
    this.emit({ type: 'cycle_started', timestamp, data: { cycle, task } });
    this.logger.info(`🎯 Cycle ${cycle}: ${task}`);
  }

  /**
   * Report team status.
   */
  team(
    team: TeamName,
    status: 'started' | 'completed' | 'failed',
    data?: { durationMs?: number; error?: string }
  ): void {
    this.emit({
      type: TEAM_EVENT[status],
      timestamp: this.now(),
      data: { team, ...data },
    });

    const emoji = TEAM_EMOJI[team];
    switch (status) {
      case 'started':
        this.logger.info(`${emoji} ${team} team started`);
        break;
      case 'completed':
        this.logger.info(`✓ ${team} team completed${formatDuration(data?.durationMs)}`);
        break;
      case 'failed':
        this.logger.warn(`✗ ${team} team failed: ${data?.error ?? 'unknown error'}`);
        break;
    }
  }

  graded(team: TeamName, score: number, deadlineMet: boolean): void {
    this.emit({ type: 'team_graded', timestamp: this.now(), data: { team, score, deadlineMet } });
    this.logger.info(`📝 ${team} graded ${score.toFixed(2)}${deadlineMet ? '' : ' (deadline missed)'}`);
  }

  escalated(team: TeamName, reasons: readonly string[]): void {
    this.emit({ type: 'escalated', timestamp: this.now(), data: { team, reasons: [...reasons] } });
    this.logger.info(`⚠️  Escalating ${team} to improvement team: ${reasons.join(', ')}`);
  }

  resourcesScaled(team: TeamName, fromAgents: number, toAgents: number): void {
    this.emit({ type: 'resources_scaled', timestamp: this.now(), data: { team, fromAgents, toAgents } });
    this.logger.info(`📈 ${team} team scaled ${fromAgents} → ${toAgents} agents`);
  }

  /**
   * Report run completion.
   */
  complete(stopReason: StopReason, cycles: number): void {
    const timestamp = this.now();
    const totalDuration = timestamp - (this.startTime ?? timestamp);
    const emoji = stopReason === 'recursion_limit' ? '❌' : '✅';

    this.emit({ type: 'run_completed', timestamp, data: { stopReason, cycles, totalDuration } });
    this.logger.info(`${emoji} Run finished (${stopReason}) after ${cycles} cycle(s) in ${(totalDuration / 1000).toFixed(1)}s`);
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
    this.startTime = undefined;
  }

  /**
   * Emit event to callback and store in history.
   */
  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (this.onProgress) {
      this.onProgress(event);
    }
  }
}

function formatDuration(durationMs: number | undefined): string {
  return durationMs === undefined ? '' : ` in ${(durationMs / 1000).toFixed(1)}s`;
}
