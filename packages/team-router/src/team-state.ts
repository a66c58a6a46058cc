/**
 * @module @crew-control/team-router/team-state
 * State threaded through one nested team run.
 */

import { createMessage, type RunMessage, type RunState } from '@crew-control/contracts';
import type { MemberNode } from './supervisor-router.js';

export interface WorkerOutput {
  worker: string;
  output: string;
  tokensUsed: number;
}

export interface TeamWorkState {
  /** Run aggregate; only improvement-team workers change it. */
  run: RunState;
  task: string;
  outputs: readonly WorkerOutput[];
  /** Team-local conversation shown to the team supervisor. */
  history: readonly RunMessage[];
}

export type Worker = MemberNode<TeamWorkState>;

export function startTeamWork(run: RunState, task: string): TeamWorkState {
  return { run, task, outputs: [], history: [] };
}

export function withOutput(
  state: TeamWorkState,
  worker: string,
  output: string,
  tokensUsed: number,
  timestamp: number
): TeamWorkState {
  return {
    ...state,
    outputs: [...state.outputs, { worker, output, tokensUsed }],
    history: [...state.history, createMessage('team', worker, 'team_output', output, timestamp)],
  };
}

/**
 * First worker, in declaration order, with nothing produced yet.
 */
export function nextIdleWorker(state: TeamWorkState, workers: readonly string[]): string | undefined {
  const produced = new Set(state.outputs.map((o) => o.worker));
  return workers.find((worker) => !produced.has(worker));
}

export function previousWork(state: TeamWorkState): string | undefined {
  if (state.outputs.length === 0) {
    return undefined;
  }
  return state.outputs.map((o) => `[${o.worker}]\n${o.output}`).join('\n\n');
}

const BULLET = /^[-*•]$/;

/** Whitespace-separated words; bare list markers are not words. */
export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0 && !BULLET.test(w)).length;
}
