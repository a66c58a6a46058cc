/**
 * @module @crew-control/contracts/run-state
 * Construction and small functional updates of the run aggregate.
 */

import { randomUUID } from 'node:crypto';
import type { RunConfig } from './config.js';
import {
  type MessageKind,
  type MessageRole,
  type PerTeam,
  type RunMessage,
  type RunState,
  type TeamName,
} from './types.js';

export interface RunStateOptions {
  runId?: string;
  /** Per-team agent count override; clamped to the configured bounds. */
  initialAgents?: Partial<Record<TeamName, number>>;
}

function perTeam<T>(factory: (team: TeamName) => T): PerTeam<T> {
  return {
    research: factory('research'),
    writing: factory('writing'),
    juno: factory('juno'),
  };
}

/**
 * Fresh run aggregate with configuration defaults.
 *
 * Performance targets start empty; the task generator fills them when the
 * first task is created.
 */
export function createRunState(config: RunConfig, options: RunStateOptions = {}): RunState {
  const { minAgents, maxAgents } = config.resources;

  return {
    runId: options.runId ?? randomUUID(),
    messages: [],
    taskSizeMultiplier: 1.0,
    gradedTeams: [],
    completedTasks: [],
    generatedTaskCount: 0,
    cycle: 0,
    lowQualityStreaks: perTeam(() => 0),
    missedDeadlines: 0,
    records: [],
    performanceTargets: {},
    performance: perTeam((team) => ({
      team,
      qualityScores: [],
      successCount: 0,
      errorCount: 0,
      totalTimeMs: 0,
    })),
    resources: perTeam((team) => ({
      team,
      currentAgents: Math.min(maxAgents, Math.max(minAgents, options.initialAgents?.[team] ?? minAgents)),
      minAgents,
      maxAgents,
      scalingFactor: 1.0,
    })),
    resourceRequests: [],
    resourceChanges: [],
    issuesIdentified: [],
    fixesImplemented: [],
    codeChanges: [],
    evaluationSnapshots: [],
    reviewScores: {},
    reviewComments: {},
    teamResults: {},
    supervisorFeedback: perTeam(() => []),
  };
}

export function createMessage(
  role: MessageRole,
  name: string,
  kind: MessageKind,
  content: string,
  timestamp: number = Date.now()
): RunMessage {
  return { role, name, kind, content, timestamp };
}

export function appendMessages(state: RunState, ...messages: RunMessage[]): RunState {
  if (messages.length === 0) {
    return state;
  }
  return { ...state, messages: [...state.messages, ...messages] };
}

/**
 * Replace a single team's entry in a per-team map.
 */
export function withTeam<T>(map: PerTeam<T>, team: TeamName, value: T): PerTeam<T> {
  return { ...map, [team]: value };
}

/**
 * Messages written since the current task was announced.
 */
export function messagesForCurrentTask(state: RunState): readonly RunMessage[] {
  let start = 0;
  for (let i = state.messages.length - 1; i >= 0; i--) {
    if (state.messages[i]?.kind === 'task') {
      start = i;
      break;
    }
  }
  return state.messages.slice(start);
}
