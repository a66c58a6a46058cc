/**
 * @module @crew-control/contracts/types
 * Data model shared by every control component.
 *
 * All timestamps are epoch milliseconds. Aggregates are read-only values:
 * components return new versions instead of mutating.
 */

// ═══════════════════════════════════════════════════════════════════════════
// Teams and nodes
// ═══════════════════════════════════════════════════════════════════════════

export const TEAM_NAMES = ['research', 'writing', 'juno'] as const;

export type TeamName = (typeof TEAM_NAMES)[number];

/** Teams that produce graded output for a task. */
export const WORKER_TEAMS = ['research', 'writing'] as const satisfies readonly TeamName[];

export type WorkerTeam = (typeof WORKER_TEAMS)[number];

/** The self-improvement team. */
export const IMPROVEMENT_TEAM = 'juno' satisfies TeamName;

export const TOP_LEVEL_NODES = ['research_team', 'writing_team', 'juno_team', 'task_generator'] as const;

export type TopLevelNode = (typeof TOP_LEVEL_NODES)[number];

export const END = 'end';

export type RouteTarget = TopLevelNode | typeof END;

export function teamNode(team: TeamName): TopLevelNode {
  switch (team) {
    case 'research':
      return 'research_team';
    case 'writing':
      return 'writing_team';
    case 'juno':
      return 'juno_team';
  }
}

export function isTeamName(value: string): value is TeamName {
  return (TEAM_NAMES as readonly string[]).includes(value);
}

export function isWorkerTeam(team: TeamName): team is WorkerTeam {
  return (WORKER_TEAMS as readonly string[]).includes(team);
}

// ═══════════════════════════════════════════════════════════════════════════
// Records
// ═══════════════════════════════════════════════════════════════════════════

/**
 * One team/agent attempt at a unit of work.
 *
 * Immutable once created, except for a single quality patch applied by grading
 * (`reviewed` flips to true when that happens).
 */
export interface TaskExecutionRecord {
  readonly recordId: string;
  readonly taskId: string;
  readonly team: TeamName;
  readonly agent: string;
  readonly description: string;
  readonly startedAt: number;
  readonly endedAt: number;
  readonly deadline?: number;
  readonly success: boolean;
  readonly error?: string;
  /** In [0, 1]. */
  readonly quality: number;
  /** Relative size, 1.0 = standard. */
  readonly taskSize: number;
  readonly tokensUsed: number;
  /** Agents the team held when this record was created. */
  readonly agentCount: number;
  readonly reviewed: boolean;
}

export interface PerformanceTarget {
  readonly metric: string;
  readonly target: number;
  readonly current: number;
  readonly description: string;
}

export interface AgentPerformanceRecord {
  readonly team: TeamName;
  readonly qualityScores: readonly number[];
  readonly successCount: number;
  readonly errorCount: number;
  readonly totalTimeMs: number;
}

export interface ResourceConfig {
  readonly team: TeamName;
  readonly currentAgents: number;
  readonly minAgents: number;
  readonly maxAgents: number;
  readonly scalingFactor: number;
}

export interface ResourceChangeRequest {
  readonly team: TeamName;
  readonly currentAgents: number;
  readonly recommendedAgents: number;
  readonly reason: string;
  readonly timestamp: number;
}

/** An applied capacity change. */
export interface ResourceChange {
  readonly team: TeamName;
  readonly previousAgents: number;
  readonly newAgents: number;
  readonly reason: string;
  readonly appliedAt: number;
}

export interface CodeChange {
  readonly changeId: string;
  readonly cycle: number;
  readonly issuesFixed: readonly string[];
  readonly fixes: readonly string[];
  readonly timestamp: number;
  readonly baselineSnapshotId?: string;
}

export interface EvaluationSnapshot {
  readonly snapshotId: string;
  readonly timestamp: number;
  readonly overallScore: number;
  readonly successRate: number;
  readonly avgQuality: number;
  readonly deadlineMetRate: number;
  readonly avgTaskSize: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// Messages
// ═══════════════════════════════════════════════════════════════════════════

export type MessageRole = 'system' | 'supervisor' | 'team' | 'reviewer' | 'user';

export type MessageKind =
  | 'task'
  | 'notice'
  | 'deadline'
  | 'resource_request'
  | 'feedback'
  | 'improvement_request'
  | 'review'
  | 'team_output'
  | 'team_error'
  | 'resource_report'
  | 'evaluation'
  | 'cycle_limit';

export interface RunMessage {
  readonly role: MessageRole;
  /** Node or team that wrote the message. */
  readonly name: string;
  readonly kind: MessageKind;
  readonly content: string;
  readonly timestamp: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// Run state
// ═══════════════════════════════════════════════════════════════════════════

export interface TaskDescriptor {
  readonly id: string;
  readonly description: string;
  readonly category: string;
}

export type PerTeam<T> = Readonly<Record<TeamName, T>>;

/**
 * The run aggregate threaded through every call.
 */
export interface RunState {
  readonly runId: string;
  readonly messages: readonly RunMessage[];

  readonly currentTask?: TaskDescriptor;
  readonly deadline?: number;
  readonly taskSizeMultiplier: number;
  /** Worker teams graded for the current task. */
  readonly gradedTeams: readonly WorkerTeam[];
  readonly completedTasks: readonly string[];
  readonly generatedTaskCount: number;
  readonly cycle: number;

  readonly pendingRoute?: RouteTarget;
  readonly lastImprovementCycle?: number;
  readonly lastCodeChangeCycle?: number;

  readonly lowQualityStreaks: PerTeam<number>;
  readonly missedDeadlines: number;

  readonly records: readonly TaskExecutionRecord[];
  readonly performanceTargets: Readonly<Record<string, PerformanceTarget>>;
  readonly performance: PerTeam<AgentPerformanceRecord>;
  readonly resources: PerTeam<ResourceConfig>;
  readonly resourceRequests: readonly ResourceChangeRequest[];
  readonly resourceChanges: readonly ResourceChange[];

  readonly issuesIdentified: readonly string[];
  readonly fixesImplemented: readonly string[];
  readonly codeChanges: readonly CodeChange[];
  readonly evaluationSnapshots: readonly EvaluationSnapshot[];

  /** Keyed by task description. */
  readonly reviewScores: Readonly<Record<string, number>>;
  readonly reviewComments: Readonly<Record<string, string>>;

  readonly teamResults: Readonly<Partial<Record<TeamName, string>>>;
  readonly supervisorFeedback: PerTeam<readonly string[]>;
}

export type StopReason = 'end' | 'max_cycles' | 'awaiting_input' | 'recursion_limit';
