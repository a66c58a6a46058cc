/**
 * @module @crew-control/team-router
 * Hierarchical routing: a top-level supervisor over team nodes, each of
 * which runs its own supervisor over workers.
 */

export { SupervisorRouter } from './supervisor-router.js';
export type {
  MemberNode,
  RouteChoice,
  RouteDecision,
  RouteSource,
  RouterRunResult,
  RuleResult,
  SupervisorRouterOptions,
} from './supervisor-router.js';

export { startTeamWork, withOutput, nextIdleWorker, previousWork, countWords } from './team-state.js';
export type { TeamWorkState, Worker, WorkerOutput } from './team-state.js';

export { RESEARCH_WORKERS, WRITING_WORKERS, createResearchWorkers, createWritingWorkers, extractUrls } from './workers.js';
export type { ResearchWorker, WritingWorker, ResearchWorkerDeps, WritingWorkerDeps } from './workers.js';

export { IMPROVEMENT_WORKERS, createImprovementWorkers, openIssues, inCodeChangeCooldown } from './improvement.js';
export type { ImprovementWorker, ImprovementWorkerDeps } from './improvement.js';

export { createTeamNode, createTeamRouter } from './team-node.js';
export type { TeamNodeDeps } from './team-node.js';

export { TaskGenerator, fallbackTask } from './task-generator.js';
export type { TaskGeneratorOptions, GeneratedCycle } from './task-generator.js';

export { RunController } from './run-controller.js';
export type { RunControllerOptions, RunResult, RunTools } from './run-controller.js';
