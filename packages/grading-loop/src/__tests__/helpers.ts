import { vi } from 'vitest';
import {
  createRunConfig,
  createRunState,
  type ILogger,
  type Oracle,
  type RunConfigInput,
  type RunState,
} from '@crew-control/contracts';
import { createTaskRecord } from '@crew-control/metrics';
import { WorkloadManager } from '@crew-control/workload-manager';
import { GradingLoop } from '../grading-loop.js';

export const NOW = 1_700_000_000_000;

export const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

export function createMockOracle(score = 0.8): Oracle {
  return {
    name: 'mock',
    grade: vi.fn().mockResolvedValue({ score, comments: 'Looks fine', issues: [] }),
    route: vi.fn().mockResolvedValue('end'),
    generateTask: vi.fn().mockResolvedValue('Write a short brief'),
    work: vi.fn().mockResolvedValue({ output: 'output', tokensUsed: 10 }),
    review: vi.fn().mockResolvedValue({ score: 0.9, comments: 'Solid', strengths: ['clear'], areasForImprovement: [] }),
    proposeCodeFix: vi.fn().mockResolvedValue({ narrative: 'n', fixes: [] }),
    synthesize: vi.fn().mockResolvedValue({ narrative: 'n', recommendations: [] }),
  };
}

/** Workload pressure off so tests only see grading effects. */
export const QUIET_CONFIG: RunConfigInput = {
  workload: { dynamic: false },
  resources: { scaling: false },
};

export function createLoop(oracle: Oracle, overrides: RunConfigInput = {}): GradingLoop {
  const config = createRunConfig({ ...QUIET_CONFIG, ...overrides });
  const runtime = { now: () => NOW, random: () => 0.5 };
  const logger = createMockLogger();
  return new GradingLoop({
    oracle,
    config,
    runtime,
    logger,
    workload: new WorkloadManager({ workload: config.workload, resources: config.resources, runtime, logger }),
  });
}

export function taskState(overrides: Partial<RunState> = {}): RunState {
  return {
    ...createRunState(createRunConfig(), { runId: 'run-test' }),
    currentTask: { id: 'task-1', description: 'Draft a product FAQ', category: 'Technical documentation' },
    ...overrides,
  };
}

export function teamRecord(team: 'research' | 'writing', recordId = `${team}-1`) {
  return createTaskRecord({
    recordId,
    taskId: 'task-1',
    team,
    agent: `${team}_team`,
    description: 'Draft a product FAQ',
    startedAt: NOW - 2_000,
    endedAt: NOW,
    success: true,
  });
}
