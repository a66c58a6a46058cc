import { vi } from 'vitest';
import {
  createRunConfig,
  createRunState,
  type ILogger,
  type Oracle,
  type RunConfig,
  type RunConfigInput,
  type RunState,
  type Runtime,
} from '@crew-control/contracts';
import { GradingLoop } from '@crew-control/grading-loop';
import { WorkloadManager } from '@crew-control/workload-manager';

export const NOW = 1_700_000_000_000;

export const fixedRuntime: Runtime = { now: () => NOW, random: () => 0 };

export const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

export function createMockOracle(overrides: Partial<Oracle> = {}): Oracle {
  return {
    name: 'mock',
    grade: vi.fn().mockResolvedValue({ score: 0.8, comments: 'Looks fine', issues: [] }),
    route: vi.fn().mockResolvedValue('end'),
    generateTask: vi.fn().mockResolvedValue('Write a short brief'),
    work: vi.fn().mockResolvedValue({ output: 'worker output', tokensUsed: 10 }),
    review: vi.fn().mockResolvedValue({ score: 0.9, comments: 'Solid', strengths: [], areasForImprovement: [] }),
    proposeCodeFix: vi.fn().mockResolvedValue({ narrative: 'Nothing to do', fixes: [] }),
    synthesize: vi.fn().mockResolvedValue({ narrative: 'n', recommendations: [] }),
    ...overrides,
  };
}

/** Workload pressure off so tests only see routing and grading. */
export function quietConfig(overrides: RunConfigInput = {}): RunConfig {
  return createRunConfig({
    workload: { dynamic: false },
    resources: { scaling: false },
    taskCategories: ['Summarization'],
    ...overrides,
  });
}

export function createGrading(oracle: Oracle, config: RunConfig, logger: ILogger = createMockLogger()): GradingLoop {
  return new GradingLoop({
    oracle,
    config,
    runtime: fixedRuntime,
    logger,
    workload: new WorkloadManager({
      workload: config.workload,
      resources: config.resources,
      runtime: fixedRuntime,
      logger,
    }),
  });
}

export function taskState(config: RunConfig, overrides: Partial<RunState> = {}): RunState {
  return {
    ...createRunState(config, { runId: 'run-test' }),
    currentTask: { id: 'task-1', description: 'Summarize solar storage options', category: 'Summarization' },
    cycle: 1,
    generatedTaskCount: 1,
    ...overrides,
  };
}
