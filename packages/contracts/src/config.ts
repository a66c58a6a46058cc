/**
 * @module @crew-control/contracts/config
 * Run configuration schema.
 *
 * Every key is optional in input; parsing fills the defaults below.
 */

import { z } from 'zod';
import { TEAM_NAMES, type TeamName } from './types.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_TASK_CATEGORIES = [
  'Research and report',
  'Market analysis',
  'Technical documentation',
  'Creative writing',
  'Data analysis',
  'Summarization',
] as const;

export const DEFAULT_PERFORMANCE_TARGETS: Readonly<Record<string, number>> = {
  avg_response_time: 10.0,
  success_rate: 0.95,
  response_quality: 0.8,
  task_completion_rate: 0.9,
};

export const LLMConfigSchema = z.object({
  provider: z.enum(['heuristic', 'openai', 'hybrid']).default('heuristic'),
  model: z.string().min(1).default('gpt-4o'),
  baseUrl: z.string().url().optional(),
  apiKeyEnv: z.string().min(1).default('OPENAI_API_KEY'),
  temperature: z.number().min(0).max(2).default(0.2),
});

export const WorkloadConfigSchema = z.object({
  dynamic: z.boolean().default(true),
  increaseProbability: z.number().min(0).max(1).default(0.3),
  maxMultiplier: z.number().min(1).default(2.0),
  defaultDeadlineMinutes: z.number().positive().default(30),
});

export const ResourcesConfigSchema = z.object({
  scaling: z.boolean().default(true),
  minAgents: z.number().int().positive().default(1),
  maxAgents: z.number().int().positive().default(3),
});

/**
 * Thresholds of the needs-improvement predicate.
 * The quality and success-rate sample sizes are kept apart on purpose.
 */
export const ImprovementThresholdsSchema = z.object({
  maxErrors: z.number().int().positive().default(3),
  minQualitySamples: z.number().int().positive().default(3),
  minAvgQuality: z.number().min(0).max(1).default(0.5),
  minAttemptsForSuccessRate: z.number().int().positive().default(5),
  minSuccessRate: z.number().min(0).max(1).default(0.7),
});

export const EscalationConfigSchema = z.object({
  lowQualityStreak: z.number().int().positive().default(3),
  missedDeadlines: z.number().int().positive().default(2),
});

export const CodeChangesConfigSchema = z.object({
  allow: z.boolean().default(true),
  maxPerCycle: z.number().int().positive().default(3),
  cooldownCycles: z.number().int().min(0).default(2),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  pretty: z.boolean().default(false),
});

export const RunConfigSchema = z
  .object({
    llm: LLMConfigSchema.default({}),
    enabledTeams: z.array(z.string()).min(1).default([...TEAM_NAMES]),
    workingDirectory: z.string().min(1).default('./.crew-workspace/docs'),
    sandboxDirectory: z.string().min(1).default('./.crew-workspace/sandbox'),
    recursionLimit: z.number().int().positive().default(100),
    maxCycles: z.number().int().positive().default(10),
    autoGenerateTasks: z.boolean().default(true),
    taskCategories: z.array(z.string().min(1)).min(1).default([...DEFAULT_TASK_CATEGORIES]),
    performanceTargets: z.record(z.number()).default({ ...DEFAULT_PERFORMANCE_TARGETS }),
    workload: WorkloadConfigSchema.default({}),
    resources: ResourcesConfigSchema.default({}),
    qualityThreshold: z.number().min(0).max(1).default(0.7),
    improvement: ImprovementThresholdsSchema.default({}),
    escalation: EscalationConfigSchema.default({}),
    codeChanges: CodeChangesConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .strict();

export type RunConfigInput = z.input<typeof RunConfigSchema>;
export type RunConfig = z.output<typeof RunConfigSchema>;
export type WorkloadConfig = z.output<typeof WorkloadConfigSchema>;
export type ResourcesConfig = z.output<typeof ResourcesConfigSchema>;
export type ImprovementThresholds = z.output<typeof ImprovementThresholdsSchema>;
export type EscalationConfig = z.output<typeof EscalationConfigSchema>;

/**
 * Validate raw configuration.
 *
 * @throws ConfigurationError on schema violations, unknown team names or
 *   inverted agent bounds
 */
export function parseRunConfig(raw: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    throw new ConfigurationError(`Invalid run configuration: ${issues.join('; ')}`, issues);
  }

  const config = parsed.data;
  const known: readonly string[] = TEAM_NAMES;
  const unknownTeams = config.enabledTeams.filter((team) => !known.includes(team));
  if (unknownTeams.length > 0) {
    throw new ConfigurationError(
      `Unknown team name(s) in enabledTeams: ${unknownTeams.join(', ')}. Known teams: ${TEAM_NAMES.join(', ')}`,
      unknownTeams.map((team) => `enabledTeams: unknown team "${team}"`)
    );
  }

  if (config.resources.minAgents > config.resources.maxAgents) {
    throw new ConfigurationError(
      `resources.minAgents (${config.resources.minAgents}) exceeds resources.maxAgents (${config.resources.maxAgents})`
    );
  }

  return config;
}

/**
 * Defaults, optionally overridden. Throws like {@link parseRunConfig}.
 */
export function createRunConfig(overrides: RunConfigInput = {}): RunConfig {
  return parseRunConfig(overrides);
}

/**
 * Enabled teams in canonical order.
 */
export function activeTeams(config: RunConfig): TeamName[] {
  return TEAM_NAMES.filter((team) => config.enabledTeams.includes(team));
}
