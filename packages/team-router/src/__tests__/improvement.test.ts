import { describe, it, expect, vi } from 'vitest';
import type { CodeChange, Oracle, RunConfig, RunState, SandboxExecutor } from '@crew-control/contracts';
import { EvaluationEngine } from '@crew-control/evaluation-engine';
import { ProgressReporter } from '@crew-control/progress-reporter';
import { createImprovementWorkers, inCodeChangeCooldown, openIssues } from '../improvement.js';
import { startTeamWork } from '../team-state.js';
import { NOW, createMockLogger, createMockOracle, fixedRuntime, quietConfig, taskState } from './helpers.js';

function change(issuesFixed: string[]): CodeChange {
  return { changeId: 'c-1', cycle: 1, issuesFixed, fixes: ['f'], timestamp: NOW };
}

function workers(oracle: Oracle, config: RunConfig, extra: { sandbox?: SandboxExecutor; reporter?: ProgressReporter } = {}) {
  const engine = new EvaluationEngine({ oracle, thresholds: config.improvement, runtime: fixedRuntime });
  return createImprovementWorkers({ oracle, engine, config, runtime: fixedRuntime, ...extra });
}

const lastOutput = (state: { outputs: readonly { output: string }[] }) => state.outputs.at(-1)?.output;

describe('openIssues', () => {
  it('drops duplicates and issues an applied change already covered', () => {
    const state = taskState(quietConfig(), {
      issuesIdentified: ['slow search', 'thin drafts', 'slow search', 'late output'],
      codeChanges: [change(['thin drafts'])],
    });

    expect(openIssues(state)).toEqual(['slow search', 'late output']);
  });
});

describe('inCodeChangeCooldown', () => {
  it('counts cycles since the last code change', () => {
    const state = taskState(quietConfig(), { lastCodeChangeCycle: 2 });

    expect(inCodeChangeCooldown({ ...state, cycle: 3 }, 2)).toBe(true);
    expect(inCodeChangeCooldown({ ...state, cycle: 4 }, 2)).toBe(false);
    expect(inCodeChangeCooldown(taskState(quietConfig()), 2)).toBe(false);
  });
});

describe('evaluator', () => {
  it('logs only new issues and writes an evaluation message', async () => {
    const config = quietConfig();
    const base = taskState(config);
    const run: RunState = {
      ...base,
      issuesIdentified: ['earlier issue'],
      performance: { ...base.performance, research: { ...base.performance.research, errorCount: 3 } },
    };

    const result = await workers(createMockOracle(), config).evaluator(startTeamWork(run, 'task'));

    const issue = 'Team research needs improvement: avg quality 0.00, success rate 0.00, errors 3';
    expect(result.run.issuesIdentified).toEqual(['earlier issue', issue]);
    expect(lastOutput(result)).toBe(
      [
        'System evaluation:',
        'Records: 0',
        'Teams needing improvement: research',
        'Missed deadlines: 0',
        '',
        'Issues:',
        `- ${issue}`,
      ].join('\n')
    );
    expect(result.run.messages.at(-1)).toMatchObject({ name: 'evaluator', kind: 'evaluation' });
  });
});

describe('code_agent', () => {
  it('applies a pending resource request before anything else', async () => {
    const config = quietConfig();
    const oracle = createMockOracle();
    const reporter = new ProgressReporter(createMockLogger(), undefined, () => NOW);
    const run = taskState(config, {
      issuesIdentified: ['slow search'],
      resourceRequests: [
        { team: 'research', currentAgents: 1, recommendedAgents: 2, reason: 'Backlog', timestamp: NOW },
      ],
    });

    const result = await workers(oracle, config, { reporter }).code_agent(startTeamWork(run, 'task'));

    expect(result.run.resources.research.currentAgents).toBe(2);
    expect(result.run.resourceRequests).toEqual([]);
    expect(result.run.resourceChanges).toEqual([
      { team: 'research', previousAgents: 1, newAgents: 2, reason: 'Backlog', appliedAt: NOW },
    ]);
    expect(result.run.messages.at(-1)?.kind).toBe('resource_report');
    expect(reporter.getEvents()).toEqual([
      { type: 'resources_scaled', timestamp: NOW, data: { team: 'research', fromAgents: 1, toAgents: 2 } },
    ]);
    expect(oracle.proposeCodeFix).not.toHaveBeenCalled();
  });

  it('does nothing while code changes are disabled', async () => {
    const config = quietConfig({ codeChanges: { allow: false } });
    const run = taskState(config, { issuesIdentified: ['slow search'] });

    const result = await workers(createMockOracle(), config).code_agent(startTeamWork(run, 'task'));

    expect(lastOutput(result)).toBe('No changes applied: code changes are disabled.');
  });

  it('waits out the cooldown', async () => {
    const config = quietConfig({ codeChanges: { cooldownCycles: 2 } });
    const run = taskState(config, { issuesIdentified: ['slow search'], cycle: 2, lastCodeChangeCycle: 1 });

    const result = await workers(createMockOracle(), config).code_agent(startTeamWork(run, 'task'));

    expect(lastOutput(result)).toBe('No changes applied: code changes are in cooldown until cycle 3.');
  });

  it('reports when there is nothing to fix', async () => {
    const config = quietConfig();
    const oracle = createMockOracle();

    const result = await workers(oracle, config).code_agent(startTeamWork(taskState(config), 'task'));

    expect(lastOutput(result)).toBe('No changes applied: no open issues.');
    expect(oracle.proposeCodeFix).not.toHaveBeenCalled();
  });

  it('records at most the configured number of new fixes against a snapshot', async () => {
    const config = quietConfig({ codeChanges: { maxPerCycle: 2 } });
    const oracle = createMockOracle({
      proposeCodeFix: vi.fn().mockResolvedValue({
        narrative: 'Tightened the prompts.',
        fixes: ['already done', 'shorter prompts', 'retry search', 'cache pages'],
      }),
    });
    const run = taskState(config, { issuesIdentified: ['slow search', 'thin drafts'], fixesImplemented: ['already done'] });

    const result = await workers(oracle, config).code_agent(startTeamWork(run, 'task'));

    expect(oracle.proposeCodeFix).toHaveBeenCalledWith({
      issues: ['slow search', 'thin drafts'],
      priorFixes: ['already done'],
    });
    expect(result.run.fixesImplemented).toEqual(['already done', 'shorter prompts', 'retry search']);
    expect(result.run.evaluationSnapshots).toHaveLength(1);
    expect(result.run.codeChanges).toEqual([
      {
        changeId: expect.any(String),
        cycle: 1,
        issuesFixed: ['slow search', 'thin drafts'],
        fixes: ['shorter prompts', 'retry search'],
        timestamp: NOW,
        baselineSnapshotId: result.run.evaluationSnapshots[0]?.snapshotId,
      },
    ]);
    expect(result.run.lastCodeChangeCycle).toBe(1);
    expect(lastOutput(result)).toBe('Tightened the prompts.\n\nFixes implemented:\n- shorter prompts\n- retry search');
  });

  it('keeps the fixes out when sandbox validation fails', async () => {
    const config = quietConfig();
    const oracle = createMockOracle({
      proposeCodeFix: vi.fn().mockResolvedValue({ narrative: 'Patch.', fixes: ['retry search'], code: 'retry(' }),
    });
    const sandbox: SandboxExecutor = {
      submit: vi.fn().mockResolvedValue({ stdout: '', stderr: 'SyntaxError: unexpected end', resultBindings: {} }),
    };
    const run = taskState(config, { issuesIdentified: ['slow search'] });

    const result = await workers(oracle, config, { sandbox }).code_agent(startTeamWork(run, 'task'));

    expect(sandbox.submit).toHaveBeenCalledWith('retry(', { issues: ['slow search'] });
    expect(result.run.codeChanges).toEqual([]);
    expect(result.run.fixesImplemented).toEqual([]);
    expect(lastOutput(result)?.split('\n')[2]).toMatch(/^Sandbox validation failed: SANDBOX_ERROR/);
  });

  it('carries on without fixes when the oracle fails', async () => {
    const config = quietConfig();
    const oracle = createMockOracle({ proposeCodeFix: vi.fn().mockRejectedValue(new Error('timeout')) });
    const run = taskState(config, { issuesIdentified: ['slow search'] });

    const result = await workers(oracle, config).code_agent(startTeamWork(run, 'task'));

    expect(lastOutput(result)).toBe('Code fix proposal failed: timeout');
    expect(result.run.codeChanges).toEqual([]);
  });
});
