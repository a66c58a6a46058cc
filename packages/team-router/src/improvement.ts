/**
 * @module @crew-control/team-router/improvement
 * Improvement team workers.
 *
 * evaluator  - adds evaluation findings to the issue log, refreshes target values
 * code_agent - applies the pending resource request, or proposes fixes for
 *              open issues when code changes are allowed and out of cooldown
 */

import { randomUUID } from 'node:crypto';
import {
  appendMessages,
  createMessage,
  errorMessage,
  silentLogger,
  systemRuntime,
  type CodeChange,
  type CodeFixProposal,
  type ILogger,
  type Oracle,
  type RunConfig,
  type RunState,
  type Runtime,
  type SandboxExecutor,
} from '@crew-control/contracts';
import { observedValues, takeSnapshot, type EvaluationEngine } from '@crew-control/evaluation-engine';
import { updateTargetValues } from '@crew-control/metrics';
import type { ProgressReporter } from '@crew-control/progress-reporter';
import { applyResourceChange, buildMonitoringReport, latestRequest } from '@crew-control/resource-scaling';
import { runInSandbox } from '@crew-control/workspace-tools';
import { withOutput, type Worker } from './team-state.js';

export const IMPROVEMENT_WORKERS = ['evaluator', 'code_agent'] as const;

export type ImprovementWorker = (typeof IMPROVEMENT_WORKERS)[number];

export interface ImprovementWorkerDeps {
  oracle: Oracle;
  engine: EvaluationEngine;
  config: RunConfig;
  sandbox?: SandboxExecutor;
  runtime?: Runtime;
  logger?: ILogger;
  reporter?: ProgressReporter;
}

/**
 * Issues not yet covered by an applied code change, in log order.
 */
export function openIssues(state: RunState): string[] {
  const fixed = new Set(state.codeChanges.flatMap((change) => change.issuesFixed));
  return [...new Set(state.issuesIdentified)].filter((issue) => !fixed.has(issue));
}

export function inCodeChangeCooldown(state: RunState, cooldownCycles: number): boolean {
  return state.lastCodeChangeCycle !== undefined && state.cycle - state.lastCodeChangeCycle < cooldownCycles;
}

export function createImprovementWorkers(deps: ImprovementWorkerDeps): Record<ImprovementWorker, Worker> {
  const runtime = deps.runtime ?? systemRuntime;
  const logger = deps.logger ?? silentLogger;

  const evaluator: Worker = async (state) => {
    const run = state.run;
    const found = deps.engine.identifyIssues(run);
    const known = new Set(run.issuesIdentified);
    const added = found.filter((issue) => !known.has(issue));
    const teams = deps.engine.teamsNeedingImprovement(run);

    const parts = [
      'System evaluation:',
      `Records: ${run.records.length}`,
      `Teams needing improvement: ${teams.length > 0 ? teams.join(', ') : 'None'}`,
      `Missed deadlines: ${run.missedDeadlines}`,
    ];
    if (found.length > 0) {
      parts.push('', 'Issues:', ...found.map((issue) => `- ${issue}`));
    }
    const output = parts.join('\n');

    logger.info('Evaluation complete', { issues: found.length, newIssues: added.length });
    const now = runtime.now();
    return withOutput(
      {
        ...state,
        run: appendMessages(
          {
            ...run,
            issuesIdentified: [...run.issuesIdentified, ...added],
            performanceTargets: updateTargetValues(run.performanceTargets, observedValues(run)),
          },
          createMessage('team', 'evaluator', 'evaluation', output, now)
        ),
      },
      'evaluator',
      output,
      0,
      now
    );
  };

  const codeAgent: Worker = async (state) => {
    const request = latestRequest(state.run);
    if (request) {
      const now = runtime.now();
      const applied = applyResourceChange(state.run, request, now);
      const report = buildMonitoringReport(applied.state, applied.change);
      logger.info('Resource change applied', {
        team: applied.change.team,
        from: applied.change.previousAgents,
        to: applied.change.newAgents,
      });
      deps.reporter?.resourcesScaled(applied.change.team, applied.change.previousAgents, applied.change.newAgents);
      return withOutput(
        {
          ...state,
          run: appendMessages(applied.state, createMessage('team', 'code_agent', 'resource_report', report, now)),
        },
        'code_agent',
        report,
        0,
        now
      );
    }

    const { allow, maxPerCycle, cooldownCycles } = deps.config.codeChanges;
    if (!allow || inCodeChangeCooldown(state.run, cooldownCycles)) {
      const reason = allow
        ? `code changes are in cooldown until cycle ${(state.run.lastCodeChangeCycle ?? 0) + cooldownCycles}`
        : 'code changes are disabled';
      return withOutput(state, 'code_agent', `No changes applied: ${reason}.`, 0, runtime.now());
    }

    const issues = openIssues(state.run);
    if (issues.length === 0) {
      return withOutput(state, 'code_agent', 'No changes applied: no open issues.', 0, runtime.now());
    }

    const snapshot = takeSnapshot(state.run, runtime.now());
    let run = snapshot.state;

    let proposal: CodeFixProposal;
    try {
      proposal = await deps.oracle.proposeCodeFix({ issues, priorFixes: run.fixesImplemented });
    } catch (error) {
      logger.warn('Code fix oracle failed, no fixes applied', { error: errorMessage(error) });
      proposal = { narrative: `Code fix proposal failed: ${errorMessage(error)}`, fixes: [] };
    }

    const prior = new Set(run.fixesImplemented);
    const fixes = proposal.fixes.filter((fix) => !prior.has(fix)).slice(0, maxPerCycle);
    const parts = [proposal.narrative];

    let validated = true;
    if (fixes.length > 0 && proposal.code !== undefined && deps.sandbox) {
      const result = await runInSandbox(deps.sandbox, proposal.code, { issues });
      validated = result.success;
      parts.push('', validated ? 'Sandbox validation passed.' : `Sandbox validation failed: ${result.error ?? ''}`);
    }

    const now = runtime.now();
    if (fixes.length > 0 && validated) {
      const change: CodeChange = {
        changeId: randomUUID(),
        cycle: run.cycle,
        issuesFixed: issues,
        fixes,
        timestamp: now,
        baselineSnapshotId: snapshot.snapshot.snapshotId,
      };
      run = {
        ...run,
        codeChanges: [...run.codeChanges, change],
        fixesImplemented: [...run.fixesImplemented, ...fixes],
        lastCodeChangeCycle: run.cycle,
      };
      parts.push('', 'Fixes implemented:', ...fixes.map((fix) => `- ${fix}`));
      logger.info('Code change recorded', { changeId: change.changeId, fixes: fixes.length });
    }

    return withOutput({ ...state, run }, 'code_agent', parts.join('\n'), 0, now);
  };

  return { evaluator, code_agent: codeAgent };
}
