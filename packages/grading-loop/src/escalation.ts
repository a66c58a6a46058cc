/**
 * @module @crew-control/grading-loop/escalation
 * When graded output should hand control to the improvement team.
 */

import type { EscalationConfig, ResourceChangeRequest, RunState, TeamName } from '@crew-control/contracts';

export type EscalationReason = 'resource_request' | 'low_quality_streak' | 'missed_deadlines';

export interface EscalationDecision {
  team: TeamName;
  reasons: EscalationReason[];
  request?: ResourceChangeRequest;
  streak: number;
  missedDeadlines: number;
}

/** Feedback entries quoted in an improvement request. */
const FEEDBACK_WINDOW = 5;

export class EscalationPolicy {
  private readonly rules: EscalationConfig;

  constructor(rules: Partial<EscalationConfig> = {}) {
    this.rules = {
      lowQualityStreak: rules.lowQualityStreak ?? 3,
      missedDeadlines: rules.missedDeadlines ?? 2,
    };
  }

  /**
   * Checked in order: a pending resource request, a low-quality streak,
   * accumulated missed deadlines.
   */
  decide(state: RunState, team: TeamName, request?: ResourceChangeRequest): EscalationDecision | undefined {
    const streak = state.lowQualityStreaks[team];
    const reasons: EscalationReason[] = [];

    if (request) {
      reasons.push('resource_request');
    }
    if (streak >= this.rules.lowQualityStreak) {
      reasons.push('low_quality_streak');
    }
    if (state.missedDeadlines >= this.rules.missedDeadlines) {
      reasons.push('missed_deadlines');
    }

    if (reasons.length === 0) {
      return undefined;
    }
    return {
      team,
      reasons,
      streak,
      missedDeadlines: state.missedDeadlines,
      ...(request ? { request } : {}),
    };
  }

  /**
   * Message for the improvement team. A resource request takes precedence
   * over quality and deadline reasons.
   */
  buildMessage(state: RunState, decision: EscalationDecision, issues: readonly string[]): string {
    const parts: string[] = [];
    const { request, team } = decision;

    if (request) {
      parts.push('RESOURCE SCALING REQUEST');
      parts.push('');
      parts.push(`Team: ${request.team}`);
      parts.push(`Current agents: ${request.currentAgents}`);
      parts.push(`Recommended agents: ${request.recommendedAgents}`);
      parts.push(`Reason: ${request.reason}`);
      parts.push('');
      parts.push('Recent performance issues:');
      parts.push(...bullets(issues));
      parts.push('');
      parts.push('Please analyze the current resource allocation and implement the recommended changes.');
      parts.push('After implementation, monitor performance to confirm the change resolved the issues.');
      return parts.join('\n');
    }

    parts.push('IMPROVEMENT REQUEST');
    parts.push('');
    if (decision.reasons.includes('low_quality_streak')) {
      parts.push(`The ${team} team has produced low-quality output ${decision.streak} times consecutively.`);
    }
    if (decision.reasons.includes('missed_deadlines')) {
      parts.push(`The system has missed ${decision.missedDeadlines} deadlines recently.`);
    }
    parts.push('');
    parts.push('Recent issues:');
    parts.push(...bullets(issues));
    parts.push('');
    parts.push('Previous feedback:');
    parts.push(...bullets(state.supervisorFeedback[team].slice(-FEEDBACK_WINDOW)));
    parts.push('');
    parts.push(`Please analyze these issues and implement improvements to enhance the ${team} team's performance.`);
    parts.push('Focus on the recurring problems, efficiency and meeting deadlines.');
    return parts.join('\n');
  }
}

function bullets(items: readonly string[]): string[] {
  return items.map((item) => `- ${item}`);
}
