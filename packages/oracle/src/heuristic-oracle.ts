/**
 * @module @crew-control/oracle/heuristic-oracle
 * Deterministic, offline oracle.
 *
 * Scores by keyword coverage and length, routes by which members have not
 * produced output yet. Free to run and repeatable; used in tests, for dry
 * runs, and as the first stage of the hybrid oracle.
 */

import type {
  CodeFixProposal,
  CodeFixRequest,
  GradeRequest,
  GradeResult,
  Oracle,
  ReviewRequest,
  ReviewResult,
  RouteRequest,
  SynthesisRequest,
  SynthesisResult,
  TaskRequest,
  WorkRequest,
  WorkResult,
} from '@crew-control/contracts';

export interface HeuristicAssessment {
  score: number;
  coverage: number;
  wordCount: number;
  missingTerms: string[];
  confidence: 'high' | 'low';
}

export interface HeuristicOracleOptions {
  /** Word count at which the length component saturates. */
  targetWords?: number;
  /** Fixes proposed per request. */
  maxFixes?: number;
}

const STOP_WORDS = new Set([
  'about', 'after', 'and', 'for', 'from', 'into', 'that', 'the', 'their', 'this', 'with', 'write', 'short',
]);

/** Nodes the heuristic never picks on its own. */
const NEVER_ROUTED = new Set(['juno_team', 'task_generator', 'end']);

const TOPICS = [
  'battery storage for small solar installations',
  'onboarding practices for remote engineering teams',
  'urban bike-sharing adoption',
  'caching strategies for read-heavy web services',
  'community library digitisation projects',
  'supply planning for seasonal retail',
  'accessibility audits for public websites',
  'water usage in vertical farming',
];

const CATEGORY_TEMPLATES: Readonly<Record<string, string>> = {
  'Research and report': 'Research {topic} and write a short report on the main findings.',
  'Market analysis': 'Analyse the market for {topic}, covering demand, competitors and risks.',
  'Technical documentation': 'Write technical documentation explaining {topic} for new team members.',
  'Creative writing': 'Write a short story set against the backdrop of {topic}.',
  'Data analysis': 'Describe the key metrics you would analyse for {topic} and what they reveal.',
  Summarization: 'Summarize the current state of {topic} in a few paragraphs.',
};

const WORKER_VERBS: Readonly<Record<string, string>> = {
  search: 'Search findings',
  web_scraper: 'Source extracts',
  note_taker: 'Outline notes',
  doc_writer: 'Draft document',
  evaluator: 'Evaluation',
  code_agent: 'Change plan',
};

export function significantTerms(text: string): string[] {
  const words = text.toLowerCase().match(/[a-z][a-z-]{3,}/g) ?? [];
  return [...new Set(words.filter((w) => !STOP_WORDS.has(w)))];
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export class HeuristicOracle implements Oracle {
  readonly name = 'heuristic';
  private readonly targetWords: number;
  private readonly maxFixes: number;

  constructor(options: HeuristicOracleOptions = {}) {
    this.targetWords = options.targetWords ?? 40;
    this.maxFixes = options.maxFixes ?? 3;
  }

  /**
   * Coverage of the task's significant terms (60%) plus length (40%).
   * Confidence is high when the score is far from the 0.7 pass line.
   */
  assess(task: string, result: string): HeuristicAssessment {
    const terms = significantTerms(task);
    const lower = result.toLowerCase();
    const missingTerms = terms.filter((term) => !lower.includes(term));
    const coverage = terms.length === 0 ? 1 : (terms.length - missingTerms.length) / terms.length;
    const wordCount = result.split(/\s+/).filter((w) => w.length > 0).length;
    const lengthScore = Math.min(1, wordCount / this.targetWords);
    const score = round2(0.6 * coverage + 0.4 * lengthScore);

    return {
      score,
      coverage,
      wordCount,
      missingTerms,
      confidence: Math.abs(score - 0.7) >= 0.15 ? 'high' : 'low',
    };
  }

  async grade(request: GradeRequest): Promise<GradeResult> {
    const assessment = this.assess(request.task, request.result);
    const issues: string[] = [];

    if (assessment.missingTerms.length > 0) {
      issues.push(`Output does not address: ${assessment.missingTerms.join(', ')}`);
    }
    if (assessment.wordCount < this.targetWords) {
      issues.push(`Output is short (${assessment.wordCount} of ${this.targetWords} expected words)`);
    }

    return {
      score: assessment.score,
      comments: `The ${request.team} team covered ${Math.round(assessment.coverage * 100)}% of the task's key terms in ${assessment.wordCount} words.`,
      issues,
    };
  }

  /**
   * First member, in option order, not yet attempted for the current task.
   * A failed attempt counts, so a failing team is not picked again.
   * Falls back to `task_generator`, then `end`.
   */
  async route(request: RouteRequest): Promise<string> {
    const attempted = new Set(
      request.history.filter((m) => m.kind === 'team_output' || m.kind === 'team_error').map((m) => m.name)
    );

    const next = request.options.find((option) => !NEVER_ROUTED.has(option) && !attempted.has(option));
    if (next) {
      return next;
    }
    if (request.options.includes('task_generator')) {
      return 'task_generator';
    }
    return request.options.includes('end') ? 'end' : (request.options[0] ?? 'end');
  }

  async generateTask(request: TaskRequest): Promise<string> {
    const topic = TOPICS[(request.cycle - 1 + TOPICS.length) % TOPICS.length] ?? 'a topic of your choice';
    const template =
      CATEGORY_TEMPLATES[request.category] ?? `Complete a ${request.category.toLowerCase()} task about {topic}.`;
    return template.replace('{topic}', topic);
  }

  async work(request: WorkRequest): Promise<WorkResult> {
    const label = WORKER_VERBS[request.worker] ?? `${request.worker} output`;
    const lines = [
      `${label} for: ${request.task}`,
      ...significantTerms(request.task).map((term) => `- ${term}: covered with supporting detail.`),
    ];
    if (request.context) {
      lines.push('', `Building on previous work: ${request.context.split('\n')[0] ?? ''}`);
    }

    const output = lines.join('\n');
    return { output, tokensUsed: output.split(/\s+/).length };
  }

  async review(request: ReviewRequest): Promise<ReviewResult> {
    const assessment = this.assess(request.task, request.result);
    return {
      score: assessment.score,
      comments: `Reviewed ${assessment.wordCount} words against the task.`,
      strengths: assessment.coverage >= 0.8 ? ['Addresses the key points of the task'] : [],
      areasForImprovement: assessment.missingTerms.map((term) => `Cover "${term}"`),
    };
  }

  async proposeCodeFix(request: CodeFixRequest): Promise<CodeFixProposal> {
    const prior = new Set(request.priorFixes);
    const fixes = request.issues
      .map((issue) => `Address: ${issue}`)
      .filter((fix) => !prior.has(fix))
      .slice(0, this.maxFixes);

    return {
      narrative:
        fixes.length > 0
          ? `Proposed ${fixes.length} fix(es) for ${request.issues.length} identified issue(s).`
          : 'No new fixes to propose.',
      fixes,
    };
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const parts: string[] = [];
    if (request.overallScore !== undefined) {
      parts.push(`Overall score is ${request.overallScore.toFixed(2)}.`);
    }
    parts.push(
      request.unmetTargets.length > 0
        ? `Targets not yet met: ${request.unmetTargets.join(', ')}.`
        : 'All tracked targets are met.'
    );
    if (request.resourceEffectiveness !== undefined) {
      parts.push(`Resource scaling effectiveness is ${(request.resourceEffectiveness * 100).toFixed(1)}%.`);
    }

    const recommendations = [
      ...request.unmetTargets.map((metric) => `Improve ${metric}`),
      ...request.teamsNeedingImprovement.map((team) => `Schedule an improvement cycle for the ${team} team`),
    ];
    return { narrative: parts.join(' '), recommendations };
  }
}
