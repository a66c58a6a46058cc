/**
 * @module @crew-control/oracle/llm-oracle
 * Oracle backed by a text-completion model.
 *
 * Every structured reply goes through a zod schema. Anything that does not
 * fit raises OracleResponseError; the control core decides the fallback.
 */

import {
  OracleResponseError,
  type CodeFixProposal,
  type CodeFixRequest,
  type GradeRequest,
  type GradeResult,
  type ILLM,
  type Oracle,
  type ReviewRequest,
  type ReviewResult,
  type RouteRequest,
  type RunMessage,
  type SynthesisRequest,
  type SynthesisResult,
  type TaskRequest,
  type WorkRequest,
  type WorkResult,
} from '@crew-control/contracts';
import {
  CodeFixResponseSchema,
  GradeResponseSchema,
  ReviewResponseSchema,
  RouteResponseSchema,
  SynthesisResponseSchema,
  parseStructured,
} from './parsing.js';

const SCORE_SCALE = `Score on a scale of 0.0 to 1.0, where:
- 0.0: Completely fails to address the task
- 0.3: Addresses the task but with major deficiencies
- 0.5: Adequately addresses the task with some issues
- 0.7: Well-executed with minor issues
- 0.9: Excellent execution with tiny improvements possible
- 1.0: Perfect execution of the task`;

const WORKER_ROLES: Readonly<Record<string, string>> = {
  search: 'You research the task and list the most relevant facts and sources.',
  web_scraper: 'You extract detailed supporting material for the task from the sources found so far.',
  note_taker: 'You turn research into a structured outline for the document.',
  doc_writer: 'You write the final document from the outline and research.',
  evaluator: 'You evaluate system performance and list concrete issues.',
  code_agent: 'You propose concrete changes that address the listed issues.',
};

/** Messages included in a routing prompt. */
const ROUTE_HISTORY = 12;

export interface LLMOracleOptions {
  temperature?: number;
  maxTokens?: number;
}

export class LLMOracle implements Oracle {
  readonly name = 'llm';
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly llm: ILLM,
    options: LLMOracleOptions = {}
  ) {
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 1500;
  }

  async grade(request: GradeRequest): Promise<GradeResult> {
    const prompt = `You are a supervisor grading the output from the ${request.team} team.

${SCORE_SCALE}

Respond with JSON only:
{
  "score": number,
  "comments": "feedback for the team",
  "issues": ["specific problem", "..."]
}

ORIGINAL TASK:
${request.task}

TEAM OUTPUT:
${request.result}`;

    const content = await this.complete(prompt, 0.1);
    return parseStructured(GradeResponseSchema, content);
  }

  async route(request: RouteRequest): Promise<string> {
    const history = request.history
      .slice(-ROUTE_HISTORY)
      .map((m) => `[${m.name}] ${firstLine(m)}`)
      .join('\n');

    const prompt = `You are ${request.supervisor}, deciding which member acts next.
Members: ${request.options.join(', ')}
${request.task ? `Current task: ${request.task}\n` : ''}
Conversation so far:
${history || '(empty)'}

Respond with JSON only: { "next": "<one of the members>" }`;

    const content = await this.complete(prompt, 0);
    const { next } = parseStructured(RouteResponseSchema, content);
    if (!request.options.includes(next)) {
      throw new OracleResponseError(`Route "${next}" is not one of: ${request.options.join(', ')}`, content);
    }
    return next;
  }

  async generateTask(request: TaskRequest): Promise<string> {
    const prompt = `Generate one realistic, self-contained task in the category "${request.category}".
It should be completable by a research team and a writing team within half an hour.
Respond with the task text only, no preamble.`;

    const content = (await this.complete(prompt, 0.9)).trim();
    if (content.length === 0) {
      throw new OracleResponseError('Empty task from oracle', content);
    }
    return content;
  }

  async work(request: WorkRequest): Promise<WorkResult> {
    const role = WORKER_ROLES[request.worker] ?? `You are the ${request.worker} worker of the ${request.team} team.`;
    const prompt = `${role}

TASK:
${request.task}
${request.context ? `\nPREVIOUS WORK:\n${request.context}\n` : ''}`;

    const response = await this.llm.complete(prompt, {
      temperature: this.temperature,
      maxTokens: this.maxTokens,
    });
    const output = response.content.trim();
    if (output.length === 0) {
      throw new OracleResponseError(`Empty output from ${request.worker}`, response.content);
    }
    const tokensUsed = response.usage
      ? response.usage.promptTokens + response.usage.completionTokens
      : output.split(/\s+/).length;
    return { output, tokensUsed };
  }

  async review(request: ReviewRequest): Promise<ReviewResult> {
    const prompt = `You are a task review system. Rate how well the result fulfills the original task.

${SCORE_SCALE}

Respond with JSON only:
{
  "score": number,
  "comments": "detailed feedback",
  "strengths": ["..."],
  "areas_for_improvement": ["..."]
}

ORIGINAL TASK:
${request.task}

RESULT:
${request.result}`;

    const content = await this.complete(prompt, 0.1);
    const parsed = parseStructured(ReviewResponseSchema, content);
    return {
      score: parsed.score,
      comments: parsed.comments,
      strengths: parsed.strengths,
      areasForImprovement: parsed.areas_for_improvement,
    };
  }

  async proposeCodeFix(request: CodeFixRequest): Promise<CodeFixProposal> {
    const prompt = `You improve a multi-team agent system. Propose fixes for the issues below.
Do not repeat fixes that were already implemented.

ISSUES:
${request.issues.map((issue) => `- ${issue}`).join('\n') || '- (none reported)'}

ALREADY IMPLEMENTED:
${request.priorFixes.map((fix) => `- ${fix}`).join('\n') || '- (none)'}

Respond with JSON only:
{
  "narrative": "what you changed and why",
  "fixes": ["one line per fix"],
  "code": "optional code snippet to validate"
}`;

    const content = await this.complete(prompt, 0.2);
    const parsed = parseStructured(CodeFixResponseSchema, content);
    return {
      narrative: parsed.narrative,
      fixes: parsed.fixes,
      ...(parsed.code !== undefined ? { code: parsed.code } : {}),
    };
  }

  async synthesize(request: SynthesisRequest): Promise<SynthesisResult> {
    const prompt = `You are a system analyst. Analyze the evaluation data of a multi-team agent system
and give a short assessment with concrete recommendations.

EVALUATION DATA:
${JSON.stringify(request.summaries, null, 2)}

Respond with JSON only:
{
  "analysis": "overall assessment",
  "recommendations": ["..."]
}`;

    const content = await this.complete(prompt, 0.2);
    const parsed = parseStructured(SynthesisResponseSchema, content);
    return { narrative: parsed.analysis, recommendations: parsed.recommendations };
  }

  private async complete(prompt: string, temperature: number): Promise<string> {
    const response = await this.llm.complete(prompt, { temperature, maxTokens: this.maxTokens });
    return response.content;
  }
}

function firstLine(message: RunMessage): string {
  const line = message.content.split('\n').find((l) => l.trim().length > 0) ?? '';
  return line.length > 160 ? `${line.slice(0, 157)}...` : line;
}
