/**
 * @module @crew-control/oracle/parsing
 * Turns model text into validated structures.
 *
 * All text scraping lives here; nothing outside this package sees raw model
 * output.
 */

import { z } from 'zod';
import { OracleResponseError } from '@crew-control/contracts';

/**
 * Accepts a proper string array, or a bullet/numbered list in one string.
 */
export const StringListSchema = z.preprocess((value) => {
  if (typeof value === 'string') {
    return bulletLines(value);
  }
  return value;
}, z.array(z.string()));

export const ScoreSchema = z.coerce.number().min(0).max(1);

export const GradeResponseSchema = z.object({
  score: ScoreSchema,
  comments: z.string().default('No comments provided.'),
  issues: StringListSchema.default([]),
});

export const ReviewResponseSchema = z.object({
  score: ScoreSchema,
  comments: z.string().default('No comments provided.'),
  strengths: StringListSchema.default([]),
  areas_for_improvement: StringListSchema.default([]),
});

export const RouteResponseSchema = z.object({
  next: z.string().min(1),
});

export const CodeFixResponseSchema = z.object({
  narrative: z.string().default(''),
  fixes: StringListSchema.default([]),
  code: z.string().optional(),
});

export const SynthesisResponseSchema = z.object({
  analysis: z.string().min(1),
  recommendations: StringListSchema.default([]),
});

/**
 * Lines starting with `-`, `*` or `1.` with the marker removed.
 */
export function bulletLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => /^([-*•]|\d+[.)])\s+/.test(line))
    .map((line) => line.replace(/^([-*•]|\d+[.)])\s+/, '').trim())
    .filter((line) => line.length > 0);
}

/**
 * Pull the JSON object out of a reply that may be fenced or surrounded by prose.
 */
export function extractJson(content: string): unknown {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const candidate = fenced?.[1] ?? content;
  const objectMatch = candidate.match(/\{[\s\S]*\}/);
  if (!objectMatch) {
    throw new OracleResponseError('No JSON object in oracle response', content);
  }

  try {
    return JSON.parse(objectMatch[0]);
  } catch (error) {
    throw new OracleResponseError(
      `Malformed JSON in oracle response: ${error instanceof Error ? error.message : 'unknown'}`,
      content,
      { cause: error }
    );
  }
}

/**
 * Extract and validate in one step.
 *
 * @throws OracleResponseError
 */
export function parseStructured<T extends z.ZodTypeAny>(schema: T, content: string): z.output<T> {
  const parsed = schema.safeParse(extractJson(content));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new OracleResponseError(`Oracle response failed validation: ${detail.join('; ')}`, content);
  }
  return parsed.data;
}
