/**
 * Tests for LLMOracle and HybridOracle
 */

import { describe, it, expect, vi } from 'vitest';
import { OracleResponseError, type ILLM, type LLMResponse } from '@crew-control/contracts';
import { LLMOracle } from '../llm-oracle.js';
import { HybridOracle } from '../hybrid-oracle.js';

function createMockLLM(...replies: Array<string | LLMResponse>): ILLM {
  const complete = vi.fn();
  for (const reply of replies) {
    complete.mockResolvedValueOnce(typeof reply === 'string' ? { content: reply } : reply);
  }
  return { complete };
}

describe('LLMOracle', () => {
  it('should parse a fenced grade', async () => {
    const reply = '```json\n' + JSON.stringify({ score: 0.6, comments: 'ok', issues: ['thin'] }) + '\n```';
    const oracle = new LLMOracle(createMockLLM(reply));

    expect(await oracle.grade({ team: 'research', task: 't', result: 'r' })).toEqual({
      score: 0.6,
      comments: 'ok',
      issues: ['thin'],
    });
  });

  it('should raise OracleResponseError on prose', async () => {
    const oracle = new LLMOracle(createMockLLM('Looks great to me!'));
    await expect(oracle.grade({ team: 'research', task: 't', result: 'r' })).rejects.toBeInstanceOf(OracleResponseError);
  });

  it('should accept a listed route', async () => {
    const oracle = new LLMOracle(createMockLLM('{"next": "writing_team"}'));
    const next = await oracle.route({ supervisor: 'supervisor', options: ['research_team', 'writing_team'], history: [] });
    expect(next).toBe('writing_team');
  });

  it('should reject a route outside the options', async () => {
    const oracle = new LLMOracle(createMockLLM('{"next": "marketing_team"}'));
    await expect(
      oracle.route({ supervisor: 'supervisor', options: ['research_team', 'writing_team'], history: [] })
    ).rejects.toThrow('Route "marketing_team" is not one of: research_team, writing_team');
  });

  it('should count tokens from usage when reported', async () => {
    const oracle = new LLMOracle(
      createMockLLM({ content: ' findings ', usage: { promptTokens: 120, completionTokens: 30 } })
    );
    expect(await oracle.work({ team: 'research', worker: 'search', task: 't' })).toEqual({
      output: 'findings',
      tokensUsed: 150,
    });
  });

  it('should reject an empty generated task', async () => {
    const oracle = new LLMOracle(createMockLLM('   '));
    await expect(oracle.generateTask({ category: 'Summarization', cycle: 1 })).rejects.toThrow('Empty task from oracle');
  });

  it('should map review fields', async () => {
    const reply = JSON.stringify({ score: 0.9, comments: 'good', strengths: ['clear'], areas_for_improvement: '- tighten intro' });
    const oracle = new LLMOracle(createMockLLM(reply));

    expect(await oracle.review({ task: 't', result: 'r' })).toEqual({
      score: 0.9,
      comments: 'good',
      strengths: ['clear'],
      areasForImprovement: ['tighten intro'],
    });
  });

  it('should return fixes as a list', async () => {
    const reply = JSON.stringify({ narrative: 'Tuned prompts', fixes: '1. Add citations\n2. Shorter drafts' });
    const oracle = new LLMOracle(createMockLLM(reply));

    expect(await oracle.proposeCodeFix({ issues: ['x'], priorFixes: [] })).toEqual({
      narrative: 'Tuned prompts',
      fixes: ['Add citations', 'Shorter drafts'],
    });
  });

  it('should map synthesis analysis to narrative', async () => {
    const oracle = new LLMOracle(createMockLLM('{"analysis": "Stable", "recommendations": ["Keep going"]}'));
    const result = await oracle.synthesize({ unmetTargets: [], teamsNeedingImprovement: [], summaries: {} });
    expect(result).toEqual({ narrative: 'Stable', recommendations: ['Keep going'] });
  });
});

describe('HybridOracle', () => {
  const confident = { team: 'research' as const, task: 'Research battery storage options', result: 'battery' };
  const unsure = { team: 'research' as const, task: 'alpha beta gamma delta', result: 'alpha beta gamma delta were all covered here' };

  it('should answer confident grades without the model', async () => {
    const llm = createMockLLM();
    const oracle = new HybridOracle(llm);

    await oracle.grade(confident);

    expect(llm.complete).not.toHaveBeenCalled();
    expect(oracle.getStats().heuristicCount).toBe(1);
  });

  it('should ask the model when unsure', async () => {
    const llm = createMockLLM('{"score": 0.9, "comments": "fine", "issues": []}');
    const oracle = new HybridOracle(llm);

    expect((await oracle.grade(unsure)).score).toBe(0.9);
    expect(oracle.getStats()).toEqual({ heuristicCount: 0, llmCount: 1, fallbackCount: 0, heuristicRate: 0 });
  });

  it('should fall back to the heuristic when the model fails', async () => {
    const llm = createMockLLM('not json');
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const oracle = new HybridOracle(llm, logger);

    expect((await oracle.grade(unsure)).score).toBe(0.68);
    expect(oracle.getStats().fallbackCount).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('LLM grade failed, using heuristic', {
      error: 'No JSON object in oracle response',
    });
  });
});
