/**
 * Tests for structured reply parsing
 */

import { describe, it, expect } from 'vitest';
import { OracleResponseError } from '@crew-control/contracts';
import { GradeResponseSchema, bulletLines, extractJson, parseStructured } from '../parsing.js';

describe('bulletLines', () => {
  it('should keep bullet and numbered lines without markers', () => {
    const text = 'Issues found:\n- Missing sources\n* Weak intro\n2. Too long\nplain line';
    expect(bulletLines(text)).toEqual(['Missing sources', 'Weak intro', 'Too long']);
  });
});

describe('extractJson', () => {
  it('should read fenced JSON', () => {
    expect(extractJson('Here you go:\n```json\n{"next": "writing_team"}\n```')).toEqual({ next: 'writing_team' });
  });

  it('should read JSON surrounded by prose', () => {
    expect(extractJson('Sure. {"score": 0.4} Hope that helps.')).toEqual({ score: 0.4 });
  });

  it('should reject replies without an object', () => {
    expect(() => extractJson('I think it is fine')).toThrow(OracleResponseError);
  });

  it('should reject malformed JSON', () => {
    expect(() => extractJson('{"score": 0.4,}')).toThrow(/^Malformed JSON in oracle response/);
  });
});

describe('parseStructured', () => {
  it('should default optional fields', () => {
    expect(parseStructured(GradeResponseSchema, '{"score": "0.7"}')).toEqual({
      score: 0.7,
      comments: 'No comments provided.',
      issues: [],
    });
  });

  it('should split a bullet string into a list', () => {
    const content = JSON.stringify({ score: 0.6, comments: 'ok', issues: '- a\n- b' });
    expect(parseStructured(GradeResponseSchema, content).issues).toEqual(['a', 'b']);
  });

  it('should reject scores outside [0, 1]', () => {
    expect(() => parseStructured(GradeResponseSchema, '{"score": 1.5}')).toThrow(
      /^Oracle response failed validation: score: /
    );
  });
});
