/**
 * Tests for HeuristicOracle
 */

import { describe, it, expect } from 'vitest';
import { createMessage } from '@crew-control/contracts';
import { HeuristicOracle, significantTerms } from '../heuristic-oracle.js';

describe('HeuristicOracle', () => {
  const oracle = new HeuristicOracle();

  describe('grade', () => {
    it('should score by coverage and length', async () => {
      const grade = await oracle.grade({
        team: 'research',
        task: 'Research battery storage options',
        result: 'battery storage notes',
      });

      // coverage 2/4 → 0.3, length 3/40 → 0.03
      expect(grade.score).toBe(0.33);
      expect(grade.comments).toBe("The research team covered 50% of the task's key terms in 3 words.");
      expect(grade.issues).toEqual([
        'Output does not address: research, options',
        'Output is short (3 of 40 expected words)',
      ]);
    });

    it('should give full marks to long, complete output', async () => {
      const result = `Research on battery storage options. ${'detail '.repeat(40)}`;
      const grade = await oracle.grade({ team: 'writing', task: 'Research battery storage options', result });

      expect(grade.score).toBe(1);
      expect(grade.issues).toEqual([]);
    });

    it('should grade its own work output as passing', async () => {
      const task = 'Summarize the current state of urban bike-sharing adoption in a few paragraphs.';
      const work = await oracle.work({ team: 'writing', worker: 'doc_writer', task });
      const grade = await oracle.grade({ team: 'writing', task, result: work.output });

      expect(grade.score).toBeGreaterThanOrEqual(0.7);
    });
  });

  describe('assess', () => {
    it('should be unsure near the pass line', () => {
      const assessment = oracle.assess('alpha beta gamma delta', 'alpha beta gamma delta were all covered here');

      expect(assessment.score).toBe(0.68);
      expect(assessment.confidence).toBe('low');
    });
  });

  describe('route', () => {
    const top = ['research_team', 'writing_team', 'juno_team', 'task_generator'];

    it('should start with research', async () => {
      expect(await oracle.route({ supervisor: 'supervisor', options: top, history: [] })).toBe('research_team');
    });

    it('should move to writing after research output', async () => {
      const history = [createMessage('team', 'research_team', 'team_output', 'notes', 1)];
      expect(await oracle.route({ supervisor: 'supervisor', options: top, history })).toBe('writing_team');
    });

    it('should finish the task once both teams produced output', async () => {
      const history = [
        createMessage('team', 'research_team', 'team_output', 'notes', 1),
        createMessage('team', 'writing_team', 'team_output', 'draft', 2),
      ];
      expect(await oracle.route({ supervisor: 'supervisor', options: top, history })).toBe('task_generator');
    });

    it('should not pick a team again after it failed', async () => {
      const history = [createMessage('team', 'research_team', 'team_error', 'Error in research team: offline', 1)];
      expect(await oracle.route({ supervisor: 'supervisor', options: top, history })).toBe('writing_team');
    });

    it('should prefer the task generator over ending the run', async () => {
      const history = [
        createMessage('team', 'research_team', 'team_error', 'Error in research team: offline', 1),
        createMessage('team', 'writing_team', 'team_error', 'Error in writing team: offline', 2),
      ];
      expect(await oracle.route({ supervisor: 'supervisor', options: [...top, 'end'], history })).toBe('task_generator');
    });

    it('should end a team once every worker ran', async () => {
      const options = ['search', 'web_scraper', 'end'];
      const partial = [createMessage('team', 'search', 'team_output', 'hits', 1)];
      const full = [...partial, createMessage('team', 'web_scraper', 'team_output', 'text', 2)];

      expect(await oracle.route({ supervisor: 'research_supervisor', options, history: partial })).toBe('web_scraper');
      expect(await oracle.route({ supervisor: 'research_supervisor', options, history: full })).toBe('end');
    });
  });

  describe('generateTask', () => {
    it('should fill the category template with a topic picked by cycle', async () => {
      expect(await oracle.generateTask({ category: 'Summarization', cycle: 1 })).toBe(
        'Summarize the current state of battery storage for small solar installations in a few paragraphs.'
      );
    });

    it('should handle unknown categories', async () => {
      expect(await oracle.generateTask({ category: 'Poetry', cycle: 2 })).toBe(
        'Complete a poetry task about onboarding practices for remote engineering teams.'
      );
    });
  });

  describe('proposeCodeFix', () => {
    it('should skip prior fixes and cap the count', async () => {
      const proposal = await oracle.proposeCodeFix({ issues: ['a', 'b', 'c', 'd'], priorFixes: ['Address: a'] });

      expect(proposal.fixes).toEqual(['Address: b', 'Address: c', 'Address: d']);
      expect(proposal.narrative).toBe('Proposed 3 fix(es) for 4 identified issue(s).');
    });
  });

  describe('synthesize', () => {
    it('should describe scores and list recommendations', async () => {
      const result = await oracle.synthesize({
        overallScore: 0.8,
        unmetTargets: ['success_rate'],
        teamsNeedingImprovement: ['writing'],
        resourceEffectiveness: -0.5,
        summaries: {},
      });

      expect(result.narrative).toBe(
        'Overall score is 0.80. Targets not yet met: success_rate. Resource scaling effectiveness is -50.0%.'
      );
      expect(result.recommendations).toEqual([
        'Improve success_rate',
        'Schedule an improvement cycle for the writing team',
      ]);
    });
  });

  it('should drop short and stop words from key terms', () => {
    expect(significantTerms('Write a short report about the solar market')).toEqual(['report', 'solar', 'market']);
  });
});
