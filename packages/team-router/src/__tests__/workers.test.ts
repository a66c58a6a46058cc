import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { WebScrapeTool, WebSearchTool } from '@crew-control/contracts';
import { DocumentWorkspace } from '@crew-control/workspace-tools';
import { countWords, startTeamWork, withOutput } from '../team-state.js';
import { createResearchWorkers, createWritingWorkers, extractUrls } from '../workers.js';
import { NOW, createMockOracle, fixedRuntime, quietConfig, taskState } from './helpers.js';

const TASK = 'Summarize solar storage options';

describe('extractUrls', () => {
  it('finds unique http(s) links', () => {
    expect(
      extractUrls('See https://docs.example.com/a and (http://b.example.org/x). Again: https://docs.example.com/a')
    ).toEqual(['https://docs.example.com/a', 'http://b.example.org/x']);
  });
});

describe('countWords', () => {
  it('skips bare list markers', () => {
    expect(countWords('- Costs\n* Lifespan\n• Warranty terms')).toBe(4);
    expect(countWords('  well-known  - items ')).toBe(2);
    expect(countWords('')).toBe(0);
  });
});

describe('research workers', () => {
  it('formats search hits from the search tool', async () => {
    const search: WebSearchTool = {
      search: vi.fn().mockResolvedValue([{ title: 'Storage guide', url: 'https://a.example.com', snippet: 'Basics' }]),
    };
    const oracle = createMockOracle();
    const { search: worker } = createResearchWorkers({ oracle, search, runtime: fixedRuntime });

    const state = await worker(startTeamWork(taskState(quietConfig()), TASK));

    expect(search.search).toHaveBeenCalledWith(TASK);
    expect(state.outputs).toEqual([
      { worker: 'search', output: '- Storage guide (https://a.example.com): Basics', tokensUsed: 4 },
    ]);
    expect(oracle.work).not.toHaveBeenCalled();
  });

  it('says so when search finds nothing', async () => {
    const search: WebSearchTool = { search: vi.fn().mockResolvedValue([]) };
    const { search: worker } = createResearchWorkers({ oracle: createMockOracle(), search, runtime: fixedRuntime });

    const state = await worker(startTeamWork(taskState(quietConfig()), TASK));

    expect(state.outputs[0]?.output).toBe('No results found.');
  });

  it('scrapes links found by earlier work', async () => {
    const scrape: WebScrapeTool = { scrape: vi.fn().mockResolvedValue('page text') };
    const { web_scraper: worker } = createResearchWorkers({ oracle: createMockOracle(), scrape, runtime: fixedRuntime });
    const searched = withOutput(
      startTeamWork(taskState(quietConfig()), TASK),
      'search',
      '- Guide (https://a.example.com): Basics',
      4,
      NOW
    );

    const state = await worker(searched);

    expect(scrape.scrape).toHaveBeenCalledWith(['https://a.example.com']);
    expect(state.outputs.at(-1)).toEqual({ worker: 'web_scraper', output: 'page text', tokensUsed: 2 });
  });

  it('asks the oracle with earlier work as context when there is nothing to scrape', async () => {
    const oracle = createMockOracle();
    const { web_scraper: worker } = createResearchWorkers({ oracle, runtime: fixedRuntime });
    const searched = withOutput(startTeamWork(taskState(quietConfig()), TASK), 'search', 'no links', 2, NOW);

    await worker(searched);

    expect(oracle.work).toHaveBeenCalledWith({
      team: 'research',
      worker: 'web_scraper',
      task: TASK,
      context: '[search]\nno links',
    });
  });
});

describe('writing workers', () => {
  let workingDir: string;

  beforeEach(() => {
    workingDir = fs.mkdtempSync(path.join(os.tmpdir(), 'crew-writing-'));
  });

  afterEach(() => {
    fs.rmSync(workingDir, { recursive: true, force: true });
  });

  it('saves the outline and the document for the cycle', async () => {
    const oracle = createMockOracle({
      work: vi
        .fn()
        .mockResolvedValueOnce({ output: '- Costs\n- Lifespan', tokensUsed: 4 })
        .mockResolvedValueOnce({ output: 'Final text.', tokensUsed: 2 }),
    });
    const documents = new DocumentWorkspace(workingDir);
    const { note_taker: noteTaker, doc_writer: docWriter } = createWritingWorkers({
      oracle,
      documents,
      runtime: fixedRuntime,
    });
    const run = taskState(quietConfig(), { cycle: 2, teamResults: { research: 'findings' } });

    const outlined = await noteTaker(startTeamWork(run, TASK));
    await docWriter(outlined);

    expect(fs.readFileSync(path.join(workingDir, 'outline-2.md'), 'utf-8')).toBe('1. Costs\n2. Lifespan\n');
    expect(fs.readFileSync(path.join(workingDir, 'document-2.md'), 'utf-8')).toBe('Final text.');
    expect(oracle.work).toHaveBeenLastCalledWith({
      team: 'writing',
      worker: 'doc_writer',
      task: TASK,
      context: '[research]\nfindings\n\n[note_taker]\n- Costs\n- Lifespan',
    });
  });
});
