/**
 * @module @crew-control/team-router/workers
 * Research and writing team workers.
 *
 * Workers use a tool when one is wired in and ask the oracle otherwise.
 */

import {
  silentLogger,
  systemRuntime,
  type ILogger,
  type Oracle,
  type Runtime,
  type WebScrapeTool,
  type WebSearchTool,
} from '@crew-control/contracts';
import type { DocumentWorkspace } from '@crew-control/workspace-tools';
import { countWords, previousWork, withOutput, type TeamWorkState, type Worker } from './team-state.js';

export const RESEARCH_WORKERS = ['search', 'web_scraper'] as const;
export const WRITING_WORKERS = ['note_taker', 'doc_writer'] as const;

export type ResearchWorker = (typeof RESEARCH_WORKERS)[number];
export type WritingWorker = (typeof WRITING_WORKERS)[number];

/** URLs handed to the scraper per run. */
const MAX_SCRAPE_URLS = 3;

export interface WorkerDeps {
  oracle: Oracle;
  runtime?: Runtime;
  logger?: ILogger;
}

export interface ResearchWorkerDeps extends WorkerDeps {
  search?: WebSearchTool;
  scrape?: WebScrapeTool;
}

export interface WritingWorkerDeps extends WorkerDeps {
  documents?: DocumentWorkspace;
}

export function extractUrls(text: string): string[] {
  const matches = text.match(/https?:\/\/[^\s)\]"']+/g) ?? [];
  return [...new Set(matches)];
}

// ═══════════════════════════════════════════════════════════════════════════
// Research
// ═══════════════════════════════════════════════════════════════════════════

export function createResearchWorkers(deps: ResearchWorkerDeps): Record<ResearchWorker, Worker> {
  const runtime = deps.runtime ?? systemRuntime;

  const search: Worker = async (state) => {
    if (!deps.search) {
      const result = await deps.oracle.work({ team: 'research', worker: 'search', task: state.task });
      return withOutput(state, 'search', result.output, result.tokensUsed, runtime.now());
    }
    const hits = await deps.search.search(state.task);
    const output =
      hits.length > 0 ? hits.map((hit) => `- ${hit.title} (${hit.url}): ${hit.snippet}`).join('\n') : 'No results found.';
    return withOutput(state, 'search', output, countWords(output), runtime.now());
  };

  const webScraper: Worker = async (state) => {
    const urls = extractUrls(previousWork(state) ?? '').slice(0, MAX_SCRAPE_URLS);
    if (deps.scrape && urls.length > 0) {
      const text = await deps.scrape.scrape(urls);
      return withOutput(state, 'web_scraper', text, countWords(text), runtime.now());
    }
    const context = previousWork(state);
    const result = await deps.oracle.work({
      team: 'research',
      worker: 'web_scraper',
      task: state.task,
      ...(context !== undefined ? { context } : {}),
    });
    return withOutput(state, 'web_scraper', result.output, result.tokensUsed, runtime.now());
  };

  return { search, web_scraper: webScraper };
}

// ═══════════════════════════════════════════════════════════════════════════
// Writing
// ═══════════════════════════════════════════════════════════════════════════

function outlinePoints(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
    .filter((line) => line.length > 0);
}

export function createWritingWorkers(deps: WritingWorkerDeps): Record<WritingWorker, Worker> {
  const runtime = deps.runtime ?? systemRuntime;
  const logger = deps.logger ?? silentLogger;

  const writingContext = (state: TeamWorkState): string | undefined => {
    const research = state.run.teamResults.research;
    const own = previousWork(state);
    const parts = [research ? `[research]\n${research}` : undefined, own].filter(
      (part): part is string => part !== undefined
    );
    return parts.length > 0 ? parts.join('\n\n') : undefined;
  };

  const ask = async (state: TeamWorkState, worker: WritingWorker) => {
    const context = writingContext(state);
    return deps.oracle.work({
      team: 'writing',
      worker,
      task: state.task,
      ...(context !== undefined ? { context } : {}),
    });
  };

  const noteTaker: Worker = async (state) => {
    const result = await ask(state, 'note_taker');
    if (deps.documents) {
      const saved = await deps.documents.createOutline(outlinePoints(result.output), `outline-${state.run.cycle}.md`);
      if (!saved.success) {
        logger.warn('Could not save outline', { error: saved.error });
      }
    }
    return withOutput(state, 'note_taker', result.output, result.tokensUsed, runtime.now());
  };

  const docWriter: Worker = async (state) => {
    const result = await ask(state, 'doc_writer');
    if (deps.documents) {
      const saved = await deps.documents.writeDocument(result.output, `document-${state.run.cycle}.md`);
      if (!saved.success) {
        logger.warn('Could not save document', { error: saved.error });
      }
    }
    return withOutput(state, 'doc_writer', result.output, result.tokensUsed, runtime.now());
  };

  return { note_taker: noteTaker, doc_writer: docWriter };
}
