/**
 * @module @crew-control/cli/oracle-factory
 * Oracle for the configured provider.
 */

import type { ILogger, Oracle, RunConfig } from '@crew-control/contracts';
import { HeuristicOracle, HybridOracle, LLMOracle } from '@crew-control/oracle';
import { OpenAILLM, createOpenAIClient, type ChatCompletionsClient } from './openai-llm.js';

export interface OracleFactoryOptions {
  env: NodeJS.ProcessEnv;
  logger: ILogger;
  /** Replaces the OpenAI client built from the environment. */
  client?: ChatCompletionsClient;
}

export function createOracle(config: RunConfig, options: OracleFactoryOptions): Oracle {
  const { llm } = config;
  if (llm.provider === 'heuristic') {
    return new HeuristicOracle();
  }

  const client =
    options.client ??
    createOpenAIClient({ apiKeyEnv: llm.apiKeyEnv, ...(llm.baseUrl ? { baseUrl: llm.baseUrl } : {}) }, options.env);
  const model = new OpenAILLM({ model: llm.model, client });
  options.logger.info('Using LLM oracle', { provider: llm.provider, model: llm.model });

  return llm.provider === 'hybrid'
    ? new HybridOracle(model, options.logger, { temperature: llm.temperature })
    : new LLMOracle(model, { temperature: llm.temperature });
}
