/**
 * @module @crew-control/cli/openai-llm
 * ILLM over any OpenAI-compatible chat completions endpoint.
 */

import OpenAI from 'openai';
import { ConfigurationError, type ILLM, type LLMOptions, type LLMResponse } from '@crew-control/contracts';

/** Per-request timeout in ms */
const REQUEST_TIMEOUT_MS = 60_000;

/** Retries for rate limits and server errors; the client backs off between them. */
const MAX_RETRIES = 3;

/** The slice of the OpenAI client this adapter uses. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion>;
    };
  };
}

export interface OpenAILLMOptions {
  model: string;
  client: ChatCompletionsClient;
}

export class OpenAILLM implements ILLM {
  private readonly model: string;
  private readonly client: ChatCompletionsClient;

  constructor(options: OpenAILLMOptions) {
    this.model = options.model;
    this.client = options.client;
  }

  async complete(prompt: string, options: LLMOptions = {}): Promise<LLMResponse> {
    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: 'system', content: options.systemPrompt });
    }
    messages.push({ role: 'user', content: prompt });

    const response = await this.client.chat.completions.create({
      model: this.model,
      messages,
      ...(options.temperature !== undefined ? { temperature: options.temperature } : {}),
      ...(options.maxTokens !== undefined ? { max_tokens: options.maxTokens } : {}),
    });

    return {
      content: response.choices[0]?.message.content ?? '',
      model: response.model,
      ...(response.usage
        ? { usage: { promptTokens: response.usage.prompt_tokens, completionTokens: response.usage.completion_tokens } }
        : {}),
    };
  }
}

export interface OpenAIClientConfig {
  apiKeyEnv: string;
  baseUrl?: string;
}

/**
 * @throws ConfigurationError when the key variable is unset
 */
export function createOpenAIClient(config: OpenAIClientConfig, env: NodeJS.ProcessEnv): OpenAI {
  const apiKey = env[config.apiKeyEnv]?.trim();
  if (!apiKey) {
    throw new ConfigurationError(`${config.apiKeyEnv} is not set. It is required for llm.provider other than heuristic.`);
  }
  return new OpenAI({
    apiKey,
    timeout: REQUEST_TIMEOUT_MS,
    maxRetries: MAX_RETRIES,
    ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
  });
}
