/**
 * @module @crew-control/contracts/logger
 * Logger and LLM ports injected into every component.
 */

export type LogMeta = Record<string, unknown>;

/**
 * Structured logger. Components receive one, never build one.
 */
export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  systemPrompt?: string;
}

export interface LLMResponse {
  content: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
  };
  model?: string;
}

/**
 * Minimal text-completion client used by the LLM-backed oracle.
 */
export interface ILLM {
  complete(prompt: string, options?: LLMOptions): Promise<LLMResponse>;
}

/**
 * Logger that drops everything. Used when a caller does not care.
 */
export const silentLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
