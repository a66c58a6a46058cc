/**
 * @module @crew-control/cli
 * Command-line surface: config loading, pino logging, OpenAI-compatible client.
 */

export { runCli, helpText, COMMANDS } from './cli.js';
export { CLI_OPTIONS, defineCommand, runCommand, reportCommand } from './commands/index.js';
export type { CliFlags, CommandContext, CommandDefinition, CommandResult, CommandUI } from './commands/index.js';
export { flagOverrides, setupRun } from './commands/setup.js';
export type { RunSetup, SetupOverrides } from './commands/setup.js';
export { DEFAULT_CONFIG_FILE, loadRunConfig, parseConfigYaml } from './config-loader.js';
export type { LoadConfigOptions } from './config-loader.js';
export { createPinoLogger, resolveLogLevel, toLogger } from './logger.js';
export type { PinoLoggerOptions } from './logger.js';
export { OpenAILLM, createOpenAIClient } from './openai-llm.js';
export type { ChatCompletionsClient, OpenAIClientConfig, OpenAILLMOptions } from './openai-llm.js';
export { createOracle } from './oracle-factory.js';
export type { OracleFactoryOptions } from './oracle-factory.js';
export { createEventRenderer, renderEvent } from './ui/event-renderer.js';
