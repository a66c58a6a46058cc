/**
 * Config, logger, oracle and controller for one command invocation.
 */

import { resolve } from 'node:path';
import type { DestinationStream } from 'pino';
import type { ILogger, RunConfig, RunConfigInput } from '@crew-control/contracts';
import { ProgressReporter, type ProgressCallback } from '@crew-control/progress-reporter';
import { RunController } from '@crew-control/team-router';
import { DocumentWorkspace, StagingSandbox } from '@crew-control/workspace-tools';
import { loadRunConfig } from '../config-loader.js';
import { createPinoLogger, resolveLogLevel, toLogger } from '../logger.js';
import { createOracle } from '../oracle-factory.js';
import type { ChatCompletionsClient } from '../openai-llm.js';
import type { CliFlags, CommandContext } from './command.js';

export interface RunSetup {
  config: RunConfig;
  logger: ILogger;
  reporter: ProgressReporter;
  controller: RunController;
}

export interface SetupOverrides {
  /** Log sink in place of stderr. */
  logDestination?: DestinationStream;
  client?: ChatCompletionsClient;
}

export function flagOverrides(flags: CliFlags): RunConfigInput {
  return {
    ...(flags['max-cycles'] !== undefined ? { maxCycles: Number(flags['max-cycles']) } : {}),
    ...(flags['no-auto-generate'] ? { autoGenerateTasks: false } : {}),
  };
}

/**
 * @throws ConfigurationError from config loading or oracle construction
 */
export async function setupRun(
  ctx: CommandContext,
  flags: CliFlags,
  onProgress?: ProgressCallback,
  overrides: SetupOverrides = {}
): Promise<RunSetup> {
  const config = await loadRunConfig({
    cwd: ctx.cwd,
    ...(flags.config !== undefined ? { path: flags.config } : {}),
    overrides: flagOverrides(flags),
  });

  const logger = toLogger(
    createPinoLogger({
      level: resolveLogLevel(ctx.env.LOG_LEVEL, config.logging.level),
      pretty: config.logging.pretty,
      ...(overrides.logDestination ? { destination: overrides.logDestination } : {}),
    })
  );

  const oracle = createOracle(config, {
    env: ctx.env,
    logger,
    ...(overrides.client ? { client: overrides.client } : {}),
  });
  const reporter = new ProgressReporter(logger, onProgress);
  const controller = new RunController({
    config,
    oracle,
    logger,
    reporter,
    tools: {
      documents: new DocumentWorkspace(resolve(ctx.cwd, config.workingDirectory)),
      ...(config.codeChanges.allow ? { sandbox: new StagingSandbox(resolve(ctx.cwd, config.sandboxDirectory)) } : {}),
    },
  });

  return { config, logger, reporter, controller };
}
