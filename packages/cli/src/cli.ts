/**
 * @module @crew-control/cli/cli
 * Argument parsing and command dispatch.
 */

import { parseArgs } from 'node:util';
import { CLI_OPTIONS, reportCommand, runCommand, type CommandContext, type CommandDefinition } from './commands/index.js';

export const COMMANDS: readonly CommandDefinition[] = [runCommand, reportCommand];

export function helpText(): string {
  return [
    'Usage: crew-control <command> [options]',
    '',
    'Commands:',
    ...COMMANDS.map((command) => `  ${command.id.padEnd(8)}${command.description}`),
    '',
    'Options:',
    '  -c, --config <path>     YAML run configuration (default: ./crew.config.yaml if present)',
    '  -t, --task <text>       First task; otherwise tasks are generated',
    '      --max-cycles <n>    Override maxCycles',
    '      --no-auto-generate  Stop after the given task instead of generating more',
    '      --json              Machine-readable output',
    '  -h, --help              Show this help',
    '',
    'Environment:',
    '  LOG_LEVEL               fatal|error|warn|info|debug|trace|silent (default: info)',
    '  OPENAI_API_KEY          API key for llm.provider openai or hybrid (name set by llm.apiKeyEnv)',
  ].join('\n');
}

/**
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], ctx: CommandContext): Promise<number> {
  let parsed;
  try {
    parsed = parseArgs({ args: [...argv], options: CLI_OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    ctx.ui.error(error instanceof Error ? error.message : String(error));
    ctx.ui.error(helpText());
    return 1;
  }

  const [name, ...rest] = parsed.positionals;
  if (parsed.values.help || name === undefined) {
    ctx.ui.write(helpText());
    return name === undefined && !parsed.values.help ? 1 : 0;
  }

  const command = COMMANDS.find((c) => c.id === name);
  if (!command) {
    ctx.ui.error(`Unknown command: ${name}`);
    ctx.ui.error(helpText());
    return 1;
  }
  if (rest.length > 0) {
    ctx.ui.error(`Unexpected argument(s): ${rest.join(' ')}`);
    ctx.ui.error(command.usage);
    return 1;
  }

  const result = await command.handler.execute(ctx, parsed.values);
  return result.exitCode;
}
