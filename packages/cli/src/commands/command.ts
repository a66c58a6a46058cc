/**
 * Command definition shared by the CLI commands.
 */

import type { ParseArgsConfig } from 'node:util';

export interface CommandUI {
  /** Command output (stdout). */
  write(text: string): void;
  error(text: string): void;
}

export interface CommandContext {
  cwd: string;
  env: NodeJS.ProcessEnv;
  ui: CommandUI;
  /** Colored progress output. */
  color?: boolean;
}

export const CLI_OPTIONS = {
  config: { type: 'string', short: 'c' },
  task: { type: 'string', short: 't' },
  'max-cycles': { type: 'string' },
  'no-auto-generate': { type: 'boolean' },
  json: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} as const satisfies NonNullable<ParseArgsConfig['options']>;

export interface CliFlags {
  config?: string;
  task?: string;
  'max-cycles'?: string;
  'no-auto-generate'?: boolean;
  json?: boolean;
  help?: boolean;
}

export interface CommandResult {
  exitCode: number;
}

export interface CommandDefinition {
  id: string;
  description: string;
  usage: string;
  handler: {
    execute(ctx: CommandContext, flags: CliFlags): Promise<CommandResult>;
  };
}

export function defineCommand(definition: CommandDefinition): CommandDefinition {
  return definition;
}
