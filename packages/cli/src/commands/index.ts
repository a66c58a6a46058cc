export { default as runCommand } from './run.js';
export { default as reportCommand } from './report.js';
export { CLI_OPTIONS, defineCommand } from './command.js';
export type { CliFlags, CommandContext, CommandDefinition, CommandResult, CommandUI } from './command.js';
