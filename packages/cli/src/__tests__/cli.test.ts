import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CommandContext } from '../commands/index.js';
import { helpText, runCli } from '../cli.js';

const QUIET_CONFIG = [
  'maxCycles: 3',
  'workingDirectory: docs',
  'taskCategories: [Summarization]',
  'workload:',
  '  dynamic: false',
  'resources:',
  '  scaling: false',
  '',
].join('\n');

function createContext(cwd: string, env: NodeJS.ProcessEnv = { LOG_LEVEL: 'silent' }) {
  const out: string[] = [];
  const err: string[] = [];
  const ctx: CommandContext = {
    cwd,
    env,
    ui: { write: (text) => out.push(text), error: (text) => err.push(text) },
  };
  return { ctx, out, err };
}

describe('runCli', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'crew-cli-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('prints help and exits 0 with --help', async () => {
    const { ctx, out } = createContext(cwd);

    expect(await runCli(['--help'], ctx)).toBe(0);
    expect(out).toEqual([helpText()]);
  });

  it('prints help and exits 1 without a command', async () => {
    const { ctx, out } = createContext(cwd);

    expect(await runCli([], ctx)).toBe(1);
    expect(out).toEqual([helpText()]);
  });

  it('rejects unknown commands, options and extra arguments', async () => {
    const { ctx, err } = createContext(cwd);

    expect(await runCli(['deploy'], ctx)).toBe(1);
    expect(err[0]).toBe('Unknown command: deploy');

    expect(await runCli(['run', '--bogus'], ctx)).toBe(1);
    expect(await runCli(['run', 'extra'], ctx)).toBe(1);
    expect(err).toContain('Unexpected argument(s): extra');
  });

  it('reports configuration errors with exit code 1', async () => {
    fs.writeFileSync(path.join(cwd, 'crew.config.yaml'), 'maxCycles: -1\n');
    const { ctx, err } = createContext(cwd);

    expect(await runCli(['run'], ctx)).toBe(1);
    expect(err).toEqual(['Configuration error: Invalid run configuration: maxCycles: Number must be greater than 0']);
  });

  it('needs an API key for the openai provider', async () => {
    fs.writeFileSync(path.join(cwd, 'crew.config.yaml'), 'llm:\n  provider: openai\n');
    const { ctx, err } = createContext(cwd);

    expect(await runCli(['report'], ctx)).toBe(1);
    expect(err).toEqual([
      'Configuration error: OPENAI_API_KEY is not set. It is required for llm.provider other than heuristic.',
    ]);
  });

  it('runs one heuristic cycle and prints JSON lines', async () => {
    fs.writeFileSync(path.join(cwd, 'crew.config.yaml'), QUIET_CONFIG);
    const { ctx, out } = createContext(cwd);

    expect(await runCli(['run', '--max-cycles', '1', '--json'], ctx)).toBe(0);

    const lines = out.map((line) => JSON.parse(line));
    expect(lines[0]).toMatchObject({
      type: 'cycle_started',
      data: {
        cycle: 1,
        task: 'Summarize the current state of battery storage for small solar installations in a few paragraphs.',
      },
    });
    expect(lines.filter((l) => l.type === 'team_completed').map((l) => l.data.team)).toEqual(['research', 'writing']);

    const result = lines.at(-1);
    expect(result).toMatchObject({
      type: 'result',
      stopReason: 'max_cycles',
      cycles: 1,
      completedTasks: ['Summarize the current state of battery storage for small solar installations in a few paragraphs.'],
    });
    expect(fs.existsSync(path.join(cwd, 'docs', 'document-1.md'))).toBe(true);
  });

  it('stops after the given task without auto-generation', async () => {
    fs.writeFileSync(path.join(cwd, 'crew.config.yaml'), QUIET_CONFIG);
    const { ctx, out } = createContext(cwd);

    const code = await runCli(['report', '--task', 'Compare two note-taking apps', '--no-auto-generate'], ctx);

    expect(code).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]?.split('\n')[0]).toBe('# System Evaluation');
  });
});
