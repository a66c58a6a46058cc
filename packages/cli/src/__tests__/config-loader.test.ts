import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigurationError } from '@crew-control/contracts';
import { loadRunConfig, parseConfigYaml } from '../config-loader.js';

describe('parseConfigYaml', () => {
  it('treats an empty file as an empty mapping', () => {
    expect(parseConfigYaml('')).toEqual({});
  });

  it('rejects a top-level list', () => {
    expect(() => parseConfigYaml('- research\n- writing\n')).toThrow(
      'config must contain a mapping at the top level'
    );
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parseConfigYaml('enabledTeams: [research', 'crew.yaml')).toThrow(ConfigurationError);
    expect(() => parseConfigYaml('enabledTeams: [research', 'crew.yaml')).toThrow(/^Invalid YAML in crew.yaml: /);
  });
});

describe('loadRunConfig', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'crew-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('uses defaults when there is no config file', async () => {
    const config = await loadRunConfig({ cwd });

    expect(config.maxCycles).toBe(10);
    expect(config.llm.provider).toBe('heuristic');
  });

  it('reads the default file and applies overrides on top', async () => {
    fs.writeFileSync(
      path.join(cwd, 'crew.config.yaml'),
      'maxCycles: 4\nqualityThreshold: 0.6\nresources:\n  maxAgents: 5\n'
    );

    const config = await loadRunConfig({ cwd, overrides: { maxCycles: 2 } });

    expect(config.maxCycles).toBe(2);
    expect(config.qualityThreshold).toBe(0.6);
    expect(config.resources).toEqual({ scaling: true, minAgents: 1, maxAgents: 5 });
  });

  it('requires an explicitly named file to exist', async () => {
    await expect(loadRunConfig({ cwd, path: 'missing.yaml' })).rejects.toThrow(/^Cannot read config file /);
  });

  it('reports schema violations as configuration errors', async () => {
    fs.writeFileSync(path.join(cwd, 'bad.yaml'), 'enabledTeams: [research, marketing]\n');

    await expect(loadRunConfig({ cwd, path: 'bad.yaml' })).rejects.toThrow(
      'Unknown team name(s) in enabledTeams: marketing. Known teams: research, writing, juno'
    );
  });
});
