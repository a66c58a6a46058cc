/**
 * @module @crew-control/cli/config-loader
 * Run configuration from a YAML file plus command-line overrides.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { load as loadYaml, YAMLException } from 'js-yaml';
import { ConfigurationError, parseRunConfig, type RunConfig, type RunConfigInput } from '@crew-control/contracts';

/** Looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'crew.config.yaml';

export interface LoadConfigOptions {
  cwd: string;
  /** Explicit file; a missing explicit file is an error. */
  path?: string;
  overrides?: RunConfigInput;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readConfigFile(filePath: string, required: boolean): Promise<string | undefined> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch (error) {
    if (!required && isRecord(error) && error.code === 'ENOENT') {
      return undefined;
    }
    throw new ConfigurationError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Parse YAML text into a raw config mapping. Empty text is an empty mapping.
 */
export function parseConfigYaml(text: string, source = 'config'): Record<string, unknown> {
  let raw: unknown;
  try {
    raw = loadYaml(text);
  } catch (error) {
    const reason = error instanceof YAMLException ? error.reason : String(error);
    throw new ConfigurationError(`Invalid YAML in ${source}: ${reason}`);
  }

  if (raw === undefined || raw === null) {
    return {};
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`${source} must contain a mapping at the top level`);
  }
  return raw;
}

/**
 * File values, then overrides, then schema defaults for anything left out.
 *
 * @throws ConfigurationError for unreadable files, bad YAML and schema violations
 */
export async function loadRunConfig(options: LoadConfigOptions): Promise<RunConfig> {
  const filePath = resolve(options.cwd, options.path ?? DEFAULT_CONFIG_FILE);
  const text = await readConfigFile(filePath, options.path !== undefined);
  const fromFile = text === undefined ? {} : parseConfigYaml(text, filePath);

  return parseRunConfig({ ...fromFile, ...options.overrides });
}
