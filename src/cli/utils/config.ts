/**
 * CLI configuration - loading and merging the config file.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import type { CliConfig, OutputFormat } from '../types.js';
import { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS } from '../types.js';

const CONFIG_FILENAME = '.policy-validator.json';

interface PartialCliConfig {
  output?: Partial<CliConfig['output']>;
  validation?: Partial<CliConfig['validation']>;
}

/** Looks for the config file from `startDir` upwards, then in the home directory */
function findConfigFile(startDir: string): string | null {
  let currentDir = startDir;

  while (true) {
    const configPath = join(currentDir, CONFIG_FILENAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = resolve(currentDir, '..');
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  const homeConfig = join(homedir(), CONFIG_FILENAME);
  if (existsSync(homeConfig)) {
    return homeConfig;
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function readOutput(value: unknown): Partial<CliConfig['output']> {
  if (!isRecord(value)) {
    throw new Error('"output" must be an object');
  }
  const output: Partial<CliConfig['output']> = {};
  if (value['format'] !== undefined) {
    if (!isOutputFormat(value['format'])) {
      throw new Error(`"output.format" must be one of: ${OUTPUT_FORMATS.join(', ')}`);
    }
    output.format = value['format'];
  }
  if (value['colors'] !== undefined) {
    if (typeof value['colors'] !== 'boolean') {
      throw new Error('"output.colors" must be a boolean');
    }
    output.colors = value['colors'];
  }
  return output;
}

function readValidation(value: unknown): Partial<CliConfig['validation']> {
  if (!isRecord(value)) {
    throw new Error('"validation" must be an object');
  }
  const validation: Partial<CliConfig['validation']> = {};
  const maxDepth = value['maxDepth'];
  if (maxDepth !== undefined) {
    if (typeof maxDepth !== 'number' || !Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new Error('"validation.maxDepth" must be a positive integer');
    }
    validation.maxDepth = maxDepth;
  }
  if (value['validateActions'] !== undefined) {
    if (typeof value['validateActions'] !== 'boolean') {
      throw new Error('"validation.validateActions" must be a boolean');
    }
    validation.validateActions = value['validateActions'];
  }
  return validation;
}

/** Parses the JSON configuration */
function parseConfig(content: string, filePath: string): PartialCliConfig {
  try {
    const parsed: unknown = JSON.parse(content);
    if (!isRecord(parsed)) {
      throw new Error('Configuration must be an object');
    }
    const config: PartialCliConfig = {};
    if (parsed['output'] !== undefined) {
      config.output = readOutput(parsed['output']);
    }
    if (parsed['validation'] !== undefined) {
      config.validation = readValidation(parsed['validation']);
    }
    return config;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid configuration in ${filePath}: ${message}`);
  }
}

function mergeConfig(base: CliConfig, override: PartialCliConfig): CliConfig {
  return {
    output: {
      ...base.output,
      ...override.output
    },
    validation: {
      ...base.validation,
      ...override.validation
    }
  };
}

let cachedConfig: CliConfig | null = null;
let cachedConfigPath: string | null = null;

/**
 * Loads the CLI configuration.
 *
 * Priority:
 * 1. Explicit path
 * 2. Config file in the working directory or one of its parents
 * 3. Config file in the home directory
 * 4. Defaults
 */
export function loadConfig(explicitPath?: string): CliConfig {
  const pathToLoad = explicitPath ? resolve(explicitPath) : findConfigFile(process.cwd());

  if (cachedConfig && cachedConfigPath === pathToLoad) {
    return cachedConfig;
  }

  if (!pathToLoad || !existsSync(pathToLoad)) {
    if (explicitPath) {
      throw new Error(`Configuration file not found: ${pathToLoad}`);
    }
    cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, {});
    cachedConfigPath = null;
    return cachedConfig;
  }

  const content = readFileSync(pathToLoad, 'utf-8');
  const parsed = parseConfig(content, pathToLoad);
  cachedConfig = mergeConfig(DEFAULT_CLI_CONFIG, parsed);
  cachedConfigPath = pathToLoad;

  return cachedConfig;
}

/** Resets the config cache (for tests) */
export function resetConfigCache(): void {
  cachedConfig = null;
  cachedConfigPath = null;
}

/** Path of the loaded configuration */
export function getConfigPath(): string | null {
  return cachedConfigPath;
}
