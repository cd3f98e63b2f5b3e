/**
 * Configuration loader for Indy.
 *
 * Loads indy.config.json from the script's directory, the working
 * directory, or a specified path. CLI flags override what it sets.
 */

import * as fs from 'fs';
import * as path from 'path';

export interface IndyConfig {
  /** Report engine diagnostics as if --verbose had been passed. */
  verbose?: boolean;
  /** Text written after a prompt message. Defaults to ": ". */
  promptSeparator?: string;
  /** Trim whitespace around prompt answers instead of keeping them verbatim. */
  trimInput?: boolean;
  /** Print the version banner before running. Defaults to true. */
  banner?: boolean;
}

const CONFIG_FILENAMES = ['indy.config.json', '.indyrc.json'];

const BOOLEAN_KEYS = ['verbose', 'trimInput', 'banner'] as const;

/**
 * Read a config file, or look for one in the working directory.
 *
 * A path given here (the CLI's `--config`) is read as is and must exist.
 * Without one, the first of `indy.config.json` and `.indyrc.json` found in
 * cwd wins. No file at all means defaults.
 */
export function loadConfig(explicitPath?: string): IndyConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }
  return findConfig(process.cwd()) ?? {};
}

/**
 * Config for running `scriptPath` when no `--config` was passed: a file
 * beside the script shadows one in cwd. `--verbose` and `--quiet` are
 * applied on top by the CLI.
 */
export function loadConfigForScript(scriptPath: string): IndyConfig {
  return findConfig(path.dirname(path.resolve(scriptPath))) ?? loadConfig();
}

function findConfig(dir: string): IndyConfig | undefined {
  const found = CONFIG_FILENAMES.map(name => path.join(dir, name)).find(file => fs.existsSync(file));
  return found === undefined ? undefined : readConfigFile(found);
}

function readConfigFile(filePath: string): IndyConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new Error(`Invalid JSON in config file ${filePath}: ${error.message}`);
    }
    throw error;
  }
  return validateConfig(raw, filePath);
}

/**
 * Validate config structure. Throws on invalid config; unknown keys are ignored.
 */
function validateConfig(raw: unknown, filePath: string): IndyConfig {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be a JSON object`);
  }

  const entries = new Map<string, unknown>(Object.entries(raw));
  const config: IndyConfig = {};

  for (const key of BOOLEAN_KEYS) {
    const value = entries.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      throw new Error(`Invalid "${key}" in ${filePath}: must be true or false`);
    }
    config[key] = value;
  }

  const separator = entries.get('promptSeparator');
  if (separator !== undefined) {
    if (typeof separator !== 'string') {
      throw new Error(`Invalid "promptSeparator" in ${filePath}: must be a string`);
    }
    config.promptSeparator = separator;
  }

  return config;
}
