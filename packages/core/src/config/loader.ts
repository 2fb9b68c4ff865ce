// src/config/loader.ts
// Locate and load engine configuration files

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError, parseEngineConfig, type EngineConfig } from './schema.js';

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const CONFIG_FILES = ['.tagvalid.yaml', '.tagvalid.yml', '.tagvalid.json'] as const;

/**
 * Find an engine config file in a directory
 */
export function findEngineConfig(dir: string = process.cwd()): string | null {
  for (const name of CONFIG_FILES) {
    const path = join(dir, name);
    if (existsSync(path)) {
      return path;
    }
  }
  return null;
}

/**
 * Load and validate an engine config file. JSON files are parsed as JSON,
 * everything else as YAML.
 */
export function loadEngineConfig(path: string): EngineConfig {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      [{ path: '/', message: `cannot read file: ${describeError(err)}` }],
      path
    );
  }

  let raw: unknown;
  try {
    raw = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (err) {
    throw new ConfigError(
      [{ path: '/', message: `cannot parse file: ${describeError(err)}` }],
      path
    );
  }

  return parseEngineConfig(raw, path);
}
