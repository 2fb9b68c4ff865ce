// src/config/schema.ts
// Engine configuration file schema and validation

import { DEFAULT_MAX_PATTERN_LENGTH } from '../deterministic/regex-safety.js';
import { LOG_LEVELS, isLogLevel, type LogLevel } from '../utils/logger.js';

export interface EngineConfig {
  version: 1;
  logLevel: LogLevel;
  safePatterns: boolean;
  maxPatternLength: number;
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  readonly issues: ConfigIssue[];
  readonly source?: string;

  constructor(issues: ConfigIssue[], source?: string) {
    const summary = issues.map((i) => `  - ${i.path}: ${i.message}`).join('\n');
    super(`Invalid engine config${source ? ` (${source})` : ''}:\n${summary}`);
    this.name = 'ConfigError';
    this.issues = issues;
    this.source = source;
  }
}

/**
 * Default settings
 */
export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = Object.freeze({
  version: 1,
  logLevel: 'warn',
  safePatterns: false,
  maxPatternLength: DEFAULT_MAX_PATTERN_LENGTH,
});

const KNOWN_KEYS = new Set(['version', 'log_level', 'safe_patterns', 'max_pattern_length']);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw config document (snake_case keys) and apply defaults.
 * Every problem is collected before throwing.
 */
export function parseEngineConfig(raw: unknown, source?: string): EngineConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError([{ path: '/', message: 'config must be a mapping' }], source);
  }

  const issues: ConfigIssue[] = [];
  const config: EngineConfig = { ...DEFAULT_ENGINE_CONFIG };

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      issues.push({ path: `/${key}`, message: 'unknown key' });
    }
  }

  if (raw.version !== 1) {
    issues.push({ path: '/version', message: 'must be 1' });
  }

  const logLevel = raw.log_level;
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      config.logLevel = logLevel;
    } else {
      issues.push({ path: '/log_level', message: `must be one of: ${LOG_LEVELS.join(', ')}` });
    }
  }

  const safePatterns = raw.safe_patterns;
  if (safePatterns !== undefined) {
    if (typeof safePatterns === 'boolean') {
      config.safePatterns = safePatterns;
    } else {
      issues.push({ path: '/safe_patterns', message: 'must be a boolean' });
    }
  }

  const maxPatternLength = raw.max_pattern_length;
  if (maxPatternLength !== undefined) {
    if (
      typeof maxPatternLength === 'number' &&
      Number.isSafeInteger(maxPatternLength) &&
      maxPatternLength > 0
    ) {
      config.maxPatternLength = maxPatternLength;
    } else {
      issues.push({ path: '/max_pattern_length', message: 'must be a positive integer' });
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(issues, source);
  }
  return config;
}
