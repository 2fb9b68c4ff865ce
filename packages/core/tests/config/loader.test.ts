import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findEngineConfig, loadEngineConfig } from '../../src/config/loader.js';
import {
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  parseEngineConfig,
} from '../../src/config/schema.js';

function captureConfigError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('engine config files', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'tagvalid-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('findEngineConfig', () => {
    it('should return null when no config exists', () => {
      expect(findEngineConfig(dir)).toBeNull();
    });

    it('should find a .yml config', () => {
      writeFileSync(join(dir, '.tagvalid.yml'), 'version: 1\n');
      expect(findEngineConfig(dir)).toBe(join(dir, '.tagvalid.yml'));
    });

    it('should prefer .yaml over .json', () => {
      writeFileSync(join(dir, '.tagvalid.json'), '{"version":1}');
      writeFileSync(join(dir, '.tagvalid.yaml'), 'version: 1\n');
      expect(findEngineConfig(dir)).toBe(join(dir, '.tagvalid.yaml'));
    });
  });

  describe('loadEngineConfig', () => {
    it('should load every setting from YAML', () => {
      const path = join(dir, '.tagvalid.yaml');
      writeFileSync(
        path,
        ['version: 1', 'log_level: debug', 'safe_patterns: true', 'max_pattern_length: 64', ''].join('\n')
      );

      expect(loadEngineConfig(path)).toEqual({
        version: 1,
        logLevel: 'debug',
        safePatterns: true,
        maxPatternLength: 64,
      });
    });

    it('should apply defaults for omitted settings', () => {
      const path = join(dir, '.tagvalid.yml');
      writeFileSync(path, 'version: 1\n');
      expect(loadEngineConfig(path)).toEqual({
        version: 1,
        logLevel: 'warn',
        safePatterns: false,
        maxPatternLength: 256,
      });
    });

    it('should load JSON', () => {
      const path = join(dir, '.tagvalid.json');
      writeFileSync(path, '{"version": 1, "safe_patterns": true}');
      expect(loadEngineConfig(path)).toEqual({ ...DEFAULT_ENGINE_CONFIG, safePatterns: true });
    });

    it('should collect every invalid setting', () => {
      const path = join(dir, '.tagvalid.yaml');
      writeFileSync(
        path,
        [
          'version: 2',
          'log_level: loud',
          'safe_patterns: "yes"',
          'max_pattern_length: 0',
          'extra: 1',
          '',
        ].join('\n')
      );

      const err = captureConfigError(() => loadEngineConfig(path));
      expect(err.source).toBe(path);
      expect(err.issues).toEqual([
        { path: '/extra', message: 'unknown key' },
        { path: '/version', message: 'must be 1' },
        { path: '/log_level', message: 'must be one of: debug, info, warn, error, silent' },
        { path: '/safe_patterns', message: 'must be a boolean' },
        { path: '/max_pattern_length', message: 'must be a positive integer' },
      ]);
    });

    it('should reject a document that is not a mapping', () => {
      const path = join(dir, '.tagvalid.yaml');
      writeFileSync(path, '- 1\n- 2\n');
      const err = captureConfigError(() => loadEngineConfig(path));
      expect(err.issues).toEqual([{ path: '/', message: 'config must be a mapping' }]);
    });

    it('should report unparsable files', () => {
      const path = join(dir, '.tagvalid.json');
      writeFileSync(path, '{ nope');
      const err = captureConfigError(() => loadEngineConfig(path));
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0].message.startsWith('cannot parse file:')).toBe(true);
    });

    it('should report unreadable files', () => {
      const err = captureConfigError(() => loadEngineConfig(join(dir, 'missing.yaml')));
      expect(err.issues[0].message.startsWith('cannot read file:')).toBe(true);
    });
  });
});

describe('parseEngineConfig', () => {
  it('should summarize issues in the message', () => {
    const err = captureConfigError(() => parseEngineConfig({ version: 2 }, 'x.yaml'));
    expect(err.message).toBe('Invalid engine config (x.yaml):\n  - /version: must be 1');
    expect(err.name).toBe('ConfigError');
  });

  it('should omit the source when none is given', () => {
    const err = captureConfigError(() => parseEngineConfig(null));
    expect(err.message).toBe('Invalid engine config:\n  - /: config must be a mapping');
  });
});
