/**
 * Rule lookup and evaluation.
 *
 * Resolves a rule name against the built-in table and runs the validator
 * once per call. Configuration errors (malformed parameter, wrong value
 * kind, unknown rule) are logged at `warn`, since they point at the rule
 * setup rather than at the value.
 *
 * @module engine/rule-engine
 */

import { BUILTIN_VALIDATORS, isBuiltinRule } from '../builtins/index.js';
import { createRegexpValidator } from '../builtins/regexp.js';
import type { BuiltinRuleName, ValidatorFn } from '../builtins/types.js';
import type { EngineConfig } from '../config/schema.js';
import {
  isConfigurationError,
  unknownRule,
  type ValidationError,
} from '../errors/validation-errors.js';
import { createLogger, silentLogger, type Logger } from '../utils/logger.js';
import { kindOf } from '../values/value.js';

export interface RuleEngineOptions {
  /** Logger instance (defaults to a silent logger) */
  logger?: Logger;
  /** Reject regexp parameters prone to catastrophic backtracking */
  safePatterns?: boolean;
  /** Longest regexp parameter accepted when `safePatterns` is on */
  maxPatternLength?: number;
}

export class RuleEngine {
  private readonly validators: Readonly<Record<BuiltinRuleName, ValidatorFn>>;
  private readonly logger: Logger;

  constructor(options: RuleEngineOptions = {}) {
    const logger = options.logger ?? silentLogger;
    this.logger = logger;
    this.validators = Object.freeze({
      ...BUILTIN_VALIDATORS,
      regexp: createRegexpValidator({
        safePatterns: options.safePatterns,
        maxPatternLength: options.maxPatternLength,
        onUnsafePattern: (pattern, reason) =>
          logger.warn('Unsafe pattern rejected', { pattern, reason }),
      }),
    });
  }

  static fromConfig(config: EngineConfig, logger?: Logger): RuleEngine {
    return new RuleEngine({
      logger: logger ?? createLogger(config.logLevel),
      safePatterns: config.safePatterns,
      maxPatternLength: config.maxPatternLength,
    });
  }

  has(rule: string): boolean {
    return isBuiltinRule(rule);
  }

  rules(): BuiltinRuleName[] {
    return Object.keys(this.validators).filter(isBuiltinRule).sort();
  }

  /**
   * Evaluate one rule against one value. Returns `null` when the value
   * satisfies the rule.
   */
  check(value: unknown, rule: string, param: string = ''): ValidationError | null {
    if (!isBuiltinRule(rule)) {
      this.logger.warn('Unknown rule', { rule });
      return unknownRule(rule);
    }

    const kind = kindOf(value);
    const result = this.validators[rule](value, param);

    this.logger.debug('Rule evaluated', {
      rule,
      param,
      kind,
      outcome: result ? result.code : 'pass',
    });

    if (result && isConfigurationError(result)) {
      this.logger.warn('Rule misapplied', { rule, param, kind, code: result.code });
    }

    return result;
  }
}
