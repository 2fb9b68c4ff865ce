import {
  ERR_BAD_PARAMETER,
  ERR_UNSUPPORTED,
  patternMismatch,
  type ValidationError,
} from '../errors/validation-errors.js';
import { DEFAULT_MAX_PATTERN_LENGTH, findUnsafePattern } from '../deterministic/regex-safety.js';
import { toValue } from '../values/value.js';
import type { ValidatorFn } from './types.js';

export interface RegexpValidatorOptions {
  /** Treat patterns prone to catastrophic backtracking as bad parameters. */
  safePatterns?: boolean;
  maxPatternLength?: number;
  /** Called with the reason whenever `safePatterns` rejects a pattern. */
  onUnsafePattern?: (pattern: string, reason: string) => void;
}

// Characters that stay escaped; every other ASCII punctuation escape is a literal.
const SYNTAX_CHARACTERS = new Set('^$\\.*+?()[]{}|/');
const ASCII_PUNCTUATION = /^[!-/:-@[-`{-~]$/;
// Leading flag group, e.g. (?i) or (?ms)
const LEADING_FLAGS = /^\(\?([a-zA-Z]+)\)/;
const SUPPORTED_FLAGS = new Set(['i', 'm', 's']);

/**
 * Rewrite a pattern written in the RE2 dialect into a Unicode-mode
 * `RegExp` source. Unicode mode rejects identity escapes of non-syntax
 * punctuation (`\-`, `\@`, `\:`), so those become the bare character
 * outside classes; inside a class `\-` stays escaped to keep it literal.
 * A leading `(?flags)` group becomes `RegExp` flags. Returns `null` for a
 * flag JavaScript cannot express (`U`). Inline groups such as `(?i:...)`
 * are left to the compiler, which rejects them.
 */
export function translatePattern(pattern: string): { source: string; flags: string } | null {
  let body = pattern;
  const flags = new Set(['u']);

  const leading = LEADING_FLAGS.exec(body);
  if (leading) {
    for (const flag of leading[1] ?? '') {
      if (!SUPPORTED_FLAGS.has(flag)) return null;
      flags.add(flag);
    }
    body = body.slice(leading[0].length);
  }

  let source = '';
  let inClass = false;
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch === '\\' && i + 1 < body.length) {
      const next = body[++i];
      const literal =
        ASCII_PUNCTUATION.test(next) &&
        !SYNTAX_CHARACTERS.has(next) &&
        !(inClass && next === '-');
      source += literal ? next : `\\${next}`;
      continue;
    }
    if (ch === '[' && !inClass) inClass = true;
    else if (ch === ']' && inClass) inClass = false;
    source += ch;
  }

  return { source, flags: [...flags].join('') };
}

function compile(pattern: string): RegExp | null {
  const translated = translatePattern(pattern);
  if (!translated) return null;
  try {
    return new RegExp(translated.source, translated.flags);
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}

/**
 * Build a pattern validator. The value must be a string; the parameter is
 * compiled on every call and searched for anywhere in the value.
 */
export function createRegexpValidator(options: RegexpValidatorOptions = {}): ValidatorFn {
  const safePatterns = options.safePatterns ?? false;
  const maxPatternLength = options.maxPatternLength ?? DEFAULT_MAX_PATTERN_LENGTH;

  return (input: unknown, param: string): ValidationError | null => {
    const value = toValue(input);
    if (value.kind !== 'string') return ERR_UNSUPPORTED;

    const re = compile(param);
    if (!re) return ERR_BAD_PARAMETER;
    if (safePatterns) {
      const reason = findUnsafePattern(param, maxPatternLength);
      if (reason !== null) {
        options.onUnsafePattern?.(param, reason);
        return ERR_BAD_PARAMETER;
      }
    }

    return re.test(value.value) ? null : patternMismatch(param);
  };
}

export const regexp: ValidatorFn = createRegexpValidator();
