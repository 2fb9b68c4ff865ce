/**
 * Length, minimum and maximum checks.
 *
 * The three rules share one kind dispatch and differ only in the
 * comparison. "Size" is the code-point count for strings, the element
 * count for collections and the value itself for numbers. References are
 * never dereferenced and always pass; only `nonzero` looks at null-ness.
 *
 * @module builtins/bounds
 */

import {
  ERR_UNSUPPORTED,
  aboveMaximum,
  belowMinimum,
  lengthMismatch,
  type BoundDetail,
  type ValidationError,
} from '../errors/validation-errors.js';
import { parseFloatParam, parseIntParam, parseUintParam } from '../params/coerce.js';
import { codePointCount, sizeOf, toValue } from '../values/value.js';

export type BoundRule = 'len' | 'min' | 'max';

function violates<T extends bigint | number>(rule: BoundRule, actual: T, expected: T): boolean {
  switch (rule) {
    case 'len':
      return actual !== expected;
    case 'min':
      return actual < expected;
    case 'max':
      return actual > expected;
  }
}

function boundError(rule: BoundRule, bound: BoundDetail): ValidationError {
  switch (rule) {
    case 'len':
      return lengthMismatch(bound);
    case 'min':
      return belowMinimum(bound);
    case 'max':
      return aboveMaximum(bound);
  }
}

function checkCount(
  rule: BoundRule,
  domain: 'string' | 'collection',
  count: number,
  param: string
): ValidationError | null {
  const expected = parseIntParam(param);
  if (!expected.ok) return expected.error;
  const actual = BigInt(count);
  return violates(rule, actual, expected.value)
    ? boundError(rule, { domain, expected: expected.value, actual })
    : null;
}

export function checkBound(rule: BoundRule, input: unknown, param: string): ValidationError | null {
  const value = toValue(input);
  switch (value.kind) {
    case 'string':
      return checkCount(rule, 'string', codePointCount(value.value), param);
    case 'sequence':
    case 'mapping':
    case 'array':
      return checkCount(rule, 'collection', sizeOf(value), param);
    case 'int': {
      const expected = parseIntParam(param);
      if (!expected.ok) return expected.error;
      return violates(rule, value.value, expected.value)
        ? boundError(rule, { domain: 'integer', expected: expected.value, actual: value.value })
        : null;
    }
    case 'uint': {
      const expected = parseUintParam(param);
      if (!expected.ok) return expected.error;
      // Compared as unsigned, reported as signed 64-bit.
      return violates(rule, value.value, expected.value)
        ? boundError(rule, {
            domain: 'integer',
            expected: BigInt.asIntN(64, expected.value),
            actual: BigInt.asIntN(64, value.value),
          })
        : null;
    }
    case 'float': {
      const expected = parseFloatParam(param);
      if (!expected.ok) return expected.error;
      return violates(rule, value.value, expected.value)
        ? boundError(rule, { domain: 'float', expected: expected.value, actual: value.value })
        : null;
    }
    case 'pointer':
      return null;
    case 'bool':
    case 'record':
    case 'invalid':
    case 'unsupported':
      return ERR_UNSUPPORTED;
  }
}

/** Size must equal the parameter. */
export function length(input: unknown, param: string): ValidationError | null {
  return checkBound('len', input, param);
}

/** Size must be at least the parameter. */
export function min(input: unknown, param: string): ValidationError | null {
  return checkBound('min', input, param);
}

/** Size must be at most the parameter. */
export function max(input: unknown, param: string): ValidationError | null {
  return checkBound('max', input, param);
}
