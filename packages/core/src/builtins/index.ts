/**
 * Built-in rules, keyed by the names callers use in rule annotations.
 *
 * @module builtins
 */

import { length, max, min } from './bounds.js';
import { nonzero } from './nonzero.js';
import { regexp } from './regexp.js';
import type { BuiltinRuleName, ValidatorFn } from './types.js';

export const BUILTIN_VALIDATORS: Readonly<Record<BuiltinRuleName, ValidatorFn>> = Object.freeze({
  nonzero,
  len: length,
  min,
  max,
  regexp,
});

export function isBuiltinRule(name: string): name is BuiltinRuleName {
  return Object.prototype.hasOwnProperty.call(BUILTIN_VALIDATORS, name);
}

export { nonzero } from './nonzero.js';
export { length, min, max, checkBound, type BoundRule } from './bounds.js';
export {
  regexp,
  createRegexpValidator,
  translatePattern,
  type RegexpValidatorOptions,
} from './regexp.js';
export type { ValidatorFn, BuiltinRuleName } from './types.js';
