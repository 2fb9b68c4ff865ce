import type { ValidationError } from '../errors/validation-errors.js';

/**
 * Signature shared by every built-in rule: `null` on success, otherwise
 * exactly one error. Implementations never throw for any value or
 * parameter.
 */
export type ValidatorFn = (value: unknown, param: string) => ValidationError | null;

export type BuiltinRuleName = 'nonzero' | 'len' | 'min' | 'max' | 'regexp';
