/**
 * Stable error taxonomy for rule evaluation.
 *
 * Sentinel errors carry no payload and are shared instances, so callers may
 * compare them by identity. Bound errors carry the expected threshold and
 * the observed value, specialized by domain only for message rendering.
 *
 * Codes are stable across versions and safe to match against downstream.
 *
 * @module errors/validation-errors
 */

export const ValidationErrorCode = {
  ZERO_VALUE: 'ZERO_VALUE',
  LENGTH_MISMATCH: 'LENGTH_MISMATCH',
  BELOW_MINIMUM: 'BELOW_MINIMUM',
  ABOVE_MAXIMUM: 'ABOVE_MAXIMUM',
  PATTERN_MISMATCH: 'PATTERN_MISMATCH',
  BAD_PARAMETER: 'BAD_PARAMETER',
  UNSUPPORTED_TYPE: 'UNSUPPORTED_TYPE',
  UNKNOWN_RULE: 'UNKNOWN_RULE',
} as const;

export type ValidationErrorCode =
  (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

export type ZeroVariant = 'generic' | 'empty' | 'numeric' | 'boolean';

export type BoundCode =
  | typeof ValidationErrorCode.LENGTH_MISMATCH
  | typeof ValidationErrorCode.BELOW_MINIMUM
  | typeof ValidationErrorCode.ABOVE_MAXIMUM;

/**
 * Lengths and integers travel as int64-range bigints, floats as numbers.
 * `JSON.stringify` throws on bigints; convert `expected` and `actual`
 * (e.g. with `String`) before serializing a detail.
 */
export type BoundDetail =
  | {
      readonly domain: 'string' | 'collection' | 'integer';
      readonly expected: bigint;
      readonly actual: bigint;
    }
  | { readonly domain: 'float'; readonly expected: number; readonly actual: number };

export type BoundDomain = BoundDetail['domain'];

export type ValidationErrorDetail =
  | { readonly code: typeof ValidationErrorCode.ZERO_VALUE; readonly variant: ZeroVariant }
  | { readonly code: BoundCode; readonly bound: BoundDetail }
  | { readonly code: typeof ValidationErrorCode.PATTERN_MISMATCH; readonly pattern: string }
  | { readonly code: typeof ValidationErrorCode.BAD_PARAMETER }
  | { readonly code: typeof ValidationErrorCode.UNSUPPORTED_TYPE }
  | { readonly code: typeof ValidationErrorCode.UNKNOWN_RULE; readonly rule: string };

const ZERO_MESSAGES: Record<ZeroVariant, string> = {
  generic: 'zero value',
  empty: 'empty value',
  numeric: 'zero value: number is 0',
  boolean: 'zero value: boolean is false',
};

const UNITS: Record<BoundDomain, string> = {
  string: ' characters',
  collection: ' items',
  integer: '',
  float: '',
};

function renderBound(code: BoundCode, bound: BoundDetail): string {
  const unit = UNITS[bound.domain];
  const got = `got ${bound.actual}`;
  switch (code) {
    case ValidationErrorCode.LENGTH_MISMATCH:
      return `invalid length: expected ${bound.expected}${unit}, ${got}`;
    case ValidationErrorCode.BELOW_MINIMUM:
      return `less than min: expected at least ${bound.expected}${unit}, ${got}`;
    case ValidationErrorCode.ABOVE_MAXIMUM:
      return `greater than max: expected at most ${bound.expected}${unit}, ${got}`;
  }
}

function render(detail: ValidationErrorDetail): string {
  switch (detail.code) {
    case ValidationErrorCode.ZERO_VALUE:
      return ZERO_MESSAGES[detail.variant];
    case ValidationErrorCode.LENGTH_MISMATCH:
    case ValidationErrorCode.BELOW_MINIMUM:
    case ValidationErrorCode.ABOVE_MAXIMUM:
      return renderBound(detail.code, detail.bound);
    case ValidationErrorCode.PATTERN_MISMATCH:
      return `regular expression mismatch: value does not match /${detail.pattern}/`;
    case ValidationErrorCode.BAD_PARAMETER:
      return 'bad parameter';
    case ValidationErrorCode.UNSUPPORTED_TYPE:
      return 'unsupported type';
    case ValidationErrorCode.UNKNOWN_RULE:
      return `unknown rule "${detail.rule}"`;
  }
}

function freezeBound(detail: ValidationErrorDetail): ValidationErrorDetail {
  if ('bound' in detail) {
    return { code: detail.code, bound: Object.freeze({ ...detail.bound }) };
  }
  return { ...detail };
}

export class ValidationError extends Error {
  readonly detail: ValidationErrorDetail;

  /** The error, its detail and any bound payload are frozen. */
  constructor(detail: ValidationErrorDetail) {
    super(render(detail));
    this.name = 'ValidationError';
    this.detail = Object.freeze(freezeBound(detail));
    Object.freeze(this);
  }

  get code(): ValidationErrorCode {
    return this.detail.code;
  }
}

export const ERR_ZERO_VALUE = new ValidationError({ code: 'ZERO_VALUE', variant: 'generic' });
export const ERR_ZERO_VALUE_EMPTY = new ValidationError({ code: 'ZERO_VALUE', variant: 'empty' });
export const ERR_ZERO_VALUE_NUMBER = new ValidationError({ code: 'ZERO_VALUE', variant: 'numeric' });
export const ERR_ZERO_VALUE_BOOL = new ValidationError({ code: 'ZERO_VALUE', variant: 'boolean' });
export const ERR_BAD_PARAMETER = new ValidationError({ code: 'BAD_PARAMETER' });
export const ERR_UNSUPPORTED = new ValidationError({ code: 'UNSUPPORTED_TYPE' });

export function lengthMismatch(bound: BoundDetail): ValidationError {
  return new ValidationError({ code: 'LENGTH_MISMATCH', bound });
}

export function belowMinimum(bound: BoundDetail): ValidationError {
  return new ValidationError({ code: 'BELOW_MINIMUM', bound });
}

export function aboveMaximum(bound: BoundDetail): ValidationError {
  return new ValidationError({ code: 'ABOVE_MAXIMUM', bound });
}

export function patternMismatch(pattern: string): ValidationError {
  return new ValidationError({ code: 'PATTERN_MISMATCH', pattern });
}

export function unknownRule(rule: string): ValidationError {
  return new ValidationError({ code: 'UNKNOWN_RULE', rule });
}

/** Length, minimum or maximum violation, whatever the domain. */
export function isBoundViolation(
  err: ValidationError
): err is ValidationError & {
  readonly detail: { readonly code: BoundCode; readonly bound: BoundDetail };
} {
  return (
    err.detail.code === 'LENGTH_MISMATCH' ||
    err.detail.code === 'BELOW_MINIMUM' ||
    err.detail.code === 'ABOVE_MAXIMUM'
  );
}

/**
 * A misapplied rule (malformed parameter, wrong value kind, unknown name)
 * rather than an invalid value.
 */
export function isConfigurationError(err: ValidationError): boolean {
  return (
    err.code === 'BAD_PARAMETER' ||
    err.code === 'UNSUPPORTED_TYPE' ||
    err.code === 'UNKNOWN_RULE'
  );
}

export function isValueError(err: ValidationError): boolean {
  return !isConfigurationError(err);
}
