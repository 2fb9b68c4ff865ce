import {
  ERR_UNSUPPORTED,
  ERR_ZERO_VALUE,
  ERR_ZERO_VALUE_BOOL,
  ERR_ZERO_VALUE_EMPTY,
  ERR_ZERO_VALUE_NUMBER,
  type ValidationError,
} from '../errors/validation-errors.js';
import { codePointCount, sizeOf, toValue } from '../values/value.js';

/**
 * Fails when the value is the zero value of its kind. Records always pass;
 * the parameter is ignored.
 */
export function nonzero(input: unknown, _param: string): ValidationError | null {
  const value = toValue(input);
  switch (value.kind) {
    case 'string':
      return codePointCount(value.value) === 0 ? ERR_ZERO_VALUE_EMPTY : null;
    case 'pointer':
      return value.target === null || value.target === undefined ? ERR_ZERO_VALUE_EMPTY : null;
    case 'sequence':
    case 'mapping':
    case 'array':
      return sizeOf(value) === 0 ? ERR_ZERO_VALUE_EMPTY : null;
    case 'int':
    case 'uint':
      return value.value === 0n ? ERR_ZERO_VALUE_NUMBER : null;
    case 'float':
      return value.value === 0 ? ERR_ZERO_VALUE_NUMBER : null;
    case 'bool':
      return value.value ? null : ERR_ZERO_VALUE_BOOL;
    case 'invalid':
      return ERR_ZERO_VALUE;
    case 'record':
      return null;
    case 'unsupported':
      return ERR_UNSUPPORTED;
  }
}
