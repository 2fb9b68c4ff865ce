/**
 * Coercion of textual rule parameters into numbers.
 *
 * Integer literals accept an optional sign (signed only), the `0x`, `0b`
 * and `0o` prefixes, a leading `0` for octal, and `_` between digits.
 * Float literals accept decimal and hexadecimal (`p` exponent) forms plus
 * `inf`, `infinity` and `nan`. Any failure maps to the bad-parameter
 * sentinel; nothing here throws.
 *
 * @module params/coerce
 */

import { ERR_BAD_PARAMETER, type ValidationError } from '../errors/validation-errors.js';
import { INT64_MAX, INT64_MIN, UINT64_MAX } from '../values/value.js';

export type ParamResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError };

const BAD_PARAMETER: { ok: false; error: ValidationError } = {
  ok: false,
  error: ERR_BAD_PARAMETER,
};

const INT_LITERAL =
  /^(?:0[xX](?:_?[0-9a-fA-F])+|0[bB](?:_?[01])+|0[oO](?:_?[0-7])+|0(?:_?[0-7])*|[1-9](?:_?[0-9])*)$/;
const LEGACY_OCTAL = /^0[0-7]+$/;

const DECIMAL_FLOAT =
  /^(?:\d(?:_?\d)*(?:\.(?:\d(?:_?\d)*)?)?|\.\d(?:_?\d)*)(?:[eE][+-]?\d(?:_?\d)*)?$/;
const HEX_FLOAT =
  /^0[xX]((?:_?[0-9a-fA-F])*)(?:\.([0-9a-fA-F](?:_?[0-9a-fA-F])*)?)?[pP]([+-]?\d(?:_?\d)*)$/;
const INFINITY_LITERAL = /^(?:inf|infinity)$/i;
const NAN_LITERAL = /^nan$/i;

function splitSign(param: string): { negative: boolean; body: string } {
  if (param.startsWith('-')) return { negative: true, body: param.slice(1) };
  if (param.startsWith('+')) return { negative: false, body: param.slice(1) };
  return { negative: false, body: param };
}

function parseMagnitude(literal: string): bigint | null {
  if (!INT_LITERAL.test(literal)) return null;
  const digits = literal.replace(/_/g, '');
  if (LEGACY_OCTAL.test(digits)) return BigInt(`0o${digits.slice(1)}`);
  return BigInt(digits);
}

export function parseIntParam(param: string): ParamResult<bigint> {
  const { negative, body } = splitSign(param);
  const magnitude = parseMagnitude(body);
  if (magnitude === null) return BAD_PARAMETER;
  const value = negative ? -magnitude : magnitude;
  if (value < INT64_MIN || value > INT64_MAX) return BAD_PARAMETER;
  return { ok: true, value };
}

export function parseUintParam(param: string): ParamResult<bigint> {
  const value = parseMagnitude(param);
  if (value === null || value > UINT64_MAX) return BAD_PARAMETER;
  return { ok: true, value };
}

function scaleByPowerOfTwo(mantissa: number, exponent: number): number {
  // Two steps so an intermediate 2**e does not underflow or overflow alone.
  const half = Math.trunc(exponent / 2);
  return mantissa * 2 ** half * 2 ** (exponent - half);
}

function parseHexFloat(body: string): number | null {
  const match = HEX_FLOAT.exec(body);
  if (!match) return null;
  const whole = (match[1] ?? '').replace(/_/g, '');
  const fraction = (match[2] ?? '').replace(/_/g, '');
  if (whole.length + fraction.length === 0) return null;
  const mantissa = BigInt(`0x${whole}${fraction}`);
  if (mantissa === 0n) return 0;
  const exponent = Number((match[3] ?? '0').replace(/_/g, '')) - 4 * fraction.length;
  return scaleByPowerOfTwo(Number(mantissa), exponent);
}

export function parseFloatParam(param: string): ParamResult<number> {
  if (NAN_LITERAL.test(param)) return { ok: true, value: Number.NaN };

  const { negative, body } = splitSign(param);
  if (INFINITY_LITERAL.test(body)) {
    return { ok: true, value: negative ? -Infinity : Infinity };
  }

  let magnitude: number | null = null;
  if (DECIMAL_FLOAT.test(body)) {
    magnitude = Number(body.replace(/_/g, ''));
  } else {
    magnitude = parseHexFloat(body);
  }
  if (magnitude === null || !Number.isFinite(magnitude)) return BAD_PARAMETER;
  return { ok: true, value: negative ? -magnitude : magnitude };
}
