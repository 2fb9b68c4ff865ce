import { describe, it, expect } from 'vitest';
import {
  parseIntParam,
  parseUintParam,
  parseFloatParam,
} from '../../src/params/coerce.js';
import { ERR_BAD_PARAMETER } from '../../src/errors/validation-errors.js';
import { INT64_MAX, INT64_MIN, UINT64_MAX } from '../../src/values/value.js';

const BAD = { ok: false, error: ERR_BAD_PARAMETER };

describe('parseIntParam', () => {
  it.each([
    ['10', 10n],
    ['-10', -10n],
    ['+7', 7n],
    ['0', 0n],
    ['0x1F', 31n],
    ['0b101', 5n],
    ['0o17', 15n],
    ['017', 15n],
    ['1_000', 1000n],
    ['0x_ff', 255n],
    ['-0x10', -16n],
  ])('should parse %s', (param, expected) => {
    expect(parseIntParam(param)).toEqual({ ok: true, value: expected });
  });

  it('should accept the int64 limits', () => {
    expect(parseIntParam('9223372036854775807')).toEqual({ ok: true, value: INT64_MAX });
    expect(parseIntParam('-9223372036854775808')).toEqual({ ok: true, value: INT64_MIN });
  });

  it('should reject values outside int64', () => {
    expect(parseIntParam('9223372036854775808')).toEqual(BAD);
  });

  it.each(['', 'abc', '1.5', '08', '1__0', '_1', '1_', '0x', ' 1', '1e3', '--1'])(
    'should reject %j',
    (param) => {
      expect(parseIntParam(param)).toEqual(BAD);
    }
  );

  it('should return the shared bad-parameter sentinel', () => {
    const result = parseIntParam('ten');
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBe(ERR_BAD_PARAMETER);
  });
});

describe('parseUintParam', () => {
  it('should accept the uint64 limit', () => {
    expect(parseUintParam('18446744073709551615')).toEqual({ ok: true, value: UINT64_MAX });
    expect(parseUintParam('0xFFFFFFFFFFFFFFFF')).toEqual({ ok: true, value: UINT64_MAX });
  });

  it('should reject values beyond uint64', () => {
    expect(parseUintParam('18446744073709551616')).toEqual(BAD);
  });

  it('should reject any sign', () => {
    expect(parseUintParam('-1')).toEqual(BAD);
    expect(parseUintParam('+1')).toEqual(BAD);
  });

  it('should parse prefixed literals', () => {
    expect(parseUintParam('0b11')).toEqual({ ok: true, value: 3n });
    expect(parseUintParam('010')).toEqual({ ok: true, value: 8n });
  });
});

describe('parseFloatParam', () => {
  it.each([
    ['10', 10],
    ['3.14', 3.14],
    ['-2.5', -2.5],
    ['1e3', 1000],
    ['.5', 0.5],
    ['5.', 5],
    ['1_000.5', 1000.5],
    ['0x1p4', 16],
    ['0x1.8p1', 3],
    ['-0x1p-2', -0.25],
    ['1e-400', 0],
  ])('should parse %s', (param, expected) => {
    expect(parseFloatParam(param)).toEqual({ ok: true, value: expected });
  });

  it('should parse infinities in any case', () => {
    expect(parseFloatParam('inf')).toEqual({ ok: true, value: Infinity });
    expect(parseFloatParam('-Infinity')).toEqual({ ok: true, value: -Infinity });
    expect(parseFloatParam('+INF')).toEqual({ ok: true, value: Infinity });
  });

  it('should parse unsigned nan', () => {
    const result = parseFloatParam('NaN');
    expect(result.ok).toBe(true);
    if (result.ok) expect(Number.isNaN(result.value)).toBe(true);
  });

  it.each(['+nan', '1e400', '0x10', 'abc', '', '1.2.3', '1._5', 'e5'])(
    'should reject %j',
    (param) => {
      expect(parseFloatParam(param)).toEqual(BAD);
    }
  );
});
