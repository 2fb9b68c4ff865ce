/**
 * Value model for rule evaluation.
 *
 * Every input is normalized into a closed tagged union before a validator
 * looks at it. Integer widths collapse into one signed and one unsigned
 * `bigint` form, float widths into `number`, so validators carry a single
 * branch per numeric family.
 *
 * Plain JS values are classified by {@link toValue}. Kinds JavaScript cannot
 * express on its own (unsigned integers, fixed widths, float32, references)
 * are built explicitly through the {@link Value} constructors.
 *
 * @module values/value
 */

const VALUE_TAG: unique symbol = Symbol('tagvalid.value');

interface Tagged {
  readonly [VALUE_TAG]: true;
}

export type StringValue = Tagged & { readonly kind: 'string'; readonly value: string };
export type IntValue = Tagged & { readonly kind: 'int'; readonly value: bigint };
export type UintValue = Tagged & { readonly kind: 'uint'; readonly value: bigint };
export type FloatValue = Tagged & { readonly kind: 'float'; readonly value: number };
export type BoolValue = Tagged & { readonly kind: 'bool'; readonly value: boolean };
export type SequenceValue = Tagged & { readonly kind: 'sequence'; readonly items: readonly unknown[] };
export type MappingValue = Tagged & {
  readonly kind: 'mapping';
  readonly entries: ReadonlyMap<unknown, unknown> | ReadonlySet<unknown>;
};
export type ArrayValue = Tagged & { readonly kind: 'array'; readonly items: ArrayLike<unknown> };
/** A reference; `target` of `null` (or `undefined`) is a null reference. */
export type PointerValue = Tagged & { readonly kind: 'pointer'; readonly target: unknown };
export type RecordValue = Tagged & { readonly kind: 'record'; readonly value: object };
/** Absence of any typed value (untyped nil). */
export type InvalidValue = Tagged & { readonly kind: 'invalid' };
export type UnsupportedValue = Tagged & { readonly kind: 'unsupported'; readonly typeName: string };

export type Value =
  | StringValue
  | IntValue
  | UintValue
  | FloatValue
  | BoolValue
  | SequenceValue
  | MappingValue
  | ArrayValue
  | PointerValue
  | RecordValue
  | InvalidValue
  | UnsupportedValue;

export type ValueKind = Value['kind'];

export type IntWidth = 8 | 16 | 32 | 64;

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;
export const UINT64_MAX = 2n ** 64n - 1n;

function tag<T extends { readonly kind: ValueKind }>(body: T): T & Tagged {
  return { ...body, [VALUE_TAG]: true as const };
}

function integral(n: bigint | number, ctor: string): bigint {
  if (typeof n === 'bigint') return n;
  if (!Number.isInteger(n)) {
    throw new RangeError(`Value.${ctor} expects an integer, got ${n}`);
  }
  return BigInt(n);
}

export const Value = {
  string: (value: string): StringValue => tag({ kind: 'string', value }),

  /** Signed integer of the given width; out-of-width input wraps. */
  int: (n: bigint | number, bits: IntWidth = 64): IntValue =>
    tag({ kind: 'int', value: BigInt.asIntN(bits, integral(n, 'int')) }),

  /** Unsigned integer of the given width; out-of-width input wraps. */
  uint: (n: bigint | number, bits: IntWidth = 64): UintValue =>
    tag({ kind: 'uint', value: BigInt.asUintN(bits, integral(n, 'uint')) }),

  float: (value: number): FloatValue => tag({ kind: 'float', value }),

  float32: (value: number): FloatValue => tag({ kind: 'float', value: Math.fround(value) }),

  bool: (value: boolean): BoolValue => tag({ kind: 'bool', value }),

  sequence: (items: readonly unknown[]): SequenceValue => tag({ kind: 'sequence', items }),

  mapping: (entries: ReadonlyMap<unknown, unknown> | ReadonlySet<unknown>): MappingValue =>
    tag({ kind: 'mapping', entries }),

  array: (items: ArrayLike<unknown>): ArrayValue => tag({ kind: 'array', items }),

  ref: (target: unknown): PointerValue => tag({ kind: 'pointer', target }),

  record: (value: object): RecordValue => tag({ kind: 'record', value }),

  invalid: (): InvalidValue => tag({ kind: 'invalid' }),

  unsupported: (typeName: string): UnsupportedValue => tag({ kind: 'unsupported', typeName }),
};

export function isValue(input: unknown): input is Value {
  return typeof input === 'object' && input !== null && VALUE_TAG in input;
}

function isTypedArray(input: unknown): input is ArrayLike<unknown> {
  return ArrayBuffer.isView(input) && !(input instanceof DataView);
}

/**
 * Classify a runtime value. Already-tagged values are returned as is.
 */
export function toValue(input: unknown): Value {
  if (isValue(input)) return input;

  if (input === null || input === undefined) return Value.invalid();
  if (typeof input === 'string') return Value.string(input);
  if (typeof input === 'boolean') return Value.bool(input);
  if (typeof input === 'number') {
    return Number.isSafeInteger(input) ? Value.int(input) : Value.float(input);
  }
  if (typeof input === 'bigint') {
    if (input >= INT64_MIN && input <= INT64_MAX) return Value.int(input);
    if (input > INT64_MAX && input <= UINT64_MAX) return Value.uint(input);
    return Value.unsupported('bigint');
  }
  if (typeof input === 'object') {
    if (Array.isArray(input)) return Value.sequence(input);
    if (isTypedArray(input)) return Value.array(input);
    if (input instanceof Map || input instanceof Set) return Value.mapping(input);
    return Value.record(input);
  }
  // function, symbol
  return Value.unsupported(typeof input);
}

export function kindOf(input: unknown): ValueKind {
  return toValue(input).kind;
}

/** Number of Unicode code points; a lone surrogate counts as one. */
export function codePointCount(s: string): number {
  let count = 0;
  for (const _ of s) count++;
  return count;
}

/** Element count for the collection kinds. */
export function sizeOf(value: SequenceValue | MappingValue | ArrayValue): number {
  switch (value.kind) {
    case 'sequence':
    case 'array':
      return value.items.length;
    case 'mapping':
      return value.entries.size;
  }
}
