/**
 * tagvalid: rule-based validation of runtime values.
 *
 * @example
 * ```ts
 * import { BUILTIN_VALIDATORS, Value } from 'tagvalid';
 *
 * BUILTIN_VALIDATORS.min('abc', '5');          // ValidationError: less than min
 * BUILTIN_VALIDATORS.max(Value.uint(7), '10'); // null
 * ```
 *
 * @module tagvalid
 */

export {
  Value,
  toValue,
  isValue,
  kindOf,
  codePointCount,
  sizeOf,
  INT64_MIN,
  INT64_MAX,
  UINT64_MAX,
  type ValueKind,
  type IntWidth,
  type StringValue,
  type IntValue,
  type UintValue,
  type FloatValue,
  type BoolValue,
  type SequenceValue,
  type MappingValue,
  type ArrayValue,
  type PointerValue,
  type RecordValue,
  type InvalidValue,
  type UnsupportedValue,
} from './values/value.js';

export {
  parseIntParam,
  parseUintParam,
  parseFloatParam,
  type ParamResult,
} from './params/coerce.js';

export {
  ValidationError,
  ValidationErrorCode,
  ERR_ZERO_VALUE,
  ERR_ZERO_VALUE_EMPTY,
  ERR_ZERO_VALUE_NUMBER,
  ERR_ZERO_VALUE_BOOL,
  ERR_BAD_PARAMETER,
  ERR_UNSUPPORTED,
  lengthMismatch,
  belowMinimum,
  aboveMaximum,
  patternMismatch,
  unknownRule,
  isBoundViolation,
  isConfigurationError,
  isValueError,
  type ValidationErrorDetail,
  type BoundDetail,
  type BoundDomain,
  type BoundCode,
  type ZeroVariant,
} from './errors/validation-errors.js';

export {
  BUILTIN_VALIDATORS,
  isBuiltinRule,
  nonzero,
  length,
  min,
  max,
  checkBound,
  regexp,
  createRegexpValidator,
  translatePattern,
  type BoundRule,
  type RegexpValidatorOptions,
  type ValidatorFn,
  type BuiltinRuleName,
} from './builtins/index.js';

export {
  findUnsafePattern,
  isSafePattern,
  DEFAULT_MAX_PATTERN_LENGTH,
} from './deterministic/regex-safety.js';

export { RuleEngine, type RuleEngineOptions } from './engine/rule-engine.js';

export {
  ConfigError,
  DEFAULT_ENGINE_CONFIG,
  parseEngineConfig,
  type EngineConfig,
  type ConfigIssue,
} from './config/schema.js';
export { CONFIG_FILES, findEngineConfig, loadEngineConfig } from './config/loader.js';

export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogSink,
} from './utils/logger.js';
