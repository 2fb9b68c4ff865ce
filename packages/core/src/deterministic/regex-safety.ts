export const DEFAULT_MAX_PATTERN_LENGTH = 256;

// Quantifier inside a group followed by a quantifier on the group: (a+)+, (a*){2,}
const NESTED_QUANTIFIER_ON_GROUP = /[+*}]\s*\)\s*[+*{]/;
// Directly adjacent quantifiers: a++, a*+
const ADJACENT_QUANTIFIERS = /[+*}]\s*[+*{]/;
const OVERLAPPING_ALTERNATION = /\.\*.*\|.*\.\*/;

/**
 * Reason the pattern is likely to backtrack catastrophically, or `null`.
 * A heuristic over the pattern text; it does not compile the pattern.
 */
export function findUnsafePattern(
  pattern: string,
  maxLength: number = DEFAULT_MAX_PATTERN_LENGTH
): string | null {
  if (pattern.length > maxLength) {
    return `pattern too long (${pattern.length} chars, max ${maxLength})`;
  }
  if (NESTED_QUANTIFIER_ON_GROUP.test(pattern)) return 'nested quantifier on a group';
  if (ADJACENT_QUANTIFIERS.test(pattern)) return 'adjacent quantifiers';
  if (OVERLAPPING_ALTERNATION.test(pattern)) return 'overlapping wildcard alternation';
  return null;
}

export function isSafePattern(
  pattern: string,
  maxLength: number = DEFAULT_MAX_PATTERN_LENGTH
): boolean {
  return findUnsafePattern(pattern, maxLength) === null;
}
