/**
 * Integer Picture Engine - Pattern Classifier
 *
 * Decides whether a validated sign list is "regular" (one separator repeated
 * every N digits) and exposes both kinds of pattern as an endless sign stream,
 * least significant position first.
 *
 * Examples:
 *   #,##0      regular    (',' every 3)
 *   0 000 000  regular    (' ' every 3)
 *   1,222.000  nonRegular (two different separators)
 *   12.22.000  nonRegular (group sizes 3 then 2)
 *   0000       nonRegular (no separator)
 */

import {
  Sign,
  Pattern,
  RegularPattern,
  NonRegularPattern,
  OPTIONAL_DIGIT,
  MANDATORY_DIGIT,
  groupSeparator,
} from './types.js';

// =============================================================================
// Classification
// =============================================================================

export function countMandatoryDigits(signs: readonly Sign[]): number {
  return signs.filter((sign) => sign.type === 'mandatoryDigit').length;
}

export function nonRegularPattern(signs: readonly Sign[]): NonRegularPattern {
  return {
    type: 'nonRegular',
    signs: [...signs],
    mandatoryDigitMax: countMandatoryDigits(signs),
  };
}

/**
 * Detect uniform grouping, scanning from the low-order end of the picture.
 * Returns null when there is no separator or the groups disagree.
 */
export function detectRegular(signs: readonly Sign[]): RegularPattern | null {
  let separator: string | null = null;
  let groupSize: number | null = null;
  let count = 0;
  let mandatoryDigitMax = 0;

  for (let i = signs.length - 1; i >= 0; i--) {
    const sign = signs[i];

    switch (sign.type) {
      case 'groupSeparator':
        if (separator !== null && separator !== sign.char) return null;
        if (groupSize !== null && groupSize !== count) return null;
        separator = sign.char;
        groupSize = count;
        count = 0;
        break;

      case 'mandatoryDigit':
        mandatoryDigitMax++;
        count++;
        break;

      case 'optionalDigit':
        count++;
        break;
    }
  }

  if (separator === null || groupSize === null) return null;

  return {
    type: 'regular',
    separator,
    groupSize,
    mandatoryDigitMax,
  };
}

export function classifyPattern(signs: readonly Sign[]): Pattern {
  return detectRegular(signs) ?? nonRegularPattern(signs);
}

// =============================================================================
// Sign Streams
// =============================================================================

function* regularSigns(pattern: RegularPattern): Generator<Sign, void, undefined> {
  const separator = groupSeparator(pattern.separator);
  for (;;) {
    for (let i = 0; i < pattern.groupSize; i++) {
      yield MANDATORY_DIGIT;
    }
    yield separator;
  }
}

function* nonRegularSigns(pattern: NonRegularPattern): Generator<Sign, void, undefined> {
  for (let i = pattern.signs.length - 1; i >= 0; i--) {
    yield pattern.signs[i];
  }
  for (;;) {
    yield OPTIONAL_DIGIT;
  }
}

/**
 * Endless sign supply, least significant position first.
 * Each call starts a fresh stream.
 */
export function signStream(pattern: Pattern): Generator<Sign, void, undefined> {
  switch (pattern.type) {
    case 'regular':
      return regularSigns(pattern);
    case 'nonRegular':
      return nonRegularSigns(pattern);
  }
}

/**
 * Materialize the first `count` signs of a stream (inspection and tests).
 */
export function takeSigns(pattern: Pattern, count: number): Sign[] {
  const taken: Sign[] = [];
  if (count <= 0) return taken;

  for (const sign of signStream(pattern)) {
    taken.push(sign);
    if (taken.length >= count) break;
  }
  return taken;
}
