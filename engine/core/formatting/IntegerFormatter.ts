/**
 * Integer Picture Engine - Integer Formatter
 *
 * Digit emission for a classified pattern.
 *
 * Algorithm:
 * 1. Split off the sign and render |value| in ASCII decimal
 * 2. Reverse the digits (least significant first) and append the zero
 *    padding the picture's mandatory digits call for
 * 3. Walk the endless sign stream alongside the digits, emitting digits
 *    (transliterated into the picture's family) and separators
 * 4. Stop as soon as the digits run out, then put '-' on and reverse
 *
 * Termination depends only on the digit supply, never on the sign stream, so
 * numbers wider than the picture keep growing through the repeated group (or
 * through the implicit optional digits of an irregular picture).
 */

import { DigitFamily, AsciiDigit, toAsciiDigits } from '../unicode/DigitClassifier.js';
import { signStream } from '../picture/PatternClassifier.js';
import type { Pattern } from '../picture/types.js';

// =============================================================================
// Types
// =============================================================================

/** Values accepted by the formatter; numbers must be safe integers */
export type IntegerInput = bigint | number;

const MINUS_SIGN = '-';

// =============================================================================
// Input Conversion
// =============================================================================

/**
 * @throws RangeError for non-integral or unsafe numbers
 */
export function toBigInt(value: IntegerInput): bigint {
  if (typeof value === 'bigint') return value;

  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot format ${value}: not a safe integer (pass a bigint instead)`);
  }
  return BigInt(value);
}

// =============================================================================
// Rendering
// =============================================================================

/**
 * Digits of |value|, least significant first, padded with '0' up to
 * `mandatoryDigitMax` positions.
 */
export function paddedDigits(magnitude: bigint, mandatoryDigitMax: number): AsciiDigit[] {
  const digits = toAsciiDigits(magnitude.toString()).reverse();
  const zerosNeeded = Math.max(0, mandatoryDigitMax - digits.length);

  for (let i = 0; i < zerosNeeded; i++) {
    digits.push('0');
  }
  return digits;
}

export function renderInteger(
  value: bigint,
  pattern: Pattern,
  digitFamily: DigitFamily | null
): string {
  const isNegative = value < 0n;
  const magnitude = isNegative ? -value : value;

  const digits = paddedDigits(magnitude, pattern.mandatoryDigitMax);
  const output: string[] = [];
  let next = 0;

  for (const sign of signStream(pattern)) {
    if (next >= digits.length) break;

    if (sign.type === 'groupSeparator') {
      output.push(sign.char);
      continue;
    }

    const digit = digits[next++];
    output.push(digitFamily ? digitFamily.digit(digit) : digit);
  }

  if (isNegative) {
    output.push(MINUS_SIGN);
  }

  return output.reverse().join('');
}
