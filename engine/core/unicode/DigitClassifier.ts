/**
 * Integer Picture Engine - Digit Classifier
 *
 * Character-level primitives used by the picture parser:
 * - ASCII digit values
 * - Decimal digit families (one ten-character block per script)
 * - Group separator legality
 */

import {
  GeneralCategory,
  generalCategory,
  decimalDigitRun,
} from './UnicodeProperties.js';

// =============================================================================
// ASCII Digits
// =============================================================================

export type AsciiDigit = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9';

const ASCII_ZERO = 0x30;

export function isAsciiDigit(char: string): char is AsciiDigit {
  return char.length === 1 && char >= '0' && char <= '9';
}

/**
 * Split a string of ASCII digits into digit values.
 * @throws RangeError if any character is not '0'-'9'
 */
export function toAsciiDigits(text: string): AsciiDigit[] {
  const digits: AsciiDigit[] = [];
  for (const char of text) {
    if (!isAsciiDigit(char)) {
      throw new RangeError(`Not an ASCII digit: ${JSON.stringify(char)}`);
    }
    digits.push(char);
  }
  return digits;
}

// =============================================================================
// Digit Families
// =============================================================================

export class DigitFamily {
  /** The family's zero character */
  readonly zero: string;

  private constructor(zero: string) {
    this.zero = zero;
  }

  /**
   * Resolve the digit family of a single character.
   * Returns null for anything that is not one decimal digit code point.
   */
  static of(char: string): DigitFamily | null {
    const cp = char.codePointAt(0);
    if (cp === undefined || String.fromCodePoint(cp) !== char) return null;

    const run = decimalDigitRun(cp);
    if (!run) return null;

    const zero = run.start + Math.floor((cp - run.start) / 10) * 10;
    return new DigitFamily(String.fromCodePoint(zero));
  }

  /**
   * The character for `digit` in this family.
   */
  digit(digit: AsciiDigit): string {
    const zero = this.zero.codePointAt(0) ?? ASCII_ZERO;
    return String.fromCodePoint(zero + (digit.charCodeAt(0) - ASCII_ZERO));
  }

  equals(other: DigitFamily): boolean {
    return this.zero === other.zero;
  }

  /** The zero's code point in U+XXXX notation */
  get codePointLabel(): string {
    return `U+${(this.zero.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`;
  }

  toString(): string {
    return `DigitFamily(${this.codePointLabel})`;
  }
}

// =============================================================================
// Group Separators
// =============================================================================

/** Letters and numbers can never separate groups */
const NON_SEPARATOR_CATEGORIES: ReadonlySet<GeneralCategory> = new Set<GeneralCategory>([
  'Nd', 'Nl', 'No',
  'Lu', 'Ll', 'Lt', 'Lm', 'Lo',
]);

export function isGroupSeparator(char: string): boolean {
  return !NON_SEPARATOR_CATEGORIES.has(generalCategory(char));
}
