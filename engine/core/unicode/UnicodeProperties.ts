/**
 * Integer Picture Engine - Unicode Properties
 *
 * Thin lookup layer over the Unicode character database that ships with the
 * JavaScript engine, reached through regular-expression property escapes.
 *
 * Provides:
 * - General category of a character
 * - Decimal digit (Nd) membership for code points
 * - The contiguous Nd run a code point belongs to
 */

// =============================================================================
// Types
// =============================================================================

export type GeneralCategory =
  // Letters
  | 'Lu' | 'Ll' | 'Lt' | 'Lm' | 'Lo'
  // Marks
  | 'Mn' | 'Mc' | 'Me'
  // Numbers
  | 'Nd' | 'Nl' | 'No'
  // Punctuation
  | 'Pc' | 'Pd' | 'Ps' | 'Pe' | 'Pi' | 'Pf' | 'Po'
  // Symbols
  | 'Sm' | 'Sc' | 'Sk' | 'So'
  // Separators
  | 'Zs' | 'Zl' | 'Zp'
  // Other
  | 'Cc' | 'Cf' | 'Cs' | 'Co' | 'Cn';

export interface CodePointRange {
  /** First code point of the range (inclusive) */
  start: number;
  /** Last code point of the range (inclusive) */
  end: number;
}

// =============================================================================
// Category Lookup
// =============================================================================

const CATEGORY_PATTERNS: ReadonlyArray<readonly [GeneralCategory, RegExp]> = [
  ['Lu', /^\p{Lu}$/u],
  ['Ll', /^\p{Ll}$/u],
  ['Lt', /^\p{Lt}$/u],
  ['Lm', /^\p{Lm}$/u],
  ['Lo', /^\p{Lo}$/u],
  ['Mn', /^\p{Mn}$/u],
  ['Mc', /^\p{Mc}$/u],
  ['Me', /^\p{Me}$/u],
  ['Nd', /^\p{Nd}$/u],
  ['Nl', /^\p{Nl}$/u],
  ['No', /^\p{No}$/u],
  ['Pc', /^\p{Pc}$/u],
  ['Pd', /^\p{Pd}$/u],
  ['Ps', /^\p{Ps}$/u],
  ['Pe', /^\p{Pe}$/u],
  ['Pi', /^\p{Pi}$/u],
  ['Pf', /^\p{Pf}$/u],
  ['Po', /^\p{Po}$/u],
  ['Sm', /^\p{Sm}$/u],
  ['Sc', /^\p{Sc}$/u],
  ['Sk', /^\p{Sk}$/u],
  ['So', /^\p{So}$/u],
  ['Zs', /^\p{Zs}$/u],
  ['Zl', /^\p{Zl}$/u],
  ['Zp', /^\p{Zp}$/u],
  ['Cc', /^\p{Cc}$/u],
  ['Cf', /^\p{Cf}$/u],
  ['Cs', /^\p{Cs}$/u],
  ['Co', /^\p{Co}$/u],
];

const DECIMAL_NUMBER = /^\p{Nd}$/u;

const MAX_CODE_POINT = 0x10ffff;

/**
 * General category of the first code point of `char`.
 * Anything the database does not assign (including the empty string) is 'Cn'.
 */
export function generalCategory(char: string): GeneralCategory {
  const cp = char.codePointAt(0);
  if (cp === undefined) return 'Cn';

  const single = String.fromCodePoint(cp);
  for (const [category, pattern] of CATEGORY_PATTERNS) {
    if (pattern.test(single)) {
      return category;
    }
  }
  return 'Cn';
}

// =============================================================================
// Decimal Digits
// =============================================================================

export function isDecimalDigitCodePoint(cp: number): boolean {
  if (!Number.isInteger(cp) || cp < 0 || cp > MAX_CODE_POINT) return false;
  return DECIMAL_NUMBER.test(String.fromCodePoint(cp));
}

/**
 * Find the maximal run of consecutive Nd code points containing `cp`.
 *
 * Most scripts have exactly one ten-digit run; a few blocks (the mathematical
 * alphanumeric digits, for instance) pack several families back to back.
 */
export function decimalDigitRun(cp: number): CodePointRange | null {
  if (!isDecimalDigitCodePoint(cp)) return null;

  let start = cp;
  while (isDecimalDigitCodePoint(start - 1)) {
    start--;
  }

  let end = cp;
  while (isDecimalDigitCodePoint(end + 1)) {
    end++;
  }

  return { start, end };
}
