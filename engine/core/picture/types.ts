/**
 * Integer Picture Engine - Picture Types
 *
 * Signs, patterns and error reasons shared by the parser, the classifier and
 * the formatter.
 */

import type { DigitFamily } from '../unicode/DigitClassifier.js';

// =============================================================================
// Signs
// =============================================================================

/**
 * One position of a picture string, in reading order.
 */
export type Sign =
  | { type: 'optionalDigit' }
  | { type: 'mandatoryDigit' }
  | { type: 'groupSeparator'; char: string };

export const OPTIONAL_DIGIT: Sign = { type: 'optionalDigit' };
export const MANDATORY_DIGIT: Sign = { type: 'mandatoryDigit' };

export function groupSeparator(char: string): Sign {
  return { type: 'groupSeparator', char };
}

// =============================================================================
// Patterns
// =============================================================================

/** One separator repeated every `groupSize` digits, indefinitely */
export interface RegularPattern {
  type: 'regular';
  separator: string;
  groupSize: number;
  /** Number of mandatory digits in the picture; bounds zero padding */
  mandatoryDigitMax: number;
}

/** An explicit sign list, followed by optional digits once exhausted */
export interface NonRegularPattern {
  type: 'nonRegular';
  /** Signs in picture (left-to-right) order */
  signs: readonly Sign[];
  mandatoryDigitMax: number;
}

export type Pattern = RegularPattern | NonRegularPattern;

// =============================================================================
// Parse Output
// =============================================================================

export interface ParsedSigns {
  signs: Sign[];
  /** Family of the picture's mandatory digits, if it has any */
  digitFamily: DigitFamily | null;
}

// =============================================================================
// Errors
// =============================================================================

export type PictureErrorReason =
  | 'empty'
  | 'unrecognizedCharacter'
  | 'mixedDigitFamilies'
  | 'optionalDigitAfterMandatory'
  | 'leadingSeparator'
  | 'adjacentSeparators'
  | 'trailingSeparator'
  | 'danglingOptionalDigit';
