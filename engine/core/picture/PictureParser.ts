/**
 * Integer Picture Engine - Picture Parser
 *
 * Turns a picture string into an ordered sign list and checks its structure.
 *
 * Picture alphabet:
 *   #            optional digit (only before any mandatory digit)
 *   0-9, ٠-٩ ... mandatory digit, all from one decimal digit family
 *   , . ' space  group separator (any character that is not a letter or number)
 *
 * Structural rules:
 * - No leading, trailing or adjacent group separators
 * - An optional digit is always followed by another sign
 */

import { DigitFamily, isGroupSeparator } from '../unicode/DigitClassifier.js';
import {
  Sign,
  ParsedSigns,
  PictureErrorReason,
  OPTIONAL_DIGIT,
  MANDATORY_DIGIT,
  groupSeparator,
} from './types.js';

const OPTIONAL_DIGIT_CHAR = '#';

const REASON_MESSAGES: Record<PictureErrorReason, string> = {
  empty: 'picture is empty',
  unrecognizedCharacter: 'character is neither a digit nor a legal group separator',
  mixedDigitFamilies: 'digit belongs to a different digit family than the first digit',
  optionalDigitAfterMandatory: "optional digit '#' follows a mandatory digit",
  leadingSeparator: 'picture starts with a group separator',
  adjacentSeparators: 'group separator follows another group separator',
  trailingSeparator: 'picture ends with a group separator',
  danglingOptionalDigit: "optional digit '#' is not followed by a digit or separator",
};

// =============================================================================
// Invalid Picture Error
// =============================================================================

export class InvalidPictureError extends Error {
  readonly code = 'InvalidPictureString';
  reason: PictureErrorReason;
  picture: string;
  /** Code point index where the problem was found */
  position: number;

  constructor(reason: PictureErrorReason, picture: string, position: number) {
    super(`Invalid picture string ${JSON.stringify(picture)} at position ${position}: ${REASON_MESSAGES[reason]}`);
    this.name = 'InvalidPictureError';
    this.reason = reason;
    this.picture = picture;
    this.position = position;
  }
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Map each code point of the picture to a sign and detect the digit family.
 * @throws InvalidPictureError
 */
export function parseSigns(picture: string): ParsedSigns {
  const signs: Sign[] = [];
  let digitFamily: DigitFamily | null = null;
  let mandatorySeen = false;
  let position = 0;

  for (const char of picture) {
    if (char === OPTIONAL_DIGIT_CHAR) {
      if (mandatorySeen) {
        throw new InvalidPictureError('optionalDigitAfterMandatory', picture, position);
      }
      signs.push(OPTIONAL_DIGIT);
    } else if (isGroupSeparator(char)) {
      signs.push(groupSeparator(char));
    } else {
      const family = DigitFamily.of(char);
      if (!family) {
        throw new InvalidPictureError('unrecognizedCharacter', picture, position);
      }
      if (digitFamily && !digitFamily.equals(family)) {
        throw new InvalidPictureError('mixedDigitFamilies', picture, position);
      }
      digitFamily = digitFamily ?? family;
      mandatorySeen = true;
      signs.push(MANDATORY_DIGIT);
    }
    position++;
  }

  return { signs, digitFamily };
}

/**
 * Check separator placement and optional digit placement.
 * @throws InvalidPictureError
 */
export function validateSigns(signs: readonly Sign[], picture: string): void {
  if (signs.length === 0) {
    throw new InvalidPictureError('empty', picture, 0);
  }

  if (signs[0].type === 'groupSeparator') {
    throw new InvalidPictureError('leadingSeparator', picture, 0);
  }

  for (let i = 0; i < signs.length; i++) {
    const next: Sign | undefined = signs[i + 1];

    switch (signs[i].type) {
      case 'optionalDigit':
        if (next === undefined) {
          throw new InvalidPictureError('danglingOptionalDigit', picture, i);
        }
        break;

      case 'groupSeparator':
        if (next === undefined) {
          throw new InvalidPictureError('trailingSeparator', picture, i);
        }
        if (next.type === 'groupSeparator') {
          throw new InvalidPictureError('adjacentSeparators', picture, i + 1);
        }
        break;

      case 'mandatoryDigit':
        break;
    }
  }
}

/**
 * Parse and validate in one step.
 * @throws InvalidPictureError
 */
export function parsePictureSigns(picture: string): ParsedSigns {
  const parsed = parseSigns(picture);
  validateSigns(parsed.signs, picture);
  return parsed;
}
