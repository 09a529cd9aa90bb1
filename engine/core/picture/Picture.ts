/**
 * Integer Picture Engine - Picture
 *
 * A parsed, validated and classified picture string. Immutable; build one per
 * format request with Picture.parse().
 *
 * @example
 * ```typescript
 * const picture = Picture.parse('#,##0');
 * picture.format(1234567n); // "1,234,567"
 * picture.isRegular;        // true
 * ```
 */

import type { DigitFamily } from '../unicode/DigitClassifier.js';
import { renderInteger, toBigInt, IntegerInput } from '../formatting/IntegerFormatter.js';
import { parsePictureSigns } from './PictureParser.js';
import { classifyPattern } from './PatternClassifier.js';
import type { Pattern } from './types.js';

export class Picture {
  /** The picture string this was parsed from */
  readonly source: string;
  readonly pattern: Pattern;
  /** Output digit family; null only when the picture has no digit at all */
  readonly digitFamily: DigitFamily | null;

  private constructor(source: string, pattern: Pattern, digitFamily: DigitFamily | null) {
    this.source = source;
    this.pattern = pattern;
    this.digitFamily = digitFamily;
  }

  /**
   * Parse a picture string.
   * @throws InvalidPictureError if the picture is malformed
   */
  static parse(picture: string): Picture {
    const { signs, digitFamily } = parsePictureSigns(picture);
    return new Picture(picture, classifyPattern(signs), digitFamily);
  }

  get isRegular(): boolean {
    return this.pattern.type === 'regular';
  }

  get mandatoryDigitMax(): number {
    return this.pattern.mandatoryDigitMax;
  }

  /**
   * Format an integer. Never fails for integral input.
   * @throws RangeError if `value` is a number that is not a safe integer
   */
  format(value: IntegerInput): string {
    return renderInteger(toBigInt(value), this.pattern, this.digitFamily);
  }
}
