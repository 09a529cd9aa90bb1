/**
 * Integer Picture Engine - formatInteger
 */

import { Picture } from '../picture/Picture.js';
import type { IntegerInput } from './IntegerFormatter.js';

/**
 * Format `value` according to `picture`.
 *
 * The picture is parsed afresh on every call; nothing is cached.
 *
 * @example
 * ```typescript
 * formatInteger(1234, '0,000');        // "1,234"
 * formatInteger(-1222333n, '0,000');   // "-1,222,333"
 * formatInteger(15, '١');              // "١٥"
 * ```
 *
 * @throws InvalidPictureError if the picture is malformed
 */
export function formatInteger(value: IntegerInput, picture: string): string {
  return Picture.parse(picture).format(value);
}
