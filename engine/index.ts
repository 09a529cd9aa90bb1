/**
 * Integer Picture Engine
 *
 * Formats arbitrary-precision integers with XPath-style decimal digit
 * pictures:
 * - Mandatory digits ('0', or any digit of another script) with zero padding
 * - Optional digits ('#') before the mandatory ones
 * - Grouping separators, regular (repeated) or irregular
 * - Output in the picture's digit script (Arabic-Indic, Devanagari, N'Ko, ...)
 *
 * @example
 * ```typescript
 * import { formatInteger, Picture } from '@integer-picture/engine';
 *
 * formatInteger(1234, '0,000');            // "1,234"
 * formatInteger(4321, '00,000');           // "04,321"
 * formatInteger(1222333n, '1,222.000');    // "1,222.333"
 *
 * const picture = Picture.parse('#,##0');
 * picture.format(-9876543210n);            // "-9,876,543,210"
 * ```
 */

export * from './core/index.js';
