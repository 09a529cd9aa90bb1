/**
 * Integer Picture Engine - Core Module Exports
 *
 * This is the main entry point for the picture formatting engine.
 */

// Public operation
export { formatInteger } from './formatting/formatInteger.js';
export { Picture } from './picture/Picture.js';

// Formatter
export { renderInteger, paddedDigits, toBigInt } from './formatting/IntegerFormatter.js';
export type { IntegerInput } from './formatting/IntegerFormatter.js';

// Picture parsing & classification
export {
  InvalidPictureError,
  parseSigns,
  validateSigns,
  parsePictureSigns,
} from './picture/PictureParser.js';
export {
  classifyPattern,
  detectRegular,
  nonRegularPattern,
  countMandatoryDigits,
  signStream,
  takeSigns,
} from './picture/PatternClassifier.js';
export { OPTIONAL_DIGIT, MANDATORY_DIGIT, groupSeparator } from './picture/types.js';
export type {
  Sign,
  Pattern,
  RegularPattern,
  NonRegularPattern,
  ParsedSigns,
  PictureErrorReason,
} from './picture/types.js';

// Digit classification
export {
  DigitFamily,
  isAsciiDigit,
  toAsciiDigits,
  isGroupSeparator,
} from './unicode/DigitClassifier.js';
export type { AsciiDigit } from './unicode/DigitClassifier.js';

// Unicode properties
export {
  generalCategory,
  isDecimalDigitCodePoint,
  decimalDigitRun,
} from './unicode/UnicodeProperties.js';
export type { GeneralCategory, CodePointRange } from './unicode/UnicodeProperties.js';
