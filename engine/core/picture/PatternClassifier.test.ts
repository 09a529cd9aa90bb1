/**
 * PatternClassifier Unit Tests
 *
 * Tests:
 * - Regular grouping detection
 * - Irregular fallbacks
 * - Endless sign streams for both variants
 */

import { describe, it, expect } from 'vitest';
import {
  classifyPattern,
  detectRegular,
  nonRegularPattern,
  countMandatoryDigits,
  signStream,
  takeSigns,
} from './PatternClassifier.js';
import { parsePictureSigns } from './PictureParser.js';
import { OPTIONAL_DIGIT, MANDATORY_DIGIT, groupSeparator, Pattern } from './types.js';

function classify(picture: string): Pattern {
  return classifyPattern(parsePictureSigns(picture).signs);
}

describe('PatternClassifier', () => {
  // ===========================================================================
  // Regular Detection
  // ===========================================================================

  describe('detectRegular', () => {
    it('should detect thousands grouping', () => {
      expect(classify('0,000')).toEqual({
        type: 'regular',
        separator: ',',
        groupSize: 3,
        mandatoryDigitMax: 4,
      });
    });

    it('should count only mandatory digits towards the padding width', () => {
      expect(classify('#,##0')).toEqual({
        type: 'regular',
        separator: ',',
        groupSize: 3,
        mandatoryDigitMax: 1,
      });
    });

    it('should ignore the size of the leftmost partial group', () => {
      expect(classify('00,000')).toEqual({
        type: 'regular',
        separator: ',',
        groupSize: 3,
        mandatoryDigitMax: 5,
      });
    });

    it('should accept repeated groups', () => {
      expect(classify('0 000 000')).toEqual({
        type: 'regular',
        separator: ' ',
        groupSize: 3,
        mandatoryDigitMax: 7,
      });
    });

    it('should accept single-digit groups', () => {
      expect(classify('0!0')).toEqual({
        type: 'regular',
        separator: '!',
        groupSize: 1,
        mandatoryDigitMax: 2,
      });
    });

    it('should return null without any separator', () => {
      expect(detectRegular(parsePictureSigns('0000').signs)).toBeNull();
    });
  });

  // ===========================================================================
  // Irregular Patterns
  // ===========================================================================

  describe('irregular patterns', () => {
    it('should keep pictures without separators as explicit lists', () => {
      const pattern = classify('0000');
      expect(pattern.type).toBe('nonRegular');
      expect(pattern.mandatoryDigitMax).toBe(4);
    });

    it('should fall back when separators differ', () => {
      const pattern = classify('1,222.000');
      expect(pattern.type).toBe('nonRegular');
      expect(pattern.mandatoryDigitMax).toBe(7);
    });

    it('should fall back when group sizes differ', () => {
      expect(classify('12.22.000').type).toBe('nonRegular');
      expect(classify('0,00,000').type).toBe('nonRegular');
    });

    it('should keep signs in picture order', () => {
      expect(classify('#00')).toEqual({
        type: 'nonRegular',
        signs: [OPTIONAL_DIGIT, MANDATORY_DIGIT, MANDATORY_DIGIT],
        mandatoryDigitMax: 2,
      });
    });

    it('should copy the sign list it is given', () => {
      const signs = [MANDATORY_DIGIT];
      const pattern = nonRegularPattern(signs);
      signs.push(MANDATORY_DIGIT);
      expect(pattern.signs).toHaveLength(1);
    });
  });

  describe('countMandatoryDigits', () => {
    it('should count mandatory digits only', () => {
      expect(countMandatoryDigits(parsePictureSigns('##,#00').signs)).toBe(2);
    });
  });

  // ===========================================================================
  // Sign Streams
  // ===========================================================================

  describe('signStream', () => {
    it('should repeat a regular group indefinitely', () => {
      const comma = groupSeparator(',');
      expect(takeSigns(classify('#,##0'), 8)).toEqual([
        MANDATORY_DIGIT, MANDATORY_DIGIT, MANDATORY_DIGIT, comma,
        MANDATORY_DIGIT, MANDATORY_DIGIT, MANDATORY_DIGIT, comma,
      ]);
    });

    it('should replay an irregular list right to left, then optional digits', () => {
      expect(takeSigns(classify('0.0,0'), 7)).toEqual([
        MANDATORY_DIGIT,
        groupSeparator(','),
        MANDATORY_DIGIT,
        groupSeparator('.'),
        MANDATORY_DIGIT,
        OPTIONAL_DIGIT,
        OPTIONAL_DIGIT,
      ]);
    });

    it('should keep producing signs well past the picture length', () => {
      const signs = takeSigns(classify('00'), 1000);
      expect(signs).toHaveLength(1000);
      expect(signs[999]).toEqual(OPTIONAL_DIGIT);
    });

    it('should start a fresh stream on every call', () => {
      const pattern = classify('0.00');
      const first = signStream(pattern);
      first.next();
      first.next();

      const second = signStream(pattern);
      expect(second.next().value).toEqual(MANDATORY_DIGIT);
      expect(first.next().value).toEqual(groupSeparator('.'));
    });

    it('should take nothing for a non-positive count', () => {
      expect(takeSigns(classify('0'), 0)).toEqual([]);
    });
  });
});
