/**
 * formatInteger Tests
 *
 * End-to-end behaviour of the public operation:
 * - Zero padding
 * - Regular and irregular grouping
 * - Optional digits
 * - Digit script transliteration
 * - Picture errors
 */

import { describe, it, expect } from 'vitest';
import { formatInteger } from './formatInteger.js';
import { InvalidPictureError } from '../picture/PictureParser.js';

describe('formatInteger', () => {
  // ===========================================================================
  // Padding
  // ===========================================================================

  describe('Zero padding', () => {
    it('should format an integer wider than the picture', () => {
      expect(formatInteger(123, '1')).toBe('123');
    });

    it('should pad to the number of mandatory digits', () => {
      expect(formatInteger(123, '0000')).toBe('0123');
    });

    it('should pad negative numbers after the sign', () => {
      expect(formatInteger(-123, '00000')).toBe('-00123');
      expect(formatInteger(-123, '0000')).toBe('-0123');
    });

    it('should match plain zero padding for pictures without separators', () => {
      for (const value of [0, 7, 42, -42, 1234, -98765]) {
        const magnitude = String(Math.abs(value)).padStart(4, '0');
        expect(formatInteger(value, '0000')).toBe(value < 0 ? `-${magnitude}` : magnitude);
      }
    });

    it('should format zero', () => {
      expect(formatInteger(0, '0')).toBe('0');
      expect(formatInteger(0, '000')).toBe('000');
      expect(formatInteger(0n, '#,##0')).toBe('0');
    });
  });

  // ===========================================================================
  // Grouping
  // ===========================================================================

  describe('Regular grouping', () => {
    it('should insert thousands separators', () => {
      expect(formatInteger(1234, '0,000')).toBe('1,234');
      expect(formatInteger(4321, '0,000')).toBe('4,321');
    });

    it('should pad through a separator', () => {
      expect(formatInteger(4321, '00,000')).toBe('04,321');
    });

    it('should keep repeating the group to the left', () => {
      expect(formatInteger(1_222_333, '0,000')).toBe('1,222,333');
      expect(formatInteger(-1_222_333, '0,000')).toBe('-1,222,333');
    });

    it('should handle integers beyond the safe number range', () => {
      expect(formatInteger(10n ** 30n, '#,##0')).toBe(`1${',000'.repeat(10)}`);
      expect(formatInteger(-(2n ** 64n), '0 000')).toBe('-18 446 744 073 709 551 616');
    });

    it('should accept any non-alphanumeric separator', () => {
      expect(formatInteger(123, '0!0')).toBe('1!2!3');
      expect(formatInteger(1234567, "0'000")).toBe("1'234'567");
    });
  });

  describe('Irregular grouping', () => {
    it('should use different separators as written', () => {
      expect(formatInteger(1_222_333, '1,222.000')).toBe('1,222.333');
    });

    it('should use different group sizes as written', () => {
      expect(formatInteger(1_222_333, '12.22.000')).toBe('12.22.333');
    });

    it('should format Indian-style grouping for numbers that fit', () => {
      expect(formatInteger(1234567, '00,00,000')).toBe('12,34,567');
    });

    it('should not repeat irregular groups past the picture', () => {
      expect(formatInteger(123456789, '0,00,000')).toBe('1234,56,789');
    });
  });

  // ===========================================================================
  // Optional Digits
  // ===========================================================================

  describe('Optional digits', () => {
    it('should fill optional digits only when digits remain', () => {
      expect(formatInteger(15, '#1')).toBe('15');
      expect(formatInteger(5, '##0')).toBe('5');
    });

    it('should group with optional digits', () => {
      expect(formatInteger(15453, '#,##1')).toBe('15,453');
    });

    it('should combine optional digits with irregular groups', () => {
      expect(formatInteger(1_000_000, '#.##,##1')).toBe('10.00,000');
    });
  });

  // ===========================================================================
  // Digit Families
  // ===========================================================================

  describe('Digit families', () => {
    it('should transliterate into Arabic-Indic digits', () => {
      expect(formatInteger(15, '\u0661')).toBe('\u0661\u0665'); // ١٥
    });

    it("should substitute N'Ko digits character by character", () => {
      expect(formatInteger(15, '\u07C0')).toBe('\u07C1\u07C5'); // ߁߅
    });

    it('should group in another digit family', () => {
      expect(formatInteger(1234567, '\u0660,\u0660\u0660\u0660')).toBe(
        '\u0661,\u0662\u0663\u0664,\u0665\u0666\u0667'
      );
    });

    it('should pad with the family zero', () => {
      expect(formatInteger(-7, '\u0966\u0966\u0966')).toBe('-\u0966\u0966\u096D');
    });

    it('should transliterate into astral digit families', () => {
      expect(formatInteger(90, '\u{1D7F6}')).toBe('\u{1D7FF}\u{1D7F6}'); // 𝟿𝟶
    });
  });

  // ===========================================================================
  // Errors
  // ===========================================================================

  describe('Invalid pictures', () => {
    const invalid = ['0,,0', ',0', '0,', '#', '0#0', '0\u0660', '0b0', '0,#0', ''];

    for (const picture of invalid) {
      it(`should reject ${JSON.stringify(picture)}`, () => {
        expect(() => formatInteger(1, picture)).toThrow(InvalidPictureError);
      });
    }

    it('should reject non-integral numbers', () => {
      expect(() => formatInteger(1.5, '0')).toThrow(RangeError);
    });
  });
});
