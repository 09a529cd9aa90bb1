/**
 * UnicodeProperties Unit Tests
 */

import { describe, it, expect } from 'vitest';
import {
  generalCategory,
  isDecimalDigitCodePoint,
  decimalDigitRun,
} from './UnicodeProperties.js';

describe('UnicodeProperties', () => {
  describe('generalCategory', () => {
    it('should classify letters', () => {
      expect(generalCategory('A')).toBe('Lu');
      expect(generalCategory('a')).toBe('Ll');
      expect(generalCategory('\u01C5')).toBe('Lt'); // ǅ
      expect(generalCategory('\u02B0')).toBe('Lm'); // ʰ
      expect(generalCategory('\u4E2D')).toBe('Lo'); // 中
    });

    it('should classify numbers', () => {
      expect(generalCategory('5')).toBe('Nd');
      expect(generalCategory('\u0665')).toBe('Nd'); // ٥
      expect(generalCategory('\u2163')).toBe('Nl'); // Ⅳ
      expect(generalCategory('\u00BD')).toBe('No'); // ½
    });

    it('should classify punctuation, symbols and spaces', () => {
      expect(generalCategory(',')).toBe('Po');
      expect(generalCategory('-')).toBe('Pd');
      expect(generalCategory('(')).toBe('Ps');
      expect(generalCategory(')')).toBe('Pe');
      expect(generalCategory('_')).toBe('Pc');
      expect(generalCategory('$')).toBe('Sc');
      expect(generalCategory('+')).toBe('Sm');
      expect(generalCategory(' ')).toBe('Zs');
      expect(generalCategory('\u00A0')).toBe('Zs'); // no-break space
    });

    it('should classify controls and unassigned code points', () => {
      expect(generalCategory('\t')).toBe('Cc');
      expect(generalCategory('\u0378')).toBe('Cn');
      expect(generalCategory('')).toBe('Cn');
    });

    it('should only look at the first code point', () => {
      expect(generalCategory('a1')).toBe('Ll');
      expect(generalCategory('\u{1D7D8}x')).toBe('Nd'); // 𝟘
    });
  });

  describe('isDecimalDigitCodePoint', () => {
    it('should accept decimal digits of any script', () => {
      expect(isDecimalDigitCodePoint(0x30)).toBe(true);
      expect(isDecimalDigitCodePoint(0x39)).toBe(true);
      expect(isDecimalDigitCodePoint(0x0660)).toBe(true);
      expect(isDecimalDigitCodePoint(0x07c0)).toBe(true);
    });

    it('should reject everything else', () => {
      expect(isDecimalDigitCodePoint(0x2f)).toBe(false);
      expect(isDecimalDigitCodePoint(0x3a)).toBe(false);
      expect(isDecimalDigitCodePoint(0x2160)).toBe(false);
      expect(isDecimalDigitCodePoint(-1)).toBe(false);
      expect(isDecimalDigitCodePoint(0x110000)).toBe(false);
      expect(isDecimalDigitCodePoint(1.5)).toBe(false);
    });
  });

  describe('decimalDigitRun', () => {
    it('should find the ASCII run', () => {
      expect(decimalDigitRun(0x35)).toEqual({ start: 0x30, end: 0x39 });
    });

    it('should find the Arabic-Indic run', () => {
      expect(decimalDigitRun(0x0669)).toEqual({ start: 0x0660, end: 0x0669 });
    });

    it('should find runs spanning several families', () => {
      // Mathematical bold, double-struck, sans-serif, sans-serif bold, monospace
      expect(decimalDigitRun(0x1d7db)).toEqual({ start: 0x1d7ce, end: 0x1d7ff });
    });

    it('should return null for non-digits', () => {
      expect(decimalDigitRun(0x61)).toBeNull();
      expect(decimalDigitRun(0x2c)).toBeNull();
    });
  });
});
