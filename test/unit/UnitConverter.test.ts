import { describe, it, expect } from 'vitest';
import { pointsToFontSize, percentageToDecimal, decimalToPercentage } from '../../src/core/UnitConverter.js';

describe('UnitConverter', () => {
  describe('font sizes', () => {
    it('should convert points to hundredths of a point', () => {
      expect(pointsToFontSize(18)).toBe(1800);
      expect(pointsToFontSize(10.5)).toBe(1050);
    });
  });

  describe('percentages', () => {
    it('should convert OpenXML percentages to decimals', () => {
      expect(percentageToDecimal(100000)).toBe(1);
      expect(percentageToDecimal(62500)).toBe(0.625);
    });

    it('should convert decimals to OpenXML percentages', () => {
      expect(decimalToPercentage(0.5)).toBe(50000);
      expect(decimalToPercentage(1)).toBe(100000);
      expect(decimalToPercentage(0.7000000000000001)).toBe(70000);
    });
  });
});
