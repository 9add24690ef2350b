/**
 * Unit tests for American odds conversions
 */

import { InvalidOddsError } from '../../errors/index';
import { americanToDecimal, americanToProbability, formatAmerican } from '../odds-math';

describe('Odds Math', () => {
  describe('americanToProbability', () => {
    it('should convert favourites', () => {
      expect(americanToProbability(-150)).toBeCloseTo(0.6, 10);
      expect(americanToProbability(-100)).toBe(0.5);
    });

    it('should convert underdogs', () => {
      expect(americanToProbability(200)).toBeCloseTo(1 / 3, 10);
      expect(americanToProbability(100)).toBe(0.5);
    });

    it('should reject zero and non-finite odds', () => {
      expect(() => americanToProbability(0)).toThrow(InvalidOddsError);
      expect(() => americanToProbability(0)).toThrow('Invalid American odds: 0');
      expect(() => americanToProbability(Number.NaN)).toThrow(InvalidOddsError);
      expect(() => americanToProbability(Number.POSITIVE_INFINITY)).toThrow(InvalidOddsError);
    });
  });

  describe('americanToDecimal', () => {
    it('should include the stake', () => {
      expect(americanToDecimal(200)).toBe(3);
      expect(americanToDecimal(-150)).toBeCloseTo(1.6667, 4);
      expect(americanToDecimal(-100)).toBe(2);
    });

    it('should reject zero', () => {
      expect(() => americanToDecimal(0)).toThrow(InvalidOddsError);
    });
  });

  describe('formatAmerican', () => {
    it('should sign positive prices', () => {
      expect(formatAmerican(150)).toBe('+150');
      expect(formatAmerican(-110)).toBe('-110');
    });
  });
});
