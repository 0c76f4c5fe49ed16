import { describe, it, expect } from 'vitest';
import { checkCompleteness, looksTruncated } from '../../completeness.js';

const withMarker = (length: number): string => {
  const marker = ' Target Surprise: Low.';
  return 'a'.repeat(length - marker.length) + marker;
};

describe('Completeness Check', () => {
  describe('checkCompleteness', () => {
    it('should accept answers longer than 2000 characters', () => {
      expect(checkCompleteness('a'.repeat(2001))).toEqual({ complete: true, reason: 'long-answer' });
    });

    it('should accept a windowed answer with an end marker', () => {
      expect(checkCompleteness(withMarker(1000))).toEqual({ complete: true, reason: 'end-marker' });
    });

    it('should reject a windowed answer without an end marker', () => {
      expect(checkCompleteness('a'.repeat(1000))).toEqual({
        complete: false,
        reason: 'missing-end-marker',
      });
    });

    it('should reject a windowed answer that ends mid-token', () => {
      expect(checkCompleteness(`${withMarker(999)}:`)).toEqual({ complete: false, reason: 'truncated' });
    });

    it('should reject answers outside the window', () => {
      expect(checkCompleteness(withMarker(400)).reason).toBe('length-out-of-window');
      expect(checkCompleteness(withMarker(1700)).reason).toBe('length-out-of-window');
    });

    it('should include the window bounds', () => {
      expect(checkCompleteness(withMarker(500)).complete).toBe(true);
      expect(checkCompleteness(withMarker(1500)).complete).toBe(true);
    });
  });

  describe('looksTruncated', () => {
    it('should detect dangling hyphen, bold marker and colon', () => {
      expect(looksTruncated('Emotional Tone -')).toBe(true);
      expect(looksTruncated('Emotional Tone: **')).toBe(true);
      expect(looksTruncated('Emotional Tone:  \n')).toBe(true);
      expect(looksTruncated('Emotional Tone: Warm')).toBe(false);
    });
  });
});
