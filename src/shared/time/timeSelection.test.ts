/**
 * Unit tests for time selection helpers
 */
import { describe, expect, it } from 'vitest';
import {
  coerceSeconds,
  combineTimeParts,
  formatClock,
  INVALID_RANGE_MESSAGE,
  parseTimeComponent,
  splitSeconds,
  validateRange,
  withTimeComponent,
} from './timeSelection';

describe('combineTimeParts', () => {
  it('should combine hours, minutes and seconds into seconds', () => {
    expect(combineTimeParts({ hours: 1, minutes: 2, seconds: 3 })).toBe(3723);
  });

  it('should return 0 for an all-zero selection', () => {
    expect(combineTimeParts({ hours: 0, minutes: 0, seconds: 0 })).toBe(0);
  });

  it('should handle the largest selectable time', () => {
    expect(combineTimeParts({ hours: 23, minutes: 59, seconds: 59 })).toBe(
      86399,
    );
  });
});

describe('splitSeconds', () => {
  it('should split seconds back into components', () => {
    expect(splitSeconds(3723)).toEqual({ hours: 1, minutes: 2, seconds: 3 });
  });

  it('should treat invalid totals as zero', () => {
    expect(splitSeconds(-5)).toEqual({ hours: 0, minutes: 0, seconds: 0 });
  });
});

describe('parseTimeComponent', () => {
  it('should parse zero-padded entries', () => {
    expect(parseTimeComponent('07', 'minutes')).toBe(7);
  });

  it('should ignore surrounding whitespace', () => {
    expect(parseTimeComponent(' 12 ', 'seconds')).toBe(12);
  });

  it('should resolve non-numeric entries to 0 without throwing', () => {
    expect(parseTimeComponent('abc', 'seconds')).toBe(0);
    expect(parseTimeComponent('', 'minutes')).toBe(0);
    expect(parseTimeComponent('1.5', 'hours')).toBe(0);
    expect(parseTimeComponent('-3', 'seconds')).toBe(0);
  });

  it('should resolve values outside the unit range to 0', () => {
    expect(parseTimeComponent('24', 'hours')).toBe(0);
    expect(parseTimeComponent('60', 'minutes')).toBe(0);
    expect(parseTimeComponent(45, 'hours')).toBe(0);
  });

  it('should accept the upper bound of each unit', () => {
    expect(parseTimeComponent('23', 'hours')).toBe(23);
    expect(parseTimeComponent('59', 'seconds')).toBe(59);
  });
});

describe('coerceSeconds', () => {
  it('should keep non-negative integers', () => {
    expect(coerceSeconds(90)).toBe(90);
  });

  it('should coerce anything else to 0', () => {
    expect(coerceSeconds(-1)).toBe(0);
    expect(coerceSeconds(2.5)).toBe(0);
    expect(coerceSeconds(Number.NaN)).toBe(0);
    expect(coerceSeconds('30')).toBe(0);
  });
});

describe('withTimeComponent', () => {
  it('should replace one component and keep the others', () => {
    expect(withTimeComponent(3723, 'minutes', 10)).toBe(4203);
  });
});

describe('formatClock', () => {
  it('should format as HH:MM:SS', () => {
    expect(formatClock(3723)).toBe('01:02:03');
    expect(formatClock(0)).toBe('00:00:00');
  });
});

describe('validateRange', () => {
  it('should reject an out time equal to the in time', () => {
    expect(validateRange(10, 10)).toBe(INVALID_RANGE_MESSAGE);
  });

  it('should reject an out time before the in time', () => {
    expect(validateRange(20, 10)).toBe(INVALID_RANGE_MESSAGE);
  });

  it('should accept an out time after the in time', () => {
    expect(validateRange(10, 11)).toBeNull();
  });
});
