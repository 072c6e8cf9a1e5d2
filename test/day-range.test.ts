import {
  formatDisplayDate,
  formatDisplayTime,
  getDayRange,
} from '../utils/day-range';

describe('day range', () => {
  it('spans local midnight to now in epoch seconds', () => {
    const now = new Date(2026, 9, 19, 14, 5, 30, 900);
    expect(getDayRange(now)).toEqual({
      gte: new Date(2026, 9, 19).getTime() / 1000,
      lte: Math.floor(now.getTime() / 1000),
    });
  });

  it('is a single instant right at midnight', () => {
    const midnight = new Date(2026, 0, 1);
    const range = getDayRange(midnight);
    expect(range.gte).toBe(range.lte);
  });

  it('formats display date and time', () => {
    const value = new Date(2026, 2, 4, 9, 7);
    expect(formatDisplayDate(value)).toBe('04.03.2026');
    expect(formatDisplayTime(value)).toBe('09:07');
  });
});
