// Unit tests for rate strings
import { parseRate } from '../../../src/shared/utils/rate.util';

describe('parseRate', () => {
  it.each([
    ['500/day', 500, 86400000],
    ['5/minute', 5, 60000],
    ['10/s', 10, 1000],
    ['3/hour', 3, 3600000],
    ['2/min', 2, 60000],
    [' 7 / Day ', 7, 86400000]
  ])('parses %p', (rate, max, timeWindow) => {
    expect(parseRate(rate)).toEqual({ max, timeWindow });
  });

  it('rejects an unknown period', () => {
    expect(() => parseRate('5/week')).toThrow('Invalid rate period "week", expected second, minute, hour or day');
  });

  it('rejects a malformed rate', () => {
    expect(() => parseRate('five/day')).toThrow('Invalid rate "five/day", expected <count>/<period>');
    expect(() => parseRate('500')).toThrow('Invalid rate "500", expected <count>/<period>');
  });

  it('rejects a zero count', () => {
    expect(() => parseRate('0/day')).toThrow('Invalid rate "0/day", count must be at least 1');
  });
});
