import { parseMetricNumber } from '../numbers';

describe('parseMetricNumber', () => {
  it.each([
    ['12.3K', 12300],
    ['1.5M', 1500000],
    ['842', 842],
    ['2B', 2000000000],
    ['1t', 1000000000000],
    ['1,234', 1234],
    ['1.234.567', 1234567],
    ['1,234,567', 1234567],
    ['1,5K', 1500],
    ['12 345', 12345],
    ["1'234'567", 1234567],
    ['12,345.6', 12346],
    ['1.234,5', 1235],
  ])('parses %s as %d', (input, expected) => {
    expect(parseMetricNumber(input)).toBe(expected);
  });

  it('ignores surrounding whitespace and trailing labels', () => {
    expect(parseMetricNumber('  842 views ')).toBe(842);
    expect(parseMetricNumber('1.2K subscribers')).toBe(1200);
    expect(parseMetricNumber('5 members')).toBe(5);
    expect(parseMetricNumber('3,000+')).toBe(3000);
  });

  it('scales spelled-out magnitudes', () => {
    expect(parseMetricNumber('1.5 billion')).toBe(1500000000);
    expect(parseMetricNumber('2.4 million views')).toBe(2400000);
    expect(parseMetricNumber('12 Thousand')).toBe(12000);
    expect(parseMetricNumber('3 trillion')).toBe(3000000000000);
  });

  it('accepts non-breaking spaces as separators', () => {
    expect(parseMetricNumber('12\u00a0345')).toBe(12345);
    expect(parseMetricNumber('1,5\u202fM')).toBe(1500000);
  });

  it('rounds plain numbers', () => {
    expect(parseMetricNumber(41.6)).toBe(42);
    expect(parseMetricNumber(7)).toBe(7);
  });

  it.each([['N/A'], [''], ['   '], ['views'], ['12abc'], ['1.2.3']])(
    'returns undefined for %p',
    (input) => {
      expect(parseMetricNumber(input)).toBeUndefined();
    }
  );

  it('returns undefined for absent and non-finite values', () => {
    expect(parseMetricNumber(undefined)).toBeUndefined();
    expect(parseMetricNumber(null)).toBeUndefined();
    expect(parseMetricNumber(Number.NaN)).toBeUndefined();
    expect(parseMetricNumber(Number.POSITIVE_INFINITY)).toBeUndefined();
  });
});
