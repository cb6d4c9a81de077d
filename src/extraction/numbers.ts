/**
 * Tolerant parsing of human formatted counts such as "12.3K", "1,234",
 * "1.5M subscribers" or "2.4 million views".
 */

export const SUFFIX_MULTIPLIERS: Readonly<Record<string, number>> = {
  k: 1_000,
  m: 1_000_000,
  b: 1_000_000_000,
  t: 1_000_000_000_000,
  thousand: 1_000,
  million: 1_000_000,
  billion: 1_000_000_000,
  trillion: 1_000_000_000_000,
};

// digits and separators, then an optional suffix (letter or word) not followed by a letter or digit
const NUMBER_PATTERN = /^([+-]?\d[\d.,'\s]*)(thousand|million|billion|trillion|[kmbt])?(?![a-z\d])/i;
const GROUPED_THOUSANDS = /^\d{1,3}([.,'\s]\d{3})+$/;

/**
 * Decide which separator, if any, marks decimals and return a plain
 * JavaScript numeric string.
 */
function normalizeSeparators(raw: string, hasSuffix: boolean): string | undefined {
  const compact = raw.replace(/[\s']/g, '');
  const lastComma = compact.lastIndexOf(',');
  const lastDot = compact.lastIndexOf('.');

  if (lastComma !== -1 && lastDot !== -1) {
    // Both present: the rightmost one is the decimal separator
    const decimal = lastComma > lastDot ? ',' : '.';
    const thousands = decimal === ',' ? '.' : ',';
    return compact.split(thousands).join('').replace(decimal, '.');
  }

  const separator = lastComma !== -1 ? ',' : lastDot !== -1 ? '.' : undefined;
  if (!separator) {
    return compact;
  }

  const occurrences = compact.split(separator).length - 1;
  if (occurrences > 1) {
    return GROUPED_THOUSANDS.test(compact) ? compact.split(separator).join('') : undefined;
  }

  // A single separator followed by exactly three digits groups thousands,
  // unless a suffix says the value is already scaled ("1.500K" is rare, "1.5K" is not)
  const [, fraction = ''] = compact.split(separator);
  if (!hasSuffix && fraction.length === 3) {
    return compact.replace(separator, '');
  }
  return compact.replace(separator, '.');
}

/**
 * Parse a count, returning undefined for anything that is not one
 */
export function parseMetricNumber(input: string | number | null | undefined): number | undefined {
  if (typeof input === 'number') {
    return Number.isFinite(input) ? Math.round(input) : undefined;
  }
  if (typeof input !== 'string') {
    return undefined;
  }

  const text = input.replace(/[\u00a0\u202f]/g, ' ').trim();
  const match = NUMBER_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }

  const [, digits, suffix] = match;
  const normalized = normalizeSeparators(digits.trim().replace(/[.,']+$/, ''), Boolean(suffix));
  if (normalized === undefined || !/^[+-]?\d+(\.\d+)?$/.test(normalized)) {
    return undefined;
  }

  const multiplier = suffix ? SUFFIX_MULTIPLIERS[suffix.toLowerCase()] : 1;
  return Math.round(Number(normalized) * multiplier);
}
