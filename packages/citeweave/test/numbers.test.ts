import { describe, expect, it } from 'vitest';
import { formatNumber, formatPageRange, isNumeric, isPluralValue, toRoman } from '../src/format/numbers.js';
import { loadLocale } from './fixtures/locale.js';

const locale = loadLocale();

describe('isNumeric', () => {
  it('accepts integers, affixed numbers, ranges and lists', () => {
    expect(isNumeric('12')).toBe(true);
    expect(isNumeric('2nd')).toBe(true);
    expect(isNumeric('L2')).toBe(true);
    expect(isNumeric('12-15')).toBe(true);
    expect(isNumeric('1, 3 & 5')).toBe(true);
  });

  it('rejects words and empty values', () => {
    expect(isNumeric('first')).toBe(false);
    expect(isNumeric('')).toBe(false);
    expect(isNumeric('12 Angry Men')).toBe(false);
  });
});

describe('isPluralValue', () => {
  it('detects ranges and lists', () => {
    expect(isPluralValue('12-15')).toBe(true);
    expect(isPluralValue('3 & 4')).toBe(true);
    expect(isPluralValue('12')).toBe(false);
    expect(isPluralValue(7)).toBe(false);
  });
});

describe('formatNumber', () => {
  it('renders ordinals with the locale suffixes', () => {
    expect(formatNumber(1, 'ordinal', locale)).toBe('1st');
    expect(formatNumber(11, 'ordinal', locale)).toBe('11th');
    expect(formatNumber(22, 'ordinal', locale)).toBe('22nd');
    expect(formatNumber('113', 'ordinal', locale)).toBe('113th');
    expect(formatNumber(101, 'ordinal', locale)).toBe('101st');
  });

  it('renders long ordinals up to ten and falls back to ordinals', () => {
    expect(formatNumber(2, 'long-ordinal', locale)).toBe('second');
    expect(formatNumber(12, 'long-ordinal', locale)).toBe('12th');
  });

  it('renders roman numerals', () => {
    expect(formatNumber(14, 'roman', locale)).toBe('xiv');
    expect(toRoman(1994)).toBe('mcmxciv');
  });

  it('passes non-integer text through unchanged', () => {
    expect(formatNumber('2nd revised', 'ordinal', locale)).toBe('2nd revised');
    expect(formatNumber('12a', 'roman', locale)).toBe('12a');
  });

  it('lets style terms override locale ordinals', () => {
    expect(formatNumber(3, 'ordinal', locale, { 'ordinal-03': { long: 'e' } })).toBe('3e');
  });
});

describe('formatPageRange', () => {
  it('uses an en dash and keeps the end as given by default', () => {
    expect(formatPageRange('321-28')).toBe('321–28');
    expect(formatPageRange('12 - 15, 20-22')).toBe('12–15, 20–22');
  });

  it('applies the style page-range formats', () => {
    expect(formatPageRange('321-328', 'minimal')).toBe('321–8');
    expect(formatPageRange('321-328', 'minimal-two')).toBe('321–28');
    expect(formatPageRange('321-28', 'expanded')).toBe('321–328');
    expect(formatPageRange('321-328', 'chicago')).toBe('321–28');
    expect(formatPageRange('100-104', 'chicago')).toBe('100–104');
    expect(formatPageRange('1496-1504', 'chicago')).toBe('1496–1504');
  });

  it('leaves non-numeric locators alone apart from hyphens', () => {
    expect(formatPageRange('xii-xiv')).toBe('xii-xiv');
    expect(formatPageRange('A3-7')).toBe('A3–7');
  });
});
