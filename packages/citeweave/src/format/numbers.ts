import type { Locale, TermOverrides } from '../model/locale.js';
import { lookupTerm } from '../model/locale.js';
import type { NumberNode, Style } from '../model/style.js';

export type NumberForm = NonNullable<NumberNode['form']>;
export type PageRangeFormat = NonNullable<Style['pageRangeFormat']>;

const INTEGER = /^\s*-?\d+\s*$/;
const NUMERIC_TOKEN = /^[a-z]*\d+[a-z]*$/i;
const NUMBER_SEPARATORS = /\s*(?:[-–—,&]|\band\b)\s*/;
const MULTIPLE = /\d\s*(?:[-–—,&]|\band\b)\s*[a-z]*\d/i;

export const parseInteger = (value: string | number): number | null => {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : null;
  }

  return INTEGER.test(value) ? Number.parseInt(value, 10) : null;
};

/**
 * CSL's numeric test: integers, affixed numbers like `2nd` or `L2`, and lists or
 * ranges of them (`12-15`, `1, 3 & 5`).
 */
export const isNumeric = (value: string | number): boolean => {
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }

  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return false;
  }

  return trimmed.split(NUMBER_SEPARATORS).every((token) => NUMERIC_TOKEN.test(token));
};

/** Whether a value names more than one item (`12-15`, `3 & 4`), for contextual plurals. */
export const isPluralValue = (value: string | number): boolean => {
  if (typeof value === 'number') {
    return false;
  }

  return MULTIPLE.test(value);
};

const ROMAN: Array<[number, string]> = [
  [1000, 'm'],
  [900, 'cm'],
  [500, 'd'],
  [400, 'cd'],
  [100, 'c'],
  [90, 'xc'],
  [50, 'l'],
  [40, 'xl'],
  [10, 'x'],
  [9, 'ix'],
  [5, 'v'],
  [4, 'iv'],
  [1, 'i']
];

export const toRoman = (value: number): string => {
  if (value <= 0 || value >= 4000) {
    return String(value);
  }

  let remaining = value;
  let output = '';
  for (const [amount, numeral] of ROMAN) {
    while (remaining >= amount) {
      output += numeral;
      remaining -= amount;
    }
  }

  return output;
};

const pad2 = (value: number): string => String(value).padStart(2, '0');

export const ordinalSuffix = (value: number, locale: Locale, overrides?: TermOverrides): string => {
  const abs = Math.abs(value);
  const lastTwo = abs % 100;
  const candidates = lastTwo >= 10 ? [`ordinal-${pad2(lastTwo)}`, `ordinal-0${abs % 10}`] : [`ordinal-0${abs % 10}`];

  for (const term of [...candidates, 'ordinal']) {
    const suffix = lookupTerm(locale, overrides, term);
    if (suffix !== undefined) {
      return suffix;
    }
  }

  return '';
};

export const formatOrdinal = (value: number, locale: Locale, overrides?: TermOverrides): string =>
  `${value}${ordinalSuffix(value, locale, overrides)}`;

export const formatLongOrdinal = (value: number, locale: Locale, overrides?: TermOverrides): string => {
  if (value >= 1 && value <= 10) {
    const word = lookupTerm(locale, overrides, `long-ordinal-${pad2(value)}`);
    if (word !== undefined) {
      return word;
    }
  }

  return formatOrdinal(value, locale, overrides);
};

/**
 * Renders a number variable. Word forms only apply to values that parse as an
 * integer; any other text is returned unchanged.
 */
export const formatNumber = (
  value: string | number,
  form: NumberForm,
  locale: Locale,
  overrides?: TermOverrides
): string => {
  const integer = parseInteger(value);
  if (integer === null) {
    return String(value);
  }

  switch (form) {
    case 'numeric':
      return String(integer);
    case 'ordinal':
      return formatOrdinal(integer, locale, overrides);
    case 'long-ordinal':
      return formatLongOrdinal(integer, locale, overrides);
    case 'roman':
      return toRoman(integer);
  }
};

const minimalEnd = (start: string, end: string, keep: number): string => {
  if (start.length !== end.length) {
    return end;
  }

  let index = 0;
  while (index < end.length - keep && start[index] === end[index]) {
    index += 1;
  }

  return end.slice(index);
};

const expandEnd = (start: string, end: string): string =>
  end.length < start.length ? start.slice(0, start.length - end.length) + end : end;

const chicagoEnd = (start: string, end: string): string => {
  const startValue = Number.parseInt(start, 10);
  if (startValue < 100 || startValue % 100 === 0) {
    return end;
  }
  if (startValue % 100 < 10) {
    return minimalEnd(start, end, 1);
  }
  if (start.length === 4 && minimalEnd(start, end, 1).length > 2) {
    return end;
  }

  return minimalEnd(start, end, 2);
};

const RANGE = /^(\d+)\s*[-–—]+\s*(\d+)$/;

/**
 * Normalizes page ranges to an en dash and collapses or expands the end
 * according to the style's page-range format. Anything that is not a plain
 * numeric range only has its hyphens replaced.
 */
export const formatPageRange = (value: string, format?: PageRangeFormat): string =>
  value
    .split(/\s*,\s*/)
    .map((part) => {
      const match = part.match(RANGE);
      if (!match?.[1] || !match[2]) {
        return part.replace(/(\d)\s*-+\s*(\d)/g, '$1–$2');
      }

      const start = match[1];
      const end = expandEnd(start, match[2]);
      switch (format) {
        case 'minimal':
          return `${start}–${minimalEnd(start, end, 1)}`;
        case 'minimal-two':
          return `${start}–${minimalEnd(start, end, 2)}`;
        case 'chicago':
          return `${start}–${chicagoEnd(start, end)}`;
        case 'expanded':
          return `${start}–${end}`;
        default:
          return `${start}–${match[2]}`;
      }
    })
    .join(', ');
