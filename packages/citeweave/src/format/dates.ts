import type { DateParts, StructuredDate } from '../model/entry.js';
import type { Locale, TermOverrides } from '../model/locale.js';
import { lookupTerm } from '../model/locale.js';
import type { DateNode, DatePart, DatePartName } from '../model/style.js';
import { applyTextCase } from './case.js';
import { formatOrdinal } from './numbers.js';
import { applyFormatting, hasText, punctuation, wrapAffixes } from './runs.js';
import type { TextRun } from './runs.js';

export interface DateFormatContext {
  locale: Locale;
  overrides?: TermOverrides;
  english: boolean;
  variable: string;
}

const GRANULARITY: Record<DatePartName, number> = { year: 3, month: 2, day: 1 };

const pad = (value: number, width: number): string => String(Math.abs(value)).padStart(width, '0');

const seasonOf = (parts: DateParts): number | undefined => {
  if (parts.season) {
    return parts.season;
  }
  if (parts.month && parts.month >= 13 && parts.month <= 16) {
    return parts.month - 12;
  }
  return undefined;
};

const monthOf = (parts: DateParts): number | undefined =>
  parts.month && parts.month >= 1 && parts.month <= 12 ? parts.month : undefined;

const hasPart = (parts: DateParts, name: DatePartName): boolean => {
  switch (name) {
    case 'year':
      return true;
    case 'month':
      return monthOf(parts) !== undefined || seasonOf(parts) !== undefined;
    case 'day':
      return monthOf(parts) !== undefined && parts.day !== undefined;
  }
};

const formatYear = (year: number, part: DatePart, context: DateFormatContext): string => {
  if (year <= 0) {
    return `${Math.abs(year)}${lookupTerm(context.locale, context.overrides, 'bc') ?? 'BC'}`;
  }

  const base = part.form === 'short' ? pad(year % 100, 2) : String(year);
  if (year < 1000) {
    return `${base}${lookupTerm(context.locale, context.overrides, 'ad') ?? 'AD'}`;
  }

  return base;
};

const formatMonth = (parts: DateParts, part: DatePart, context: DateFormatContext): string => {
  const month = monthOf(parts);
  if (month === undefined) {
    const season = seasonOf(parts);
    return season === undefined ? '' : lookupTerm(context.locale, context.overrides, `season-${pad(season, 2)}`) ?? '';
  }

  switch (part.form) {
    case 'numeric':
      return String(month);
    case 'numeric-leading-zeros':
      return pad(month, 2);
    case 'short':
      return lookupTerm(context.locale, context.overrides, `month-${pad(month, 2)}`, 'short') ?? String(month);
    default:
      return lookupTerm(context.locale, context.overrides, `month-${pad(month, 2)}`, 'long') ?? String(month);
  }
};

const formatDay = (day: number, part: DatePart, context: DateFormatContext): string => {
  switch (part.form) {
    case 'numeric-leading-zeros':
      return pad(day, 2);
    case 'ordinal':
      if (context.locale.options?.limitDayOrdinalsToDay1 && day !== 1) {
        return String(day);
      }
      return formatOrdinal(day, context.locale, context.overrides);
    default:
      return String(day);
  }
};

const partValue = (parts: DateParts, part: DatePart, context: DateFormatContext): string => {
  switch (part.name) {
    case 'year':
      return formatYear(parts.year, part, context);
    case 'month':
      return formatMonth(parts, part, context);
    case 'day':
      return parts.day === undefined ? '' : formatDay(parts.day, part, context);
  }
};

interface PartOptions {
  omitPrefix?: boolean;
  omitSuffix?: boolean;
}

const renderPart = (
  parts: DateParts,
  part: DatePart,
  context: DateFormatContext,
  options: PartOptions = {}
): TextRun[] => {
  const value = partValue(parts, part, context);
  if (value.length === 0) {
    return [];
  }

  const run: TextRun = { text: value, tag: part.name === 'year' ? 'year' : 'date', variable: context.variable };
  const cased = applyTextCase([run], part.textCase, context.english);
  return wrapAffixes(applyFormatting(cased, part.formatting), {
    prefix: options.omitPrefix ? undefined : part.prefix,
    suffix: options.omitSuffix ? undefined : part.suffix
  });
};

/** Resolves the parts a date node renders, merging localized formats with node overrides. */
export const resolveDateParts = (node: DateNode, locale: Locale): { parts: DatePart[]; delimiter?: string } => {
  if (!node.form) {
    return { parts: node.parts ?? [], delimiter: node.delimiter };
  }

  const localized = locale.dateFormats[node.form];
  const allowed: Record<NonNullable<DateNode['dateParts']>, DatePartName[]> = {
    year: ['year'],
    'year-month': ['year', 'month'],
    'year-month-day': ['year', 'month', 'day']
  };
  const permitted = new Set(allowed[node.dateParts ?? 'year-month-day']);

  const parts = localized.parts
    .filter((part) => permitted.has(part.name))
    .map((part) => {
      const override = node.parts?.find((candidate) => candidate.name === part.name);
      return override ? { ...part, ...override } : part;
    });

  return { parts, delimiter: localized.delimiter };
};

/** Largest unit, among those the node renders, in which start and end differ. */
const largestDifference = (start: DateParts, end: DateParts, rendered: ReadonlySet<DatePartName>): DatePartName | null => {
  if (rendered.has('year') && start.year !== end.year) {
    return 'year';
  }
  if (rendered.has('month') && (monthOf(start) !== monthOf(end) || seasonOf(start) !== seasonOf(end))) {
    return 'month';
  }
  if (rendered.has('day') && (start.day ?? null) !== (end.day ?? null)) {
    return 'day';
  }
  return null;
};

type Piece = TextRun[] | 'range';

const joinPieces = (pieces: Piece[], delimiter: string | undefined, rangeDelimiter: string): TextRun[] => {
  const runs: TextRun[] = [];
  let previous: Piece | null = null;

  for (const piece of pieces) {
    if (piece === 'range') {
      runs.push(punctuation(rangeDelimiter));
      previous = piece;
      continue;
    }
    if (!hasText(piece)) {
      continue;
    }
    if (previous !== null && previous !== 'range' && delimiter) {
      runs.push(punctuation(delimiter));
    }
    runs.push(...piece);
    previous = piece;
  }

  return runs;
};

const appendAfterLastYear = (runs: TextRun[], suffix: TextRun): boolean => {
  for (let index = runs.length - 1; index >= 0; index -= 1) {
    if (runs[index]?.tag === 'year') {
      runs.splice(index + 1, 0, suffix);
      return true;
    }
  }
  return false;
};

export interface FormattedDate {
  runs: TextRun[];
  yearSuffixUsed: boolean;
}

/**
 * Renders a structured date with the node's parts. Parts without data are
 * dropped together with their affixes; a range end collapses the parts it
 * shares with the start. An optional year-suffix run lands right after the
 * last rendered year.
 */
export const formatDate = (
  date: StructuredDate,
  node: DateNode,
  context: DateFormatContext,
  yearSuffix?: TextRun
): FormattedDate => {
  if (date.literal) {
    return { runs: [{ text: date.literal, tag: 'date', variable: context.variable }], yearSuffixUsed: false };
  }

  const { parts, delimiter } = resolveDateParts(node, context.locale);
  const present = parts.filter((part) => hasPart(date, part.name));
  const difference = date.end ? largestDifference(date, date.end, new Set(present.map((part) => part.name))) : null;

  let pieces: Piece[];
  let rangeDelimiter = '–';

  if (!date.end || difference === null) {
    pieces = present.map((part) => renderPart(date, part, context));
  } else {
    const end = date.end;
    const threshold = GRANULARITY[difference];
    const varying = present
      .map((part, index) => ({ part, index }))
      .filter(({ part }) => GRANULARITY[part.name] <= threshold);
    const first = varying[0]?.index ?? 0;
    const last = varying[varying.length - 1]?.index ?? present.length - 1;
    const segment = present.slice(first, last + 1);
    rangeDelimiter = present.find((part) => part.name === difference)?.rangeDelimiter ?? '–';

    pieces = [
      ...present.slice(0, first).map((part) => renderPart(date, part, context)),
      ...segment.map((part, index) =>
        renderPart(date, part, context, { omitSuffix: index === segment.length - 1 })
      ),
      'range',
      ...segment
        .filter((part) => hasPart(end, part.name))
        .map((part, index) => renderPart(end, part, context, { omitPrefix: index === 0 })),
      ...present.slice(last + 1).map((part) => renderPart(date, part, context))
    ];
  }

  const runs = joinPieces(pieces, delimiter, rangeDelimiter);
  const yearSuffixUsed = yearSuffix ? appendAfterLastYear(runs, yearSuffix) : false;

  return { runs, yearSuffixUsed };
};

const SORT_YEAR_OFFSET = 10000;

/**
 * Key used when dates render inside sort macros: the year shifted by 10000 so
 * BC years compare correctly as text, then `MMDD` (with `-` and a second key
 * for ranges).
 */
export const dateSortKey = (date: StructuredDate): string => {
  const key = (parts: DateParts): string =>
    `${pad(parts.year + SORT_YEAR_OFFSET, 5)}${pad(monthOf(parts) ?? 0, 2)}${pad(parts.day ?? 0, 2)}`;

  if (date.literal && !date.year) {
    return date.literal;
  }

  return date.end ? `${key(date)}-${key(date.end)}` : key(date);
};
