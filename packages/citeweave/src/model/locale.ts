import type { DatePart } from './style.js';

export type TermForm = 'long' | 'short' | 'verb' | 'verb-short' | 'symbol';

export type TermValue = string | { single: string; multiple: string };

export type TermEntry = Partial<Record<TermForm, TermValue>>;

export type TermOverrides = Readonly<Record<string, TermEntry>>;

export interface LocaleDateFormat {
  parts: DatePart[];
  delimiter?: string;
}

export interface Locale {
  /** BCP 47 tag, e.g. `en-US`. Drives collation and English-only title casing. */
  lang: string;
  terms: Readonly<Record<string, TermEntry>>;
  dateFormats: {
    numeric: LocaleDateFormat;
    text: LocaleDateFormat;
  };
  options?: {
    punctuationInQuote?: boolean;
    limitDayOrdinalsToDay1?: boolean;
  };
}

const FORM_FALLBACKS: Record<TermForm, TermForm[]> = {
  long: ['long'],
  short: ['short', 'long'],
  verb: ['verb', 'long'],
  'verb-short': ['verb-short', 'verb', 'long'],
  symbol: ['symbol', 'short', 'long']
};

const pickNumber = (value: TermValue, plural: boolean): string => {
  if (typeof value === 'string') {
    return value;
  }

  return plural ? value.multiple : value.single;
};

/**
 * Resolves a term through the form fallback chain. At each form the style's
 * override wins over the locale's own definition.
 */
export const lookupTerm = (
  locale: Locale,
  overrides: TermOverrides | undefined,
  name: string,
  form: TermForm = 'long',
  plural = false
): string | undefined => {
  for (const candidate of FORM_FALLBACKS[form]) {
    const override = overrides?.[name]?.[candidate];
    if (override !== undefined) {
      return pickNumber(override, plural);
    }

    const fromLocale = locale.terms[name]?.[candidate];
    if (fromLocale !== undefined) {
      return pickNumber(fromLocale, plural);
    }
  }

  return undefined;
};

export const isEnglish = (locale: Locale): boolean => locale.lang.toLowerCase().startsWith('en');
