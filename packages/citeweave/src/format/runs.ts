import type { Affixes, Display, Formatting } from '../model/style.js';

export type RunTag =
  | 'name'
  | 'year'
  | 'date'
  | 'title'
  | 'locator'
  | 'number'
  | 'text'
  | 'term'
  | 'year-suffix'
  | 'citation-number'
  | 'punctuation';

export interface TextRun {
  text: string;
  tag: RunTag;
  /** CSL variable the run was rendered from, when there is one. */
  variable?: string;
  formatting?: Formatting;
  display?: Display;
  /** Verbatim runs are exempt from every case transform. */
  verbatim?: boolean;
  quote?: 'open' | 'close';
}

export const punctuation = (value: string): TextRun => ({ text: value, tag: 'punctuation' });

export const hasText = (runs: readonly TextRun[]): boolean => runs.some((run) => run.text.length > 0);

export const toPlainText = (runs: readonly TextRun[]): string => runs.map((run) => run.text).join('');

export const wrapAffixes = (runs: TextRun[], affixes: Affixes): TextRun[] => {
  if (!hasText(runs)) {
    return [];
  }

  const wrapped = [...runs];
  if (affixes.prefix) {
    wrapped.unshift(punctuation(affixes.prefix));
  }
  if (affixes.suffix) {
    wrapped.push(punctuation(affixes.suffix));
  }

  return wrapped;
};

export const joinWithDelimiter = (parts: readonly TextRun[][], delimiter?: string): TextRun[] => {
  const joined: TextRun[] = [];

  for (const part of parts) {
    if (!hasText(part)) {
      continue;
    }

    if (joined.length > 0 && delimiter) {
      joined.push(punctuation(delimiter));
    }
    joined.push(...part);
  }

  return joined;
};

/** Inner formatting wins: only keys a run has not set are filled from the enclosing element. */
export const applyFormatting = (runs: TextRun[], formatting?: Formatting): TextRun[] => {
  if (!formatting || Object.keys(formatting).length === 0) {
    return runs;
  }

  return runs.map((run) => ({ ...run, formatting: { ...formatting, ...run.formatting } }));
};

export const applyDisplay = (runs: TextRun[], display?: Display): TextRun[] => {
  if (!display) {
    return runs;
  }

  return runs.map((run) => (run.display ? run : { ...run, display }));
};

export const stripPeriods = (runs: TextRun[]): TextRun[] =>
  runs.map((run) => (run.verbatim ? run : { ...run, text: run.text.replace(/\./g, '') }));

export const wrapQuotes = (runs: TextRun[], open: string, close: string): TextRun[] => {
  if (!hasText(runs)) {
    return [];
  }

  return [{ ...punctuation(open), quote: 'open' }, ...runs, { ...punctuation(close), quote: 'close' }];
};

const lastChar = (runs: readonly TextRun[], before = runs.length): string => {
  for (let index = before - 1; index >= 0; index -= 1) {
    const text = runs[index]?.text ?? '';
    if (text.length > 0) {
      return text[text.length - 1] ?? '';
    }
  }

  return '';
};

const TERMINAL = new Set(['.', '?', '!']);

export interface PunctuationOptions {
  punctuationInQuote?: boolean;
}

/**
 * Cleans up punctuation where affixes and delimiters meet: a period that would
 * follow `.`, `?` or `!` is dropped, doubled spaces at run boundaries collapse,
 * and with punctuation-in-quote a following `.` or `,` moves inside the closing
 * quote. Only punctuation runs are edited.
 */
export const normalizePunctuation = (runs: readonly TextRun[], options: PunctuationOptions = {}): TextRun[] => {
  const result: TextRun[] = [];

  for (const original of runs) {
    if (original.text.length === 0) {
      continue;
    }

    if (original.tag !== 'punctuation' || result.length === 0) {
      result.push(original);
      continue;
    }

    let value = original.text;
    const previous = result[result.length - 1];

    if (options.punctuationInQuote && previous?.quote === 'close' && /^[.,]/.test(value)) {
      const moved = value[0] ?? '';
      value = value.slice(1);
      const beforeQuote = lastChar(result, result.length - 1);
      if (!(moved === '.' && TERMINAL.has(beforeQuote)) && !(moved === ',' && beforeQuote === ',')) {
        result.splice(result.length - 1, 0, punctuation(moved));
      }
    }

    const tail = lastChar(result);
    if (value.startsWith('.') && TERMINAL.has(tail)) {
      value = value.slice(1);
    }
    if (value.startsWith(' ') && tail === ' ') {
      value = value.replace(/^ +/, '');
    }

    if (value.length > 0) {
      result.push(value === original.text ? original : { ...original, text: value });
    }
  }

  return result;
};
